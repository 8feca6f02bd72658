/**
 * CLI output formatters for runs and plans.
 */
import { formatSummary, type RunSummary } from "../state/index.js";

/**
 * One planned stage, with the directories it will read and write.
 */
export interface PlanEntry {
  stage: string;
  label: string;
  inputDir: string;
  outputDir: string;
  phases: string[];
  requires: string[];
}

/**
 * Output the final summary of a run.
 */
export function outputFinalSummary(summary: RunSummary): void {
  console.log("\n" + "=".repeat(60));
  console.log("RUN SUMMARY");
  console.log("=".repeat(60));
  console.log(formatSummary(summary));
  console.log("=".repeat(60) + "\n");
}

/**
 * Render a stage plan, one block per stage.
 */
export function formatPlan(entries: readonly PlanEntry[]): string {
  return entries
    .map((entry, index) => {
      const lines = [
        `${String(index + 1)}. ${entry.stage} (${entry.phases.join(" → ")})`,
        `   in:  ${entry.inputDir}`,
        `   out: ${entry.outputDir}`,
      ];
      for (const required of entry.requires) {
        lines.push(`   needs: ${required}`);
      }
      return lines.join("\n");
    })
    .join("\n");
}
