/**
 * CLI options schema for Zod validation.
 *
 * Validates the raw Commander.js option bag before it is merged into the
 * pipeline configuration.
 */

import { z } from "zod";

import { OutputFormatSchema } from "./schema.js";

/**
 * Schema for CLI options validation.
 */
export const CLIOptionsSchema = z.object({
  input: z.string().min(1).optional(),
  genomeIndex: z.string().min(1).optional(),
  annotation: z.string().min(1).optional(),
  geneId: z.string().min(1).optional(),
  regionName: z.string().min(1).optional(),
  // Commander hands over parseInt's result, so NaN is caught here
  threads: z.number().int().positive().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
  summary: z.string().min(1).optional(),
  format: OutputFormatSchema.optional(),
});

/**
 * Type derived from the CLI options schema.
 */
export type CLIOptions = z.infer<typeof CLIOptionsSchema>;

/**
 * Format zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join(", ");
}

/**
 * Extracts and validates CLI options from Commander.js output.
 *
 * @param options - Raw options from Commander.js
 * @returns Validated CLI options with undefined entries removed
 * @throws Error if validation fails with a descriptive message
 */
export function extractCLIOptions(options: Record<string, unknown>): CLIOptions {
  const result = CLIOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new Error(`Invalid CLI options: ${formatIssues(result.error)}`);
  }

  const defined: CLIOptions = {};
  for (const [key, value] of Object.entries(result.data)) {
    if (value !== undefined) {
      Object.assign(defined, { [key]: value });
    }
  }
  return defined;
}
