/**
 * Commander help styling.
 *
 * Each stage command has its own colour; pipeline commands are bold.
 *
 * @internal CLI helper - not part of public API
 */
import chalk from "chalk";

import type { StageName } from "../stages/index.js";
import type { Command } from "commander";

type Style = (text: string) => string;

const STAGE_STYLES: Record<StageName, Style> = {
  trim: (text) => chalk.cyan(text),
  align: (text) => chalk.blue(text),
  convert: (text) => chalk.magenta(text),
  assemble: (text) => chalk.green(text),
};

const STYLE_BY_COMMAND = new Map<string, Style>(Object.entries(STAGE_STYLES));

/**
 * Style a subcommand term such as `align [options]` by its command name.
 */
export function styleCommandTerm(term: string): string {
  const name = term.split(" ")[0] ?? "";
  const style = STYLE_BY_COMMAND.get(name) ?? ((text: string) => chalk.bold(text));
  return style(term);
}

/**
 * Colour the help output of a program and all of its subcommands.
 */
export function configureHelpStyles(program: Command): void {
  program.configureHelp({
    styleTitle: (str) => chalk.bold.underline(str),
    styleCommandText: (str) => chalk.bold(str),
    styleCommandDescription: (str) => str,
    styleDescriptionText: (str) => chalk.dim(str),
    styleOptionText: (str) => chalk.yellow(str),
    styleArgumentText: (str) => chalk.italic(str),
    styleSubcommandText: styleCommandTerm,
  });
}
