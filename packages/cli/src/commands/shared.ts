import chalk from "chalk";

import { LintweaveError } from "../core/errors.js";

export const SETUP_ERROR_EXIT_CODE = 2;

export function isValidFormat(format: string | undefined): format is "human" | "json" | undefined {
  return format === undefined || format === "human" || format === "json";
}

export function reportInvalidFormat(format: string): number {
  console.error(`Error: invalid --format value "${format}". Use human or json`);
  return SETUP_ERROR_EXIT_CODE;
}

/**
 * Known failures become an exit code; anything else is a bug and propagates.
 */
export function handleCommandError(error: unknown): number {
  if (error instanceof LintweaveError) {
    console.error(chalk.red(`Error: ${error.message}`));
    return SETUP_ERROR_EXIT_CODE;
  }
  throw error;
}
