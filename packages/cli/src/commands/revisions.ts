import * as path from "node:path";

import { createCommandContext, loadCommandSettings, type CommandDeps } from "../core/context.js";
import { formatRevisionsHuman } from "../formatters/human.js";
import { formatRevisionsJson } from "../formatters/json.js";
import {
  SETUP_ERROR_EXIT_CODE,
  handleCommandError,
  isValidFormat,
  reportInvalidFormat,
} from "./shared.js";

import type { RevisionsOptions } from "../types/index.js";

export function parseLimit(value: string | undefined): number | null {
  if (value === undefined) return 0;
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

export async function revisionsCommand(
  projectPath: string | undefined,
  options: RevisionsOptions,
  deps: CommandDeps = {},
): Promise<number> {
  const projectDir = path.resolve(projectPath ?? ".");
  if (!isValidFormat(options.format)) return reportInvalidFormat(String(options.format));

  const limit = parseLimit(options.limit);
  if (limit === null) {
    console.error(`Error: invalid --limit value "${options.limit ?? ""}". Use a non-negative integer`);
    return SETUP_ERROR_EXIT_CODE;
  }

  try {
    const ctx = createCommandContext(loadCommandSettings(projectDir, options, deps), deps);
    const all = await ctx.git.revisions(projectDir);
    // oldest first; a limit keeps the most recent ones
    const revisions = limit > 0 ? all.slice(-limit) : all;

    console.log(options.format === "json" ? formatRevisionsJson(revisions) : formatRevisionsHuman(revisions));
    return 0;
  } catch (error) {
    return handleCommandError(error);
  }
}
