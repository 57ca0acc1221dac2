import * as path from "node:path";

import {
  createCommandContext,
  loadCommandSettings,
  toResolveInput,
  type CommandDeps,
} from "../core/context.js";
import { resolveEffectiveConfig } from "../core/effective-config/index.js";
import { toResolveReport } from "../core/report.js";
import { formatResolveHuman } from "../formatters/human.js";
import { formatResolveJson } from "../formatters/json.js";
import { handleCommandError, isValidFormat, reportInvalidFormat } from "./shared.js";

import type { ResolveOptions } from "../types/index.js";

export async function resolveCommand(
  projectPath: string | undefined,
  options: ResolveOptions,
  deps: CommandDeps = {},
): Promise<number> {
  const projectDir = path.resolve(projectPath ?? ".");
  if (!isValidFormat(options.format)) return reportInvalidFormat(String(options.format));

  try {
    const settings = loadCommandSettings(projectDir, options, deps);
    const ctx = createCommandContext(settings, deps);

    const result = await resolveEffectiveConfig(
      toResolveInput(projectDir, options, settings),
      ctx.resolveDeps,
    );
    const report = toResolveReport(projectDir, result);

    if (options.format === "json") {
      console.log(formatResolveJson(report));
    } else {
      console.log(await formatResolveHuman(report));
    }

    // resolver failures pass its own exit code through
    return report.exitCode;
  } catch (error) {
    return handleCommandError(error);
  }
}
