import * as path from "node:path";

import { createCommandContext, loadCommandSettings, type CommandDeps } from "../core/context.js";
import { GitCommandError } from "../core/errors.js";
import { formatVcsInfoHuman } from "../formatters/human.js";
import { formatVcsInfoJson } from "../formatters/json.js";
import { handleCommandError, isValidFormat, reportInvalidFormat } from "./shared.js";

import type { VcsInfoOptions, VcsInfoReport } from "../types/index.js";

export async function vcsInfoCommand(
  projectPath: string | undefined,
  options: VcsInfoOptions,
  deps: CommandDeps = {},
): Promise<number> {
  const projectDir = path.resolve(projectPath ?? ".");
  if (!isValidFormat(options.format)) return reportInvalidFormat(String(options.format));

  try {
    const { git } = createCommandContext(loadCommandSettings(projectDir, options, deps), deps);

    let remoteUrl: string | undefined;
    try {
      remoteUrl = await git.remoteUrl(projectDir);
    } catch (error) {
      // repositories without an origin remote are common
      if (!(error instanceof GitCommandError)) throw error;
    }

    const report: VcsInfoReport = {
      root: await git.root(projectDir),
      remoteUrl,
      branch: await git.branch(projectDir),
      revision: await git.currentRevision(projectDir),
    };

    console.log(options.format === "json" ? formatVcsInfoJson(report) : await formatVcsInfoHuman(report));
    return 0;
  } catch (error) {
    return handleCommandError(error);
  }
}
