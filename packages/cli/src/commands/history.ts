import * as path from "node:path";
import ora from "ora";

import {
  createCommandContext,
  loadCommandSettings,
  toResolveInput,
  type CommandContext,
  type CommandDeps,
} from "../core/context.js";
import { resolveEffectiveConfig } from "../core/effective-config/index.js";
import { toResolveReport } from "../core/report.js";
import {
  WorkingTreeHandle,
  selectRevisions,
  validateRevisions,
  walkRevisions,
  withStagedRevision,
} from "../core/revision-walker.js";
import { formatHistoryHuman } from "../formatters/human.js";
import { formatHistoryJson } from "../formatters/json.js";
import {
  SETUP_ERROR_EXIT_CODE,
  handleCommandError,
  isValidFormat,
  reportInvalidFormat,
} from "./shared.js";

import type { HistoryOptions, HistoryReport, RevisionReport } from "../types/index.js";

export const INTERRUPTED_EXIT_CODE = 130;

const INTERRUPT_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/**
 * Resolve once at `revision` and, when resolution succeeded, run the downstream
 * analysis command against the fresh effective configuration.
 */
async function runPass(
  ctx: CommandContext,
  projectDir: string,
  options: HistoryOptions,
  revision: string,
): Promise<RevisionReport> {
  const result = await resolveEffectiveConfig(
    toResolveInput(projectDir, options, ctx.settings),
    ctx.resolveDeps,
  );
  const entry: RevisionReport = { ...toResolveReport(projectDir, result), revision };
  if (result.status !== "resolved" || !options.run) return entry;

  const analysis = await ctx.runner(options.run, [], {
    cwd: projectDir,
    shell: true,
    env: {
      LINTWEAVE_EFFECTIVE_CONFIG_DIR: result.config.configDir,
      LINTWEAVE_REVISION: revision,
    },
  });
  ctx.logger.log("walker", "analysis finished", {
    revision,
    exitCode: analysis.exitCode,
    stdout: analysis.stdout,
    stderr: analysis.stderr,
  });

  entry.analysisExitCode = analysis.exitCode;
  if (analysis.exitCode !== 0) {
    ctx.messages.error(`Analysis command failed at ${revision} with exit code ${analysis.exitCode}`);
    if (analysis.stderr.trim()) ctx.messages.info(analysis.stderr.trim());
    entry.exitCode = analysis.exitCode;
  }
  return entry;
}

export async function historyCommand(
  projectPath: string | undefined,
  options: HistoryOptions,
  deps: CommandDeps = {},
): Promise<number> {
  const projectDir = path.resolve(projectPath ?? ".");
  if (!isValidFormat(options.format)) return reportInvalidFormat(String(options.format));

  if (!options.fullHistory && !options.commit) {
    console.error("Error: specify --full-history, --commit <rev>, or both");
    return SETUP_ERROR_EXIT_CODE;
  }
  if (options.until && !options.fullHistory) {
    console.error("Error: --until can only be combined with --full-history");
    return SETUP_ERROR_EXIT_CODE;
  }

  // the restore of the current revision always completes before we stop
  let interrupted = false;
  const onSignal = () => {
    interrupted = true;
  };
  for (const signal of INTERRUPT_SIGNALS) process.on(signal, onSignal);

  try {
    const settings = loadCommandSettings(projectDir, options, deps);
    const ctx = createCommandContext(settings, deps);
    const { git } = ctx;

    // fail fast on bad endpoints, before the working tree is touched
    const endpoints = [options.commit, options.until].filter((rev): rev is string => !!rev);
    await validateRevisions(git, projectDir, endpoints);

    const tree = await WorkingTreeHandle.acquire(git, projectDir, ctx.logger);
    const report: HistoryReport = {
      project: projectDir,
      mode: options.fullHistory ? "full-history" : "commit",
      originalRef: tree.originalRef,
      revisions: [],
      interrupted: false,
      exitCode: 0,
    };

    if (!options.fullHistory && options.commit) {
      const commit = await git.resolveRevision(projectDir, options.commit);
      const entry = await withStagedRevision(tree, commit, () =>
        runPass(ctx, projectDir, options, commit),
      );
      report.revisions.push(entry);
      report.exitCode = entry.exitCode;
    } else {
      const from = options.commit ? await git.resolveRevision(projectDir, options.commit) : undefined;
      const until = options.until ? await git.resolveRevision(projectDir, options.until) : undefined;
      const revisions = selectRevisions(await git.revisions(projectDir), from, until);

      const spinner = ora(`Resolving ${revisions.length} revision(s)...`).start();
      let completed = false;
      try {
        const summary = await walkRevisions({
          tree,
          revisions,
          shouldStop: () => interrupted,
          visit: async (revision, index) => {
            spinner.text = `[${index + 1}/${revisions.length}] ${revision.slice(0, 12)}`;
            const entry = await runPass(ctx, projectDir, options, revision);
            report.revisions.push(entry);
            report.exitCode = entry.exitCode;
            return { continue: entry.exitCode === 0 };
          },
        });

        report.interrupted = summary.interrupted;
        if (summary.interrupted) report.exitCode = INTERRUPTED_EXIT_CODE;
        completed = true;
      } finally {
        if (completed && report.exitCode === 0) {
          spinner.succeed(`Resolved ${report.revisions.length} revision(s)`);
        } else {
          spinner.fail(`Stopped after ${report.revisions.length} revision(s)`);
        }
      }
    }

    if (options.format === "json") {
      console.log(formatHistoryJson(report));
    } else {
      console.log(await formatHistoryHuman(report));
    }
    return report.exitCode;
  } catch (error) {
    return handleCommandError(error);
  } finally {
    for (const signal of INTERRUPT_SIGNALS) process.off(signal, onSignal);
  }
}
