import type { ChalkInstance } from "chalk";
import type {
  HistoryReport,
  PassStatus,
  ResolveReport,
  RevisionReport,
  VcsInfoReport,
} from "../types/index.js";

const STATUS_LABEL: Record<PassStatus, string> = {
  resolved: "resolved",
  inconsistent: "layer mismatch",
  failed: "resolver failed",
};

function statusColor(chalk: ChalkInstance, status: PassStatus): ChalkInstance {
  switch (status) {
    case "resolved":
      return chalk.green;
    case "inconsistent":
      return chalk.yellow;
    case "failed":
      return chalk.red;
  }
}

function orNone(value: string | undefined): string {
  return value ? value : "(none)";
}

function describeLayers(chalk: ChalkInstance, report: ResolveReport, indent: string): string[] {
  const lines: string[] = [];
  if (report.status === "failed") {
    lines.push(`${indent}${chalk.red(`Resolver exited with code ${report.exitCode}`)}`);
    return lines;
  }

  lines.push(`${indent}Local config:     ${orNone(report.localConfig)}`);
  lines.push(`${indent}Output directory: ${orNone(report.configDir)}`);
  lines.push(`${indent}Effective config: ${orNone(report.effective?.path)}`);
  if (report.effective) {
    lines.push(`${indent}  ide:    ${orNone(report.effective.ide)}`);
    lines.push(`${indent}  linter: ${orNone(report.effective.linter)}`);
    lines.push(`${indent}  local echo: ${orNone(report.effective.localEchoPath)}`);
  }
  lines.push(`${indent}Resolver state:   ${orNone(report.resolverStatePath)}`);

  if (report.mismatch) {
    const { field, effectiveValue, localValue } = report.mismatch;
    lines.push(
      `${indent}${chalk.yellow(`Mismatch on '${field}': effective '${effectiveValue}', local '${orNone(localValue)}'`)}`,
    );
  }
  return lines;
}

export async function formatResolveHuman(report: ResolveReport): Promise<string> {
  const chalk = (await import("chalk")).default;
  const lines: string[] = [];

  lines.push(chalk.bold(`lintweave resolve: ${report.project}`));
  lines.push(`Status: ${statusColor(chalk, report.status)(STATUS_LABEL[report.status])}`);
  lines.push(...describeLayers(chalk, report, "  "));

  return lines.join("\n");
}

function formatRevisionLine(chalk: ChalkInstance, entry: RevisionReport): string {
  const label = statusColor(chalk, entry.status)(STATUS_LABEL[entry.status]);
  const analysis =
    entry.analysisExitCode === undefined ? "" : chalk.dim(` (analysis exit ${entry.analysisExitCode})`);
  return `${entry.revision.slice(0, 12)}  ${label}${analysis}`;
}

export async function formatHistoryHuman(report: HistoryReport): Promise<string> {
  const chalk = (await import("chalk")).default;
  const lines: string[] = [];

  lines.push(chalk.bold(`lintweave history: ${report.project}`));
  lines.push(chalk.dim(`Mode: ${report.mode}, restored to ${report.originalRef}`));
  lines.push("");

  for (const entry of report.revisions) {
    lines.push(formatRevisionLine(chalk, entry));
    if (entry.status !== "resolved") {
      lines.push(...describeLayers(chalk, entry, "    "));
    }
  }

  lines.push("");
  if (report.interrupted) {
    lines.push(chalk.yellow(`Interrupted after ${report.revisions.length} revision(s)`));
  }
  lines.push(`Revisions processed: ${chalk.bold(String(report.revisions.length))}`);

  return lines.join("\n");
}

export function formatRevisionsHuman(revisions: readonly string[]): string {
  return revisions.join("\n");
}

export async function formatVcsInfoHuman(report: VcsInfoReport): Promise<string> {
  const chalk = (await import("chalk")).default;
  return [
    `${chalk.bold("Root:")}     ${report.root}`,
    `${chalk.bold("Remote:")}   ${orNone(report.remoteUrl)}`,
    `${chalk.bold("Branch:")}   ${report.branch}`,
    `${chalk.bold("Revision:")} ${report.revision}`,
  ].join("\n");
}
