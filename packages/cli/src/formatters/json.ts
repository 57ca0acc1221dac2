import type { HistoryReport, ResolveReport, VcsInfoReport } from "../types/index.js";

export function formatResolveJson(report: ResolveReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatHistoryJson(report: HistoryReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatRevisionsJson(revisions: readonly string[]): string {
  return JSON.stringify(revisions, null, 2);
}

export function formatVcsInfoJson(report: VcsInfoReport): string {
  return JSON.stringify(report, null, 2);
}
