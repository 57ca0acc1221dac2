export type {
  HistoryOptions,
  ResolveOptions,
  RevisionsOptions,
  VcsInfoOptions,
} from "./cli-options.js";

export type {
  EffectiveLayerReport,
  HistoryReport,
  PassStatus,
  ResolveReport,
  RevisionReport,
  VcsInfoReport,
} from "./reports.js";
