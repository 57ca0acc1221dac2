export type PassStatus = "resolved" | "inconsistent" | "failed";

export interface EffectiveLayerReport {
  path: string;
  ide: string;
  linter: string;
  localEchoPath?: string;
}

export interface ResolveReport {
  project: string;
  localConfig?: string;
  status: PassStatus;
  exitCode: number;
  configDir?: string;
  effective?: EffectiveLayerReport;
  resolverStatePath?: string;
  // set for status "inconsistent"
  mismatch?: { field: string; effectiveValue: string; localValue: string };
}

export interface RevisionReport extends ResolveReport {
  revision: string;
  analysisExitCode?: number;
}

export interface HistoryReport {
  project: string;
  mode: "full-history" | "commit";
  originalRef: string;
  revisions: RevisionReport[];
  interrupted: boolean;
  exitCode: number;
}

export interface VcsInfoReport {
  root: string;
  remoteUrl?: string;
  branch: string;
  revision: string;
}
