interface BaseCommandOptions {
  format?: string;
  debug?: boolean;
}

export interface ResolveOptions extends BaseCommandOptions {
  config?: string;
  globalConfigsFile?: string;
  globalConfigId?: string;
  runtime?: string;
  systemDir?: string;
}

export interface HistoryOptions extends ResolveOptions {
  fullHistory?: boolean;
  commit?: string;
  until?: string;
  run?: string;
}

export interface RevisionsOptions extends BaseCommandOptions {
  limit?: string;
}

export type VcsInfoOptions = BaseCommandOptions;
