import type { ResolutionResult } from "./effective-config/index.js";
import type { ResolveReport } from "../types/index.js";

export function exitCodeFor(result: ResolutionResult): number {
  switch (result.status) {
    case "resolved":
      return 0;
    case "inconsistent":
      return 1;
    case "failed":
      return result.exitCode;
  }
}

export function toResolveReport(project: string, result: ResolutionResult): ResolveReport {
  const exitCode = exitCodeFor(result);
  if (result.status === "failed") {
    return { project, status: "failed", exitCode };
  }

  const { config } = result;
  const report: ResolveReport = {
    project,
    localConfig: result.localConfigPath,
    status: result.status,
    exitCode,
    configDir: config.configDir,
    resolverStatePath: config.resolverStatePath,
  };

  if (config.effective) {
    report.effective = {
      path: config.effective.path,
      ide: config.effective.identity.ide,
      linter: config.effective.identity.linter,
      localEchoPath: config.effective.localEchoPath,
    };
  }

  if (result.status === "inconsistent") {
    report.mismatch = {
      field: result.error.field,
      effectiveValue: result.error.effectiveValue,
      localValue: result.error.localValue,
    };
  }

  return report;
}
