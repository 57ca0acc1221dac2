import { describe, it, expect } from "vitest";

import { formatHistoryJson, formatResolveJson, formatRevisionsJson } from "../../src/formatters/json.js";
import { toResolveReport } from "../../src/core/report.js";
import { LayerMismatchError } from "../../src/core/errors.js";

import type { HistoryReport } from "../../src/types/index.js";

describe("json formatter", () => {
  it("serialises a mismatch report", () => {
    const report = toResolveReport("/work/app", {
      status: "inconsistent",
      localConfigPath: "qodana.yaml",
      config: {
        configDir: "/out",
        effective: { path: "/out/effective.qodana.yaml", identity: { ide: "QDPY", linter: "" } },
        resolverStatePath: "/out/qodana-config.json",
      },
      error: new LayerMismatchError("ide", "QDPY", "QDJVM"),
    });

    expect(JSON.parse(formatResolveJson(report))).toEqual({
      project: "/work/app",
      localConfig: "qodana.yaml",
      status: "inconsistent",
      exitCode: 1,
      configDir: "/out",
      resolverStatePath: "/out/qodana-config.json",
      effective: { path: "/out/effective.qodana.yaml", ide: "QDPY", linter: "" },
      mismatch: { field: "ide", effectiveValue: "QDPY", localValue: "QDJVM" },
    });
  });

  it("keeps only the exit code of a failed run", () => {
    const report = toResolveReport("/work/app", { status: "failed", exitCode: 9 });
    expect(JSON.parse(formatResolveJson(report))).toEqual({ project: "/work/app", status: "failed", exitCode: 9 });
  });

  it("serialises a history report", () => {
    const history: HistoryReport = {
      project: "/work/app",
      mode: "commit",
      originalRef: "main",
      revisions: [],
      interrupted: false,
      exitCode: 0,
    };
    expect(JSON.parse(formatHistoryJson(history))).toEqual(history);
  });

  it("prints revisions as an indented array", () => {
    expect(formatRevisionsJson(["a", "b"])).toBe('[\n  "a",\n  "b"\n]');
  });
});
