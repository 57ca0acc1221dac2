import { describe, it, expect } from "vitest";

import { LayerMismatchError } from "../../src/core/errors.js";
import { exitCodeFor, toResolveReport } from "../../src/core/report.js";

const config = { configDir: "/out", resolverStatePath: "/out/qodana-config.json" };

describe("exitCodeFor", () => {
  it("maps each outcome to an exit code", () => {
    expect(exitCodeFor({ status: "resolved", config, localConfigPath: "qodana.yaml" })).toBe(0);
    expect(
      exitCodeFor({
        status: "inconsistent",
        config,
        localConfigPath: "qodana.yaml",
        error: new LayerMismatchError("linter", "x", ""),
      }),
    ).toBe(1);
    expect(exitCodeFor({ status: "failed", exitCode: 42 })).toBe(42);
  });
});

describe("toResolveReport", () => {
  it("leaves out the effective layer when the resolver produced none", () => {
    expect(toResolveReport("/p", { status: "resolved", config, localConfigPath: "qodana.yml" })).toEqual({
      project: "/p",
      localConfig: "qodana.yml",
      status: "resolved",
      exitCode: 0,
      configDir: "/out",
      resolverStatePath: "/out/qodana-config.json",
    });
  });
});
