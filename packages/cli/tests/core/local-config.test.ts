import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { ConfigParseError } from "../../src/core/errors.js";
import {
  EMPTY_IDENTITY,
  findDefaultLocalConfig,
  isEmptyIdentity,
  loadConfigIdentity,
  localConfigPathWithProject,
} from "../../src/core/local-config.js";
import { makeTempDir } from "../helpers/canned-resolver.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = makeTempDir("local-config");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function write(name: string, content: string): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, content, "utf8");
  return filePath;
}

describe("findDefaultLocalConfig", () => {
  it("falls back to qodana.yaml when nothing exists", () => {
    expect(findDefaultLocalConfig(tmpDir)).toBe("qodana.yaml");
  });

  it("prefers qodana.yaml over qodana.yml", () => {
    write("qodana.yml", "version: '1.0'\n");
    write("qodana.yaml", "version: '1.0'\n");
    expect(findDefaultLocalConfig(tmpDir)).toBe("qodana.yaml");
  });

  it("finds qodana.yml when it is the only one", () => {
    write("qodana.yml", "version: '1.0'\n");
    expect(findDefaultLocalConfig(tmpDir)).toBe("qodana.yml");
  });
});

describe("localConfigPathWithProject", () => {
  it("joins relative paths onto the project", () => {
    expect(localConfigPathWithProject("/work/app", "config/qodana.yaml")).toBe(
      path.join("/work/app", "config/qodana.yaml"),
    );
  });

  it("keeps absolute paths", () => {
    expect(localConfigPathWithProject("/work/app", "/etc/qodana.yaml")).toBe("/etc/qodana.yaml");
  });
});

describe("loadConfigIdentity", () => {
  it("reads ide and linter", () => {
    const file = write("qodana.yaml", "version: '1.0'\nide: QDJVM\nlinter: jetbrains/qodana-jvm\n");
    expect(loadConfigIdentity(file)).toEqual({ ide: "QDJVM", linter: "jetbrains/qodana-jvm" });
  });

  it("treats missing keys as empty", () => {
    const file = write("qodana.yaml", "version: '1.0'\nide: QDPY\n");
    expect(loadConfigIdentity(file)).toEqual({ ide: "QDPY", linter: "" });
  });

  it("returns the empty identity for a missing file", () => {
    expect(loadConfigIdentity(path.join(tmpDir, "absent.yaml"))).toBe(EMPTY_IDENTITY);
    expect(loadConfigIdentity(undefined)).toBe(EMPTY_IDENTITY);
  });

  it("returns the empty identity for an empty document", () => {
    const file = write("qodana.yaml", "");
    expect(loadConfigIdentity(file)).toBe(EMPTY_IDENTITY);
  });

  it("rejects non-string declarations", () => {
    const file = write("qodana.yaml", "ide: 42\n");
    expect(() => loadConfigIdentity(file)).toThrow(ConfigParseError);
    expect(() => loadConfigIdentity(file)).toThrow("'ide' must be a string");
  });

  it("wraps YAML syntax errors", () => {
    const file = write("qodana.yaml", "ide: [unterminated\n");
    expect(() => loadConfigIdentity(file)).toThrow(/Failed to parse/);
  });
});

describe("isEmptyIdentity", () => {
  it("is true only when both fields are empty", () => {
    expect(isEmptyIdentity({ ide: "", linter: "" })).toBe(true);
    expect(isEmptyIdentity({ ide: "", linter: "x" })).toBe(false);
    expect(isEmptyIdentity({ ide: "x", linter: "" })).toBe(false);
  });
});
