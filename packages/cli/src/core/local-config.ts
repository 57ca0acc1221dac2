import * as fs from "node:fs";
import * as path from "node:path";
import yaml from "js-yaml";

import { ConfigParseError, errorMessage } from "./errors.js";

export const LOCAL_CONFIG_FILENAMES = ["qodana.yaml", "qodana.yml"] as const;

export interface ConfigIdentity {
  ide: string;
  linter: string;
}

export const EMPTY_IDENTITY: ConfigIdentity = Object.freeze({ ide: "", linter: "" });

/**
 * Find the project's local configuration file name, relative to the project.
 * Falls back to the first candidate when none exists.
 */
export function findDefaultLocalConfig(projectDir: string): string {
  for (const filename of LOCAL_CONFIG_FILENAMES) {
    if (fs.existsSync(path.join(projectDir, filename))) {
      return filename;
    }
  }
  return LOCAL_CONFIG_FILENAMES[0];
}

export function localConfigPathWithProject(projectDir: string, localConfigPath: string): string {
  if (path.isAbsolute(localConfigPath)) return localConfigPath;
  return path.join(projectDir, localConfigPath);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isEmptyIdentity(identity: ConfigIdentity): boolean {
  return identity.ide === "" && identity.linter === "";
}

function readStringField(obj: Record<string, unknown>, key: keyof ConfigIdentity, filePath: string): string {
  const value = obj[key];
  if (value == null) return "";
  if (typeof value !== "string") {
    throw new ConfigParseError(`Invalid configuration at ${filePath}: '${key}' must be a string`);
  }
  return value;
}

/**
 * Read the `ide` and `linter` declarations of a configuration file.
 * A missing file or a document that is not a mapping yields the empty identity.
 */
export function loadConfigIdentity(filePath: string | undefined): ConfigIdentity {
  if (!filePath || !fs.existsSync(filePath)) return EMPTY_IDENTITY;

  let parsed: unknown;
  try {
    // JSON_SCHEMA: no arbitrary object instantiation
    parsed = yaml.load(fs.readFileSync(filePath, "utf8"), { schema: yaml.JSON_SCHEMA });
  } catch (error) {
    throw new ConfigParseError(`Failed to parse ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  if (!isRecord(parsed)) return EMPTY_IDENTITY;

  return {
    ide: readStringField(parsed, "ide", filePath),
    linter: readStringField(parsed, "linter", filePath),
  };
}
