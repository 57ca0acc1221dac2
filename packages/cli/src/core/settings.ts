import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import yaml from "js-yaml";

import { LOG_CATEGORIES, LOG_DIR_NAME, type LogCategory } from "./debug-logger.js";
import { outputDirNameProblem } from "./effective-config/output-dir.js";
import { SettingsError, errorMessage } from "./errors.js";
import { isRecord } from "./local-config.js";
import { getBundledResolverPath } from "./paths.js";

export const SETTINGS_FILENAME = ".lintweave.yaml";

export interface LintweaveSettings {
  // launcher for the resolver jar, e.g. $JAVA_HOME/bin/java
  runtimePath?: string;
  // scratch root for the provisioned artifact and resolver output
  systemDir: string;
  effectiveConfigDirName: string;
  resolverArtifact: string;
  logDir: string;
  debug: boolean;
  debugCategories?: LogCategory[];
}

export type SettingsOverrides = Partial<LintweaveSettings>;

export interface LoadSettingsInput {
  projectDir: string;
  overrides?: SettingsOverrides;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function runtimeFromJavaHome(
  javaHome: string | undefined,
  platform: NodeJS.Platform = process.platform,
): string | undefined {
  if (!javaHome) return undefined;
  return path.join(javaHome, "bin", platform === "win32" ? "java.exe" : "java");
}

/**
 * Default settings. logDir is left unset so it can follow systemDir.
 */
export function createDefaultSettings(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Omit<LintweaveSettings, "logDir" | "resolverArtifact"> {
  return {
    runtimePath: runtimeFromJavaHome(env.JAVA_HOME, platform),
    systemDir: path.join(os.tmpdir(), "lintweave"),
    effectiveConfigDirName: "effective-config",
    debug: false,
  };
}

function expectString(obj: Record<string, unknown>, key: string, filePath: string): string | undefined {
  const value = obj[key];
  if (value == null) return undefined;
  if (typeof value !== "string" || !value) {
    throw new SettingsError(`Invalid settings at ${filePath}: '${key}' must be a non-empty string`);
  }
  return value;
}

function isLogCategory(value: unknown): value is LogCategory {
  return LOG_CATEGORIES.some((category) => category === value);
}

/**
 * Read `.lintweave.yaml` from the project directory. Relative paths in it are
 * resolved against the project directory.
 */
export function loadSettingsFile(projectDir: string): SettingsOverrides {
  const filePath = path.join(projectDir, SETTINGS_FILENAME);
  if (!fs.existsSync(filePath)) return {};

  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(filePath, "utf8"), { schema: yaml.JSON_SCHEMA });
  } catch (error) {
    throw new SettingsError(`Failed to parse ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  if (data == null) return {};
  if (!isRecord(data)) {
    throw new SettingsError(`Invalid settings at ${filePath}: expected an object`);
  }

  const fromProject = (value: string | undefined) =>
    value === undefined ? undefined : path.resolve(projectDir, value);

  const result: SettingsOverrides = {};
  const runtime = fromProject(expectString(data, "runtime", filePath));
  if (runtime) result.runtimePath = runtime;
  const systemDir = fromProject(expectString(data, "systemDir", filePath));
  if (systemDir) result.systemDir = systemDir;
  const dirName = expectString(data, "effectiveConfigDirName", filePath);
  if (dirName) {
    const problem = outputDirNameProblem(dirName);
    if (problem) {
      throw new SettingsError(`Invalid settings at ${filePath}: 'effectiveConfigDirName' ${problem}`);
    }
    result.effectiveConfigDirName = dirName;
  }
  const artifact = fromProject(expectString(data, "resolverArtifact", filePath));
  if (artifact) result.resolverArtifact = artifact;
  const logDir = fromProject(expectString(data, "logDir", filePath));
  if (logDir) result.logDir = logDir;

  if (data.debug != null) {
    if (typeof data.debug !== "boolean") {
      throw new SettingsError(`Invalid settings at ${filePath}: 'debug' must be a boolean`);
    }
    result.debug = data.debug;
  }

  if (data.debugCategories != null) {
    const categories: unknown = data.debugCategories;
    if (!Array.isArray(categories) || !categories.every(isLogCategory)) {
      throw new SettingsError(
        `Invalid settings at ${filePath}: 'debugCategories' must be a list of: ${LOG_CATEGORIES.join(", ")}`,
      );
    }
    result.debugCategories = categories;
  }

  return result;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): SettingsOverrides {
  const result: SettingsOverrides = {};
  if (env.LINTWEAVE_RUNTIME) result.runtimePath = env.LINTWEAVE_RUNTIME;
  if (env.LINTWEAVE_SYSTEM_DIR) result.systemDir = path.resolve(env.LINTWEAVE_SYSTEM_DIR);
  if (env.LINTWEAVE_RESOLVER_ARTIFACT) {
    result.resolverArtifact = path.resolve(env.LINTWEAVE_RESOLVER_ARTIFACT);
  }
  if (env.DEBUG && TRUTHY.has(env.DEBUG.toLowerCase())) result.debug = true;
  return result;
}

/**
 * Merge defaults, project settings file, environment and CLI overrides
 * (lowest to highest precedence).
 */
export function loadSettings(input: LoadSettingsInput): LintweaveSettings {
  const env = input.env ?? process.env;
  const defaults = createDefaultSettings(env, input.platform);
  // highest precedence first
  const layers: SettingsOverrides[] = [
    input.overrides ?? {},
    settingsFromEnv(env),
    loadSettingsFile(input.projectDir),
  ];

  const pick = <K extends keyof LintweaveSettings>(key: K): LintweaveSettings[K] | undefined => {
    for (const layer of layers) {
      const value = layer[key];
      if (value !== undefined) return value;
    }
    return undefined;
  };

  const systemDir = pick("systemDir") ?? defaults.systemDir;
  return {
    runtimePath: pick("runtimePath") ?? defaults.runtimePath,
    systemDir,
    effectiveConfigDirName: pick("effectiveConfigDirName") ?? defaults.effectiveConfigDirName,
    resolverArtifact: pick("resolverArtifact") ?? getBundledResolverPath(),
    logDir: pick("logDir") ?? path.join(systemDir, LOG_DIR_NAME),
    debug: pick("debug") ?? defaults.debug,
    debugCategories: pick("debugCategories"),
  };
}
