import * as path from "node:path";

import { LOG_DIR_NAME } from "../debug-logger.js";
import { InvalidOutputDirError } from "../errors.js";
import { ARTIFACT_DIR_NAME } from "./artifact.js";

// siblings of the output directory inside the scratch root
const RESERVED_NAMES: readonly string[] = [ARTIFACT_DIR_NAME, LOG_DIR_NAME];

/**
 * Why `name` cannot be the output directory, or undefined when it can.
 * The directory is emptied on every pass, so it must be one plain segment
 * directly under the scratch root.
 */
export function outputDirNameProblem(name: string): string | undefined {
  if (!name.trim()) return "it is empty";
  if (name === "." || name === "..") return "it refers to the scratch directory or its parent";
  if (/[\\/]/.test(name) || path.isAbsolute(name)) return "it must be a single directory name";
  if (RESERVED_NAMES.includes(name)) return `'${name}' is used by lintweave inside the scratch directory`;
  return undefined;
}

export function effectiveConfigDir(systemDir: string, effectiveConfigDirName: string): string {
  if (!systemDir) {
    throw new InvalidOutputDirError("Scratch directory is not set; cannot place the effective configuration");
  }
  const problem = outputDirNameProblem(effectiveConfigDirName);
  if (problem) {
    throw new InvalidOutputDirError(
      `Invalid effective configuration directory name '${effectiveConfigDirName}': ${problem}`,
    );
  }
  return path.join(systemDir, effectiveConfigDirName);
}
