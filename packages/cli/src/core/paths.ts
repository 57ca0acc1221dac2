import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { ARTIFACT_DIR_NAME, ARTIFACT_FILENAME } from "./effective-config/artifact.js";
import { isRecord } from "./local-config.js";

// this module is compiled to dist/core and tested from src/core: either way the
// package root is two levels up
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

// resolver jar shipped with the package; settings may point elsewhere
export function getBundledResolverPath(): string {
  return path.join(PACKAGE_ROOT, ARTIFACT_DIR_NAME, ARTIFACT_FILENAME);
}

export async function readPackageVersion(): Promise<string> {
  const manifest: unknown = JSON.parse(await readFile(path.join(PACKAGE_ROOT, "package.json"), "utf8"));
  if (!isRecord(manifest) || typeof manifest.version !== "string") {
    throw new Error(`No version in ${path.join(PACKAGE_ROOT, "package.json")}`);
  }
  return manifest.version;
}
