import { stat } from "node:fs/promises";

import { FileAccessError } from "./errors.js";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Existence check that only treats "not found" as absence; any other stat
 * failure (permissions, I/O) is a FileAccessError.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  if (!filePath) return false;
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw new FileAccessError(filePath, error);
  }
}
