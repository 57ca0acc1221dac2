/**
 * Debug logger - JSON-lines log of subprocess activity
 * Resolver output and git commands land here instead of the terminal
 */

import fs from "node:fs";
import path from "node:path";

export type LogCategory = "resolver" | "git" | "walker" | "settings";

export const LOG_CATEGORIES: readonly LogCategory[] = ["resolver", "git", "walker", "settings"];

export const LOG_FILENAME = "lintweave.log";

// default log directory inside the scratch root
export const LOG_DIR_NAME = "log";

export interface DebugLogger {
  log(category: LogCategory, message: string, data?: object): void;
}

interface LoggerConfig {
  categories: LogCategory[] | null; // null = all categories
  logFile: string;
  maxFileSize: number;
}

export class FileDebugLogger implements DebugLogger {
  private config: LoggerConfig;

  constructor(logDir: string, categories?: LogCategory[], maxFileSize = 1024 * 1024) {
    this.config = {
      categories: categories?.length ? categories : null,
      logFile: path.join(logDir, LOG_FILENAME),
      maxFileSize,
    };
  }

  get logFile(): string {
    return this.config.logFile;
  }

  log(category: LogCategory, message: string, data?: object): void {
    if (this.config.categories && !this.config.categories.includes(category)) return;

    const entry = JSON.stringify({
      ...data, // spread first so reserved keys take precedence
      t: new Date().toISOString(),
      pid: process.pid,
      cat: category,
      msg: message,
    });

    this.writeLogSafe(entry + "\n");
  }

  private writeLogSafe(line: string): void {
    try {
      fs.mkdirSync(path.dirname(this.config.logFile), { recursive: true });
      this.tryRotate();
      fs.appendFileSync(this.config.logFile, line);
    } catch {
      // a broken log directory must not abort a resolution pass
    }
  }

  private tryRotate(): void {
    let size: number;
    try {
      size = fs.statSync(this.config.logFile).size;
    } catch {
      return; // nothing written yet
    }
    if (size <= this.config.maxFileSize) return;

    const backup = this.config.logFile + ".1";
    fs.rmSync(backup, { force: true });
    fs.renameSync(this.config.logFile, backup);
  }
}

class NoopLogger implements DebugLogger {
  log(): void {
    // intentionally empty
  }
}

export function createLogger(
  logDir: string,
  enabled: boolean,
  categories?: LogCategory[],
): DebugLogger {
  if (!enabled) {
    return new NoopLogger();
  }
  return new FileDebugLogger(logDir, categories);
}

export function createNoopLogger(): DebugLogger {
  return new NoopLogger();
}

/**
 * Collects entries in memory for assertions
 */
export function createTestLogger(): DebugLogger & {
  getEntries(): { category: LogCategory; message: string; data?: object }[];
} {
  const entries: { category: LogCategory; message: string; data?: object }[] = [];
  return {
    log(category, message, data) {
      entries.push({ category, message, data });
    },
    getEntries() {
      return [...entries];
    },
  };
}
