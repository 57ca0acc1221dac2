/**
 * User-facing message channel.
 *
 * In production messages go to the terminal, coloured with chalk.
 * For testing, use createTestMessages() to capture them.
 */

import chalk from "chalk";

export type MessageLevel = "success" | "info" | "warn" | "error";

export interface MessageSink {
  success(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleMessages(): MessageSink {
  return {
    success(message) {
      console.error(chalk.green(`✓ ${message}`));
    },
    info(message) {
      console.error(message);
    },
    warn(message) {
      console.error(chalk.yellow(`⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`✗ ${message}`));
    },
  };
}

export interface RecordedMessage {
  level: MessageLevel;
  message: string;
}

export function createTestMessages(): MessageSink & {
  getMessages(level?: MessageLevel): string[];
  getRecords(): RecordedMessage[];
} {
  const records: RecordedMessage[] = [];
  const record = (level: MessageLevel) => (message: string) => {
    records.push({ level, message });
  };

  return {
    success: record("success"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    getMessages(level) {
      return records.filter((r) => !level || r.level === level).map((r) => r.message);
    },
    getRecords() {
      return [...records];
    },
  };
}
