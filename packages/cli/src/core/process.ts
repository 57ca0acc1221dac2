import { execa } from "execa";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  // true when the process could not be started or was killed
  failed: boolean;
}

export interface CommandOptions {
  cwd?: string;
  shell?: boolean;
  env?: Record<string, string>;
}

/**
 * Runs one command to completion. Never rejects on a nonzero exit; callers inspect
 * `exitCode` and `failed`.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const result = await execa(command, [...args], {
    cwd: options.cwd,
    shell: options.shell ?? false,
    env: options.env,
    reject: false,
    stripFinalNewline: false,
  });

  const stdout = typeof result.stdout === "string" ? result.stdout : "";
  const stderr = typeof result.stderr === "string" ? result.stderr : "";
  // launch errors and signals carry no exit code
  const exitCode = result.exitCode ?? 1;

  return { stdout, stderr, exitCode, failed: result.failed };
};
