import type { DebugLogger } from "./debug-logger.js";
import { createNoopLogger } from "./debug-logger.js";
import { GitCommandError } from "./errors.js";
import { runCommand, type CommandRunner } from "./process.js";

export interface GitOutput {
  stdout: string;
  stderr: string;
}

/**
 * Thin wrapper over the git executable. Every call is written to the debug log;
 * a nonzero exit throws GitCommandError carrying the captured stderr.
 */
export class GitClient {
  constructor(
    private readonly logger: DebugLogger = createNoopLogger(),
    private readonly run: CommandRunner = runCommand,
  ) {}

  private async exec(cwd: string, args: readonly string[]): Promise<GitOutput> {
    this.logger.log("git", "executing command", { args: ["git", ...args], cwd });
    const result = await this.run("git", args, { cwd });

    if (result.stdout) this.logger.log("git", "stdout", { output: result.stdout });
    if (result.stderr) this.logger.log("git", "stderr", { output: result.stderr });

    if (result.failed || result.exitCode !== 0) {
      throw new GitCommandError(args, result.stderr, result.exitCode);
    }
    return { stdout: result.stdout, stderr: result.stderr };
  }

  private async query(cwd: string, args: readonly string[]): Promise<string> {
    const { stdout } = await this.exec(cwd, args);
    return stdout.trim();
  }

  // soft reset: only the branch pointer moves, the working tree is untouched
  async reset(cwd: string, revision: string): Promise<void> {
    await this.exec(cwd, ["reset", "--soft", revision]);
  }

  // undoes the preceding reset through the reflog
  async resetBack(cwd: string): Promise<void> {
    await this.exec(cwd, ["reset", "HEAD@{1}"]);
  }

  async checkout(cwd: string, ref: string, force: boolean): Promise<void> {
    await this.exec(cwd, force ? ["checkout", "-f", ref] : ["checkout", ref]);
  }

  async clean(cwd: string): Promise<void> {
    await this.exec(cwd, ["clean", "-fdx"]);
  }

  /**
   * Log lines in git's natural order (newest first).
   */
  async log(cwd: string, format: string, limit = 0): Promise<string[]> {
    const args = ["--no-pager", "log", `--pretty=format:${format}`];
    if (limit > 0) args.push("-n", String(limit));
    const { stdout } = await this.exec(cwd, args);
    return stdout.split("\n").map((line) => line.trim()).filter((line) => line.length > 0);
  }

  /**
   * Commit hashes in chronological order (oldest first).
   */
  async revisions(cwd: string): Promise<readonly string[]> {
    const newestFirst = await this.log(cwd, "%H");
    return Object.freeze(newestFirst.reverse());
  }

  async root(cwd: string): Promise<string> {
    return this.query(cwd, ["rev-parse", "--show-toplevel"]);
  }

  async remoteUrl(cwd: string): Promise<string> {
    return this.query(cwd, ["remote", "get-url", "origin"]);
  }

  async branch(cwd: string): Promise<string> {
    return this.query(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  }

  async currentRevision(cwd: string): Promise<string> {
    return this.resolveRevision(cwd, "HEAD");
  }

  // full hash of any revision expression (branch, tag, HEAD~2, short hash)
  async resolveRevision(cwd: string, revision: string): Promise<string> {
    return this.query(cwd, ["rev-parse", revision]);
  }

  async revisionExists(cwd: string, revision: string): Promise<boolean> {
    let stderr: string;
    try {
      ({ stderr } = await this.exec(cwd, ["show", "--no-patch", revision]));
    } catch (error) {
      if (error instanceof GitCommandError) return false;
      throw error;
    }
    return !stderr.includes("fatal:") && !stderr.includes(revision);
  }
}
