import type { DebugLogger } from "./debug-logger.js";
import { createNoopLogger } from "./debug-logger.js";
import { LintweaveError, UnknownRevisionError, WorkingTreeRestoreError } from "./errors.js";
import type { GitClient } from "./git.js";

export type WorkingTreeState =
  | { kind: "clean" }
  | { kind: "modified"; revision: string; via: "checkout" | "reset" };

/**
 * The repository working tree as a resource: every mutation is paired with a
 * restore that brings it back to the ref it was acquired at.
 */
export class WorkingTreeHandle {
  private state: WorkingTreeState = { kind: "clean" };

  private constructor(
    private readonly git: GitClient,
    readonly cwd: string,
    // branch name, or the HEAD hash when detached
    readonly originalRef: string,
    private readonly logger: DebugLogger,
  ) {}

  static async acquire(
    git: GitClient,
    cwd: string,
    logger: DebugLogger = createNoopLogger(),
  ): Promise<WorkingTreeHandle> {
    const branch = await git.branch(cwd);
    const originalRef = branch === "HEAD" ? await git.currentRevision(cwd) : branch;
    logger.log("walker", "acquired working tree", { cwd, originalRef });
    return new WorkingTreeHandle(git, cwd, originalRef, logger);
  }

  get current(): WorkingTreeState {
    return this.state;
  }

  /**
   * Force-checkout a revision and remove untracked/ignored files left behind
   * by the previous one.
   */
  async checkoutRevision(revision: string): Promise<void> {
    this.assertClean(revision);
    this.state = { kind: "modified", revision, via: "checkout" };
    this.logger.log("walker", "checking out revision", { revision });
    await this.git.checkout(this.cwd, revision, true);
    await this.git.clean(this.cwd);
  }

  /**
   * Move the branch pointer to a revision with a soft reset; files stay as they are.
   */
  async stageRevision(revision: string): Promise<void> {
    this.assertClean(revision);
    this.logger.log("walker", "staging revision", { revision });
    await this.git.reset(this.cwd, revision);
    // the reflog entry exists only once the reset succeeded
    this.state = { kind: "modified", revision, via: "reset" };
  }

  async restore(): Promise<void> {
    const state = this.state;
    if (state.kind === "clean") return;

    this.logger.log("walker", "restoring working tree", { from: state.revision, via: state.via });
    if (state.via === "reset") {
      await this.git.resetBack(this.cwd);
    } else {
      await this.git.checkout(this.cwd, this.originalRef, true);
    }
    this.state = { kind: "clean" };
  }

  private assertClean(next: string): void {
    if (this.state.kind !== "clean") {
      throw new LintweaveError(
        `Working tree is still at ${this.state.revision}; restore it before moving to ${next}`,
      );
    }
  }
}

export interface RevisionVisitOutcome {
  continue: boolean;
}

export interface WalkOptions {
  tree: WorkingTreeHandle;
  revisions: readonly string[];
  visit: (revision: string, index: number) => Promise<RevisionVisitOutcome>;
  // checked between revisions, after the previous restore
  shouldStop?: () => boolean;
}

export interface WalkSummary {
  visited: string[];
  stoppedAt?: string;
  interrupted: boolean;
}

/**
 * Run `fn`, then restore the tree on every exit path. When both fail, the
 * error thrown by `fn` travels with the restore error.
 */
async function restoring<T>(tree: WorkingTreeHandle, fn: () => Promise<T>): Promise<T> {
  let result: T;
  try {
    result = await fn();
  } catch (error) {
    try {
      await tree.restore();
    } catch (restoreError) {
      throw new WorkingTreeRestoreError(error, restoreError);
    }
    throw error;
  }
  await tree.restore();
  return result;
}

/**
 * checkout -> clean -> visit -> restore, for each revision in order.
 * The restore runs on every exit path before the loop advances or returns.
 */
export async function walkRevisions(options: WalkOptions): Promise<WalkSummary> {
  const visited: string[] = [];

  for (const [index, revision] of options.revisions.entries()) {
    if (options.shouldStop?.()) {
      return { visited, interrupted: true };
    }

    const outcome = await restoring(options.tree, async () => {
      await options.tree.checkoutRevision(revision);
      return options.visit(revision, index);
    });

    visited.push(revision);
    if (!outcome.continue) {
      return { visited, stoppedAt: revision, interrupted: false };
    }
  }

  return { visited, interrupted: false };
}

/**
 * Run `fn` with the branch pointer soft-reset to `revision`, then reset back.
 */
export async function withStagedRevision<T>(
  tree: WorkingTreeHandle,
  revision: string,
  fn: () => Promise<T>,
): Promise<T> {
  return restoring(tree, async () => {
    await tree.stageRevision(revision);
    return fn();
  });
}

/**
 * Fails on the first revision that does not exist, before anything is mutated.
 */
export async function validateRevisions(
  git: GitClient,
  cwd: string,
  revisions: readonly string[],
): Promise<void> {
  for (const revision of revisions) {
    if (!(await git.revisionExists(cwd, revision))) {
      throw new UnknownRevisionError(revision);
    }
  }
}

function indexOfRevision(all: readonly string[], revision: string): number {
  // accept abbreviated hashes the way git does
  const index = all.findIndex((candidate) => candidate === revision || candidate.startsWith(revision));
  if (index === -1) throw new UnknownRevisionError(revision);
  return index;
}

/**
 * Slice of an oldest-first sequence from `from` to `until`, both inclusive.
 */
export function selectRevisions(
  all: readonly string[],
  from?: string,
  until?: string,
): readonly string[] {
  if (all.length === 0) return Object.freeze([]);
  const start = from ? indexOfRevision(all, from) : 0;
  const end = until ? indexOfRevision(all, until) : all.length - 1;
  if (end < start) {
    throw new LintweaveError(`Revision ${until ?? ""} is older than ${from ?? ""}`);
  }
  return Object.freeze(all.slice(start, end + 1));
}
