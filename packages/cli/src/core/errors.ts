/**
 * Error taxonomy for configuration resolution and revision traversal.
 *
 * Setup errors are fatal: commands catch them, print the message and exit 2.
 * Layer mismatches are returned (not thrown) so the caller decides whether to abort.
 */

export class LintweaveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// no resolution can happen when one of these is raised
export class ResolverSetupError extends LintweaveError {}

export class MissingRuntimeError extends ResolverSetupError {
  constructor() {
    super("Runtime launcher not found. Required for effective configuration creation.");
  }
}

export class MissingArtifactError extends ResolverSetupError {
  constructor() {
    super("Resolver artifact not found. Required for effective configuration creation.");
  }
}

export class ArtifactProvisioningError extends ResolverSetupError {}

export class InvalidOutputSetError extends ResolverSetupError {}

export class InvalidOutputDirError extends ResolverSetupError {}

export class FileAccessError extends ResolverSetupError {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(
      `Failed to verify existence of file ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class ConfigParseError extends LintweaveError {}

export class SettingsError extends LintweaveError {}

export type IdentityField = "ide" | "linter";

export class LayerMismatchError extends LintweaveError {
  constructor(
    readonly field: IdentityField,
    readonly effectiveValue: string,
    readonly localValue: string,
  ) {
    super(`effective.qodana.yaml \`${field}\` doesn't match root qodana.yaml \`${field}\``);
  }
}

export class GitCommandError extends LintweaveError {
  constructor(
    readonly args: readonly string[],
    readonly stderr: string,
    readonly exitCode: number,
  ) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    super(`git ${args.join(" ")} failed: ${detail}`);
  }
}

// a pass failed and putting the working tree back failed too; both are kept
export class WorkingTreeRestoreError extends LintweaveError {
  constructor(
    readonly failure: unknown,
    readonly restoreFailure: unknown,
  ) {
    super(
      `${errorMessage(failure)} (restoring the working tree also failed: ${errorMessage(restoreFailure)})`,
      { cause: failure },
    );
  }
}

export class UnknownRevisionError extends LintweaveError {
  constructor(readonly revision: string) {
    super(`Revision ${revision} does not exist in the repository history`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
