// primary public API
export {
  ProcessConfigResolver,
  RESOLVER_FLAGS,
  RESOLVER_OUTPUTS,
  ResolverArtifactProvisioner,
  bufferArtifactSource,
  buildResolverArgs,
  createLayeredConfig,
  fileArtifactSource,
  readLayeredConfig,
  resolveEffectiveConfig,
  verifyLayerConsistency,
} from "./core/effective-config/index.js";
export type {
  ArtifactSource,
  ConfigResolver,
  EffectiveLayer,
  LayeredConfig,
  ResolveDeps,
  ResolveEffectiveConfigInput,
  ResolutionResult,
  ResolvedLayeredConfig,
  ResolverInvocation,
  ResolverRunResult,
  UnresolvedLayeredConfig,
} from "./core/effective-config/index.js";

export { GitClient } from "./core/git.js";
export {
  WorkingTreeHandle,
  selectRevisions,
  validateRevisions,
  walkRevisions,
  withStagedRevision,
} from "./core/revision-walker.js";
export type { RevisionVisitOutcome, WalkOptions, WalkSummary, WorkingTreeState } from "./core/revision-walker.js";

export { loadSettings } from "./core/settings.js";
export type { LintweaveSettings } from "./core/settings.js";
export { createConsoleMessages, createTestMessages } from "./core/messages.js";
export type { MessageSink } from "./core/messages.js";
export { loadConfigIdentity } from "./core/local-config.js";
export type { ConfigIdentity } from "./core/local-config.js";

export {
  ArtifactProvisioningError,
  ConfigParseError,
  FileAccessError,
  GitCommandError,
  InvalidOutputSetError,
  LayerMismatchError,
  LintweaveError,
  MissingArtifactError,
  MissingRuntimeError,
  ResolverSetupError,
  SettingsError,
  UnknownRevisionError,
  WorkingTreeRestoreError,
} from "./core/errors.js";

export type { HistoryReport, ResolveReport, RevisionReport } from "./types/index.js";
