export { buildResolverArgs, RESOLVER_FLAGS } from "./arguments.js";
export type { ResolverArgsInput } from "./arguments.js";
export {
  ARTIFACT_DIR_NAME,
  ARTIFACT_FILENAME,
  ResolverArtifactProvisioner,
  artifactPath,
  bufferArtifactSource,
  fileArtifactSource,
} from "./artifact.js";
export type { ArtifactSource, ProvisionedArtifact } from "./artifact.js";
export { resolveEffectiveConfig } from "./client.js";
export { effectiveConfigDir, outputDirNameProblem } from "./output-dir.js";
export type { ResolveDeps, ResolveEffectiveConfigInput, ResolutionResult } from "./client.js";
export {
  RESOLVER_OUTPUTS,
  createLayeredConfig,
  discoverOutputFiles,
  readLayeredConfig,
} from "./layered-config.js";
export type {
  EffectiveLayer,
  LayeredConfig,
  ResolvedLayeredConfig,
  ResolverOutputFiles,
  UnresolvedLayeredConfig,
} from "./layered-config.js";
export { ProcessConfigResolver } from "./resolver.js";
export type { ConfigResolver, ResolverInvocation, ResolverRunResult } from "./resolver.js";
export { verifyLayerConsistency } from "./verifier.js";
