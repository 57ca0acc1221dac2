import * as path from "node:path";
import { emptyDir } from "fs-extra/esm";

import type { DebugLogger } from "../debug-logger.js";
import { createNoopLogger } from "../debug-logger.js";
import { ArtifactProvisioningError, errorMessage, type LayerMismatchError } from "../errors.js";
import { findDefaultLocalConfig, localConfigPathWithProject } from "../local-config.js";
import type { MessageSink } from "../messages.js";
import { buildResolverArgs } from "./arguments.js";
import type { ResolverArtifactProvisioner } from "./artifact.js";
import { readLayeredConfig, type LayeredConfig } from "./layered-config.js";
import { effectiveConfigDir } from "./output-dir.js";
import type { ConfigResolver } from "./resolver.js";
import { verifyLayerConsistency } from "./verifier.js";

export interface ResolveEffectiveConfigInput {
  projectDir: string;
  // relative to projectDir or absolute; discovered when omitted
  localConfigPath?: string;
  globalConfigsFile?: string;
  globalConfigId?: string;
  runtimePath?: string;
  systemDir: string;
  effectiveConfigDirName: string;
}

export interface ResolveDeps {
  resolver: ConfigResolver;
  provisioner: ResolverArtifactProvisioner;
  messages: MessageSink;
  logger?: DebugLogger;
  platform?: NodeJS.Platform;
}

export type ResolutionResult =
  | { status: "resolved"; config: LayeredConfig; localConfigPath: string }
  | { status: "inconsistent"; config: LayeredConfig; localConfigPath: string; error: LayerMismatchError }
  // resolver exited nonzero; there is no fallback merge
  | { status: "failed"; exitCode: number };

/**
 * One resolution pass: provision the resolver, run it, read and verify its outputs.
 *
 * Setup problems (no runtime, artifact I/O, incoherent output set) are thrown.
 * A failed resolver run and a layer mismatch are returned.
 */
export async function resolveEffectiveConfig(
  input: ResolveEffectiveConfigInput,
  deps: ResolveDeps,
): Promise<ResolutionResult> {
  const logger = deps.logger ?? createNoopLogger();
  const projectDir = path.resolve(input.projectDir);
  const localConfigPath = input.localConfigPath || findDefaultLocalConfig(projectDir);

  const outputDir = effectiveConfigDir(input.systemDir, input.effectiveConfigDirName);
  try {
    // outputs of an earlier pass must not be mistaken for this one's
    await emptyDir(outputDir);
  } catch (error) {
    throw new ArtifactProvisioningError(
      `Failed to prepare effective configuration directory ${outputDir}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const artifact = await deps.provisioner.provision(input.systemDir);
  try {
    const args = await buildResolverArgs({
      runtimePath: input.runtimePath,
      artifactPath: artifact.path,
      localConfigPath: localConfigPathWithProject(projectDir, localConfigPath),
      globalConfigsFile: input.globalConfigsFile,
      globalConfigId: input.globalConfigId,
      outputDir,
      platform: deps.platform,
    });
    logger.log("resolver", `creating effective configuration in '${outputDir}'`, { args });

    const run = await deps.resolver.resolve({ args, outputDir, cwd: projectDir });
    if (run.exitCode !== 0) {
      return { status: "failed", exitCode: run.exitCode };
    }

    const config = await readLayeredConfig(outputDir);
    const error = verifyLayerConsistency(config, localConfigPath, deps.messages);
    if (error) {
      return { status: "inconsistent", config, localConfigPath, error };
    }

    deps.messages.success("Loaded effective configuration");
    return { status: "resolved", config, localConfigPath };
  } finally {
    await artifact.release();
  }
}
