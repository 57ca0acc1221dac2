import * as path from "node:path";

import { InvalidOutputSetError } from "../errors.js";
import { fileExists } from "../fs-utils.js";
import { loadConfigIdentity, type ConfigIdentity } from "../local-config.js";

// files the resolver may write into its output directory
export const RESOLVER_OUTPUTS = {
  effective: "effective.qodana.yaml",
  localEcho: "qodana.yaml",
  resolverState: "qodana-config.json",
} as const;

export interface EffectiveLayer {
  readonly path: string;
  readonly identity: ConfigIdentity;
  // resolver's copy of the unmerged local configuration
  readonly localEchoPath?: string;
}

interface LayeredConfigBase {
  readonly configDir: string;
}

export interface ResolvedLayeredConfig extends LayeredConfigBase {
  readonly effective: EffectiveLayer;
  readonly resolverStatePath: string;
}

export interface UnresolvedLayeredConfig extends LayeredConfigBase {
  readonly effective?: undefined;
  readonly resolverStatePath?: string;
}

export type LayeredConfig = ResolvedLayeredConfig | UnresolvedLayeredConfig;

export interface ResolverOutputFiles {
  configDir: string;
  effectivePath?: string;
  localEchoPath?: string;
  resolverStatePath?: string;
}

export async function discoverOutputFiles(configDir: string): Promise<ResolverOutputFiles> {
  const present = async (name: string) => {
    const candidate = path.join(configDir, name);
    return (await fileExists(candidate)) ? candidate : undefined;
  };

  return {
    configDir,
    effectivePath: await present(RESOLVER_OUTPUTS.effective),
    localEchoPath: await present(RESOLVER_OUTPUTS.localEcho),
    resolverStatePath: await present(RESOLVER_OUTPUTS.resolverState),
  };
}

/**
 * Build the layered config from the files the resolver produced.
 * Throws InvalidOutputSetError when the set is incoherent.
 */
export function createLayeredConfig(
  files: ResolverOutputFiles,
  readIdentity: (filePath: string) => ConfigIdentity = loadConfigIdentity,
): LayeredConfig {
  const { configDir, effectivePath, localEchoPath, resolverStatePath } = files;

  if (localEchoPath && !effectivePath) {
    throw new InvalidOutputSetError(
      `Local ${RESOLVER_OUTPUTS.localEcho} file doesn't have an ${RESOLVER_OUTPUTS.effective} file.`,
    );
  }

  if (!effectivePath) {
    return Object.freeze({ configDir, resolverStatePath });
  }

  if (!resolverStatePath) {
    throw new InvalidOutputSetError(
      `${RESOLVER_OUTPUTS.effective} file doesn't have a ${RESOLVER_OUTPUTS.resolverState} file.`,
    );
  }

  const effective: EffectiveLayer = Object.freeze({
    path: effectivePath,
    identity: Object.freeze(readIdentity(effectivePath)),
    localEchoPath,
  });

  return Object.freeze({ configDir, effective, resolverStatePath });
}

export async function readLayeredConfig(configDir: string): Promise<LayeredConfig> {
  return createLayeredConfig(await discoverOutputFiles(configDir));
}
