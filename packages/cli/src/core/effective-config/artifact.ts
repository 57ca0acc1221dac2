import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { ensureDir, outputFile, remove } from "fs-extra/esm";

import type { DebugLogger } from "../debug-logger.js";
import { createNoopLogger } from "../debug-logger.js";
import { ArtifactProvisioningError, errorMessage } from "../errors.js";
import { fileExists } from "../fs-utils.js";
import type { MessageSink } from "../messages.js";

export const ARTIFACT_FILENAME = "config-resolver.jar";
export const ARTIFACT_DIR_NAME = "tools";

export interface ArtifactSource {
  describe(): string;
  read(): Promise<Uint8Array>;
}

export function fileArtifactSource(filePath: string): ArtifactSource {
  return {
    describe: () => filePath,
    async read() {
      try {
        return await readFile(filePath);
      } catch (error) {
        throw new ArtifactProvisioningError(
          `Resolver artifact is not available at ${filePath}: ${errorMessage(error)}. ` +
            "Point LINTWEAVE_RESOLVER_ARTIFACT or 'resolverArtifact' in .lintweave.yaml at the resolver jar.",
          { cause: error },
        );
      }
    },
  };
}

export function bufferArtifactSource(bytes: Uint8Array, label = "in-memory resolver"): ArtifactSource {
  return {
    describe: () => label,
    read: () => Promise.resolve(bytes),
  };
}

export interface ProvisionedArtifact {
  readonly path: string;
  // deletes the artifact; failures are reported as warnings only
  release(): Promise<void>;
}

export function artifactPath(systemDir: string): string {
  return path.join(systemDir, ARTIFACT_DIR_NAME, ARTIFACT_FILENAME);
}

/**
 * Writes the resolver artifact into the scratch root for exactly one resolution
 * pass. The caller must release() it on every exit path.
 */
export class ResolverArtifactProvisioner {
  constructor(
    private readonly source: ArtifactSource,
    private readonly messages: MessageSink,
    private readonly logger: DebugLogger = createNoopLogger(),
  ) {}

  async provision(systemDir: string): Promise<ProvisionedArtifact> {
    if (!systemDir) {
      throw new ArtifactProvisioningError("Scratch directory is not set; cannot provision the resolver artifact");
    }
    const target = artifactPath(systemDir);

    // last write wins: a stale artifact from an earlier run is never reused
    if (await fileExists(target)) {
      try {
        await remove(target);
      } catch (error) {
        throw new ArtifactProvisioningError(
          `Failed to delete existing ${ARTIFACT_FILENAME}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }

    try {
      await ensureDir(path.dirname(target));
    } catch (error) {
      throw new ArtifactProvisioningError(
        `Failed to create directory for ${ARTIFACT_FILENAME}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const bytes = await this.source.read();
    this.logger.log("resolver", "provisioning resolver artifact", {
      source: this.source.describe(),
      target,
    });
    try {
      await outputFile(target, bytes, { mode: 0o644 });
    } catch (error) {
      throw new ArtifactProvisioningError(
        `Failed to write ${ARTIFACT_FILENAME} content to ${target}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    return {
      path: target,
      release: async () => {
        try {
          await remove(target);
        } catch (error) {
          this.messages.warn(`Failed to delete ${ARTIFACT_FILENAME}: ${errorMessage(error)}`);
        }
      },
    };
  }
}
