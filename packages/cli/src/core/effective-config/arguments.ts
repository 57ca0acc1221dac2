import * as path from "node:path";

import { MissingArtifactError, MissingRuntimeError } from "../errors.js";
import { fileExists } from "../fs-utils.js";
import { quoteArgument } from "../quote.js";

export const RESOLVER_FLAGS = {
  jar: "-jar",
  outputDir: "--effective-config-out-dir",
  localConfig: "--local-qodana-yaml",
  globalConfigsFile: "--global-configs-file",
  globalConfigId: "--global-config-id",
} as const;

export interface ResolverArgsInput {
  runtimePath: string | undefined;
  artifactPath: string | undefined;
  localConfigPath: string;
  globalConfigsFile?: string;
  globalConfigId?: string;
  outputDir: string;
  // base for relative paths, defaults to process.cwd()
  cwd?: string;
  platform?: NodeJS.Platform;
}

/**
 * Build the resolver command line:
 * `<runtime> -jar <artifact> --effective-config-out-dir <dir> [--local-qodana-yaml <file>]
 * [--global-configs-file <file>] [--global-config-id <id>]`
 */
export async function buildResolverArgs(input: ResolverArgsInput): Promise<string[]> {
  if (!input.runtimePath) throw new MissingRuntimeError();
  if (!input.artifactPath) throw new MissingArtifactError();

  const cwd = input.cwd ?? process.cwd();
  const quote = (value: string) => quoteArgument(value, input.platform);

  const args = [quote(input.runtimePath), RESOLVER_FLAGS.jar, quote(input.artifactPath)];

  args.push(RESOLVER_FLAGS.outputDir, quote(path.resolve(cwd, input.outputDir)));

  // no local file means the resolver falls back to its defaults
  const localConfig = path.resolve(cwd, input.localConfigPath);
  if (input.localConfigPath && (await fileExists(localConfig))) {
    args.push(RESOLVER_FLAGS.localConfig, quote(localConfig));
  }

  if (input.globalConfigsFile) {
    args.push(RESOLVER_FLAGS.globalConfigsFile, quote(path.resolve(cwd, input.globalConfigsFile)));
  }

  // the command line goes through a shell, so the id is quoted like the paths
  if (input.globalConfigId) {
    args.push(RESOLVER_FLAGS.globalConfigId, quote(input.globalConfigId));
  }

  return args;
}
