import * as path from "node:path";

import type { ResolveOptions } from "../types/index.js";
import { createLogger, type DebugLogger } from "./debug-logger.js";
import {
  ProcessConfigResolver,
  ResolverArtifactProvisioner,
  fileArtifactSource,
  type ArtifactSource,
  type ConfigResolver,
  type ResolveDeps,
  type ResolveEffectiveConfigInput,
} from "./effective-config/index.js";
import { GitClient } from "./git.js";
import { createConsoleMessages, type MessageSink } from "./messages.js";
import { runCommand, type CommandRunner } from "./process.js";
import { loadSettings, type LintweaveSettings } from "./settings.js";

/**
 * Collaborators a command can be handed instead of the real ones.
 */
export interface CommandDeps {
  messages?: MessageSink;
  resolver?: ConfigResolver;
  artifactSource?: ArtifactSource;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

export interface CommandContext {
  settings: LintweaveSettings;
  logger: DebugLogger;
  messages: MessageSink;
  runner: CommandRunner;
  git: GitClient;
  resolveDeps: ResolveDeps;
}

export function loadCommandSettings(
  projectDir: string,
  options: ResolveOptions,
  deps: CommandDeps = {},
): LintweaveSettings {
  return loadSettings({
    projectDir,
    env: deps.env,
    platform: deps.platform,
    overrides: {
      runtimePath: options.runtime,
      systemDir: options.systemDir ? path.resolve(options.systemDir) : undefined,
      debug: options.debug,
    },
  });
}

export function createCommandContext(settings: LintweaveSettings, deps: CommandDeps = {}): CommandContext {
  const logger = createLogger(settings.logDir, settings.debug, settings.debugCategories);
  const messages = deps.messages ?? createConsoleMessages();
  const runner = deps.runner ?? runCommand;

  return {
    settings,
    logger,
    messages,
    runner,
    git: new GitClient(logger, runner),
    resolveDeps: {
      resolver: deps.resolver ?? new ProcessConfigResolver(logger, runner),
      provisioner: new ResolverArtifactProvisioner(
        deps.artifactSource ?? fileArtifactSource(settings.resolverArtifact),
        messages,
        logger,
      ),
      messages,
      logger,
      platform: deps.platform,
    },
  };
}

export function toResolveInput(
  projectDir: string,
  options: ResolveOptions,
  settings: LintweaveSettings,
): ResolveEffectiveConfigInput {
  return {
    projectDir,
    localConfigPath: options.config,
    globalConfigsFile: options.globalConfigsFile,
    globalConfigId: options.globalConfigId,
    runtimePath: settings.runtimePath,
    systemDir: settings.systemDir,
    effectiveConfigDirName: settings.effectiveConfigDirName,
  };
}
