#!/usr/bin/env node
import { program } from "commander";

import { readPackageVersion } from "../core/paths.js";

import type { HistoryOptions, ResolveOptions, RevisionsOptions, VcsInfoOptions } from "../types/index.js";

const version = await readPackageVersion();

program
  .name("lintweave")
  .description("Resolve layered analysis configuration and replay it across git revisions")
  .version(version);

program
  .command("resolve [path]")
  .description("Build the effective configuration for the project and verify its layers")
  .option("-c, --config <file>", "Local configuration file (default: qodana.yaml in the project)")
  .option("--global-configs-file <file>", "File listing global configurations")
  .option("--global-config-id <id>", "Global configuration to apply from the global configs file")
  .option("--runtime <path>", "Runtime launcher for the resolver (default: $JAVA_HOME/bin/java)")
  .option("--system-dir <dir>", "Scratch directory for the resolver and its output")
  .option("-f, --format <format>", "Output format (human|json)", "human")
  .option("--debug", "Write a debug log to <system-dir>/log")
  .action(async (projectPath: string | undefined, options: ResolveOptions) => {
    const { resolveCommand } = await import("../commands/resolve.js");
    const exitCode = await resolveCommand(projectPath, options);
    process.exit(exitCode);
  });

program
  .command("history [path]")
  .description("Resolve the configuration at past revisions, restoring the working tree afterwards")
  .option("--full-history", "Walk every commit, oldest first (from --commit when given)")
  .option("--commit <rev>", "Soft-reset to this commit and resolve once; with --full-history, start the walk here")
  .option("--until <rev>", "Last commit of a --full-history walk")
  .option("--run <command>", "Analysis command to run after each successful resolution")
  .option("-c, --config <file>", "Local configuration file (default: qodana.yaml in the project)")
  .option("--global-configs-file <file>", "File listing global configurations")
  .option("--global-config-id <id>", "Global configuration to apply from the global configs file")
  .option("--runtime <path>", "Runtime launcher for the resolver (default: $JAVA_HOME/bin/java)")
  .option("--system-dir <dir>", "Scratch directory for the resolver and its output")
  .option("-f, --format <format>", "Output format (human|json)", "human")
  .option("--debug", "Write a debug log to <system-dir>/log")
  .action(async (projectPath: string | undefined, options: HistoryOptions) => {
    const { historyCommand } = await import("../commands/history.js");
    const exitCode = await historyCommand(projectPath, options);
    process.exit(exitCode);
  });

program
  .command("revisions [path]")
  .description("List commits oldest first")
  .option("-n, --limit <count>", "Only the most recent <count> commits")
  .option("-f, --format <format>", "Output format (human|json)", "human")
  .action(async (projectPath: string | undefined, options: RevisionsOptions) => {
    const { revisionsCommand } = await import("../commands/revisions.js");
    const exitCode = await revisionsCommand(projectPath, options);
    process.exit(exitCode);
  });

program
  .command("vcs-info [path]")
  .description("Show repository root, origin, branch and HEAD")
  .option("-f, --format <format>", "Output format (human|json)", "human")
  .action(async (projectPath: string | undefined, options: VcsInfoOptions) => {
    const { vcsInfoCommand } = await import("../commands/vcs-info.js");
    const exitCode = await vcsInfoCommand(projectPath, options);
    process.exit(exitCode);
  });

program.parse();
