import type { DebugLogger } from "../debug-logger.js";
import { createNoopLogger } from "../debug-logger.js";
import { runCommand, type CommandRunner } from "../process.js";

export interface ResolverInvocation {
  // full command line: runtime first, already quoted for the shell
  args: readonly string[];
  outputDir: string;
  cwd: string;
}

export interface ResolverRunResult {
  exitCode: number;
}

/**
 * The external merge program. Implementations write their outputs into
 * `invocation.outputDir` and report an exit code; 0 means success.
 */
export interface ConfigResolver {
  resolve(invocation: ResolverInvocation): Promise<ResolverRunResult>;
}

export class ProcessConfigResolver implements ConfigResolver {
  constructor(
    private readonly logger: DebugLogger = createNoopLogger(),
    private readonly run: CommandRunner = runCommand,
  ) {}

  async resolve(invocation: ResolverInvocation): Promise<ResolverRunResult> {
    const commandLine = invocation.args.join(" ");
    this.logger.log("resolver", "executing resolver", { command: commandLine, cwd: invocation.cwd });

    const result = await this.run(commandLine, [], { cwd: invocation.cwd, shell: true });

    if (result.stdout) this.logger.log("resolver", "stdout", { output: result.stdout });
    if (result.stderr) this.logger.log("resolver", "stderr", { output: result.stderr });

    // a launch failure that still reports 0 is not a success
    const exitCode = result.failed && result.exitCode === 0 ? 1 : result.exitCode;
    this.logger.log("resolver", "resolver finished", { exitCode });
    return { exitCode };
  }
}
