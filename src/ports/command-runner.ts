export interface CommandInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

export interface CommandOutcome {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface RunCommandOptions {
  readonly timeoutMs?: number;
}

/**
 * Runs a process to completion. A non-zero exit is reported through
 * `exitCode`; only a failure to launch the process rejects.
 */
export interface CommandRunner {
  run(
    invocation: CommandInvocation,
    options?: RunCommandOptions,
  ): Promise<CommandOutcome>;
}
