import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type {
  CommandInvocation,
  CommandOutcome,
  CommandRunner,
  RunCommandOptions,
} from "../ports/command-runner.js";

const execFileAsync = promisify(execFile);

interface ExitedProcessError {
  readonly code: number;
  readonly stdout?: unknown;
  readonly stderr?: unknown;
}

// execFile rejects with the exit code as a number when the process ran,
// and with an errno string such as ENOENT when it could not be spawned.
function isExitedProcessError(error: unknown): error is ExitedProcessError {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "number"
  );
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export interface ExecFileCommandRunnerOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly maxBuffer?: number;
}

export class ExecFileCommandRunner implements CommandRunner {
  constructor(private readonly options: ExecFileCommandRunnerOptions = {}) {}

  async run(
    invocation: CommandInvocation,
    options?: RunCommandOptions,
  ): Promise<CommandOutcome> {
    try {
      const { stdout, stderr } = await execFileAsync(
        invocation.command,
        [...invocation.args],
        {
          encoding: "utf8",
          maxBuffer: this.options.maxBuffer ?? 10 * 1024 * 1024,
          timeout: options?.timeoutMs ?? 0,
          env: this.options.env ?? process.env,
        },
      );
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (isExitedProcessError(error)) {
        return {
          exitCode: error.code,
          stdout: asText(error.stdout),
          stderr: asText(error.stderr),
        };
      }
      throw error;
    }
  }
}
