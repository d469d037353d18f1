import type { Writable } from "node:stream";
import type { z } from "zod";
import {
  loadSettings,
  SettingsError,
  type Settings,
} from "../config/settings.js";
import { createRecoveryServices, type RecoveryServices } from "../container.js";
import { CodedError, errorMessage } from "../domain/coded-error.js";
import { SystemCode } from "../domain/error-codes.js";
import { fail, resultExitCode, type CommandResult } from "../domain/result.js";
import { createLogger, type Logger } from "../observability/logger.js";
import { resolveExecutionContext } from "../services/privileged-executor.js";

export type OutputFormat = "text" | "json";

export interface CliRuntime {
  readonly settings: Settings;
  readonly logger: Logger;
  readonly services: RecoveryServices;
}

export interface CliEnvironment {
  /** Builds the runtime on first use so `--help` needs no configuration. */
  readonly runtime: () => CliRuntime;
  readonly stdout: Writable;
}

export function createDefaultEnvironment(): CliEnvironment {
  let cached: CliRuntime | undefined;
  return {
    stdout: process.stdout,
    runtime: () => {
      if (!cached) {
        const settings = loadSettings();
        const logger = createLogger({ component: "pitrctl" }, settings.logLevel);
        const context = resolveExecutionContext({
          nonInteractive: settings.nonInteractive,
        });
        cached = {
          settings,
          logger,
          services: createRecoveryServices(settings, context, logger),
        };
      }
      return cached;
    },
  };
}

export function writeLine(stream: Writable, text: string): void {
  stream.write(`${text}\n`);
}

/**
 * Prints a result and sets the process exit code. JSON mode prints the whole
 * document; text mode prints the message, and the detail on failure.
 */
export function emitResult(
  stdout: Writable,
  result: CommandResult,
  format: OutputFormat,
  text?: string,
): void {
  if (format === "json") {
    writeLine(stdout, JSON.stringify(result, null, 2));
  } else if (result.success) {
    writeLine(stdout, text ?? result.message);
  } else {
    writeLine(stdout, `error ${result.code}: ${result.message}`);
    if (result.detail) {
      writeLine(stdout, result.detail);
    }
  }
  process.exitCode = resultExitCode(result);
}

/** Validates commander's option bag; prints an invalid-arguments failure on error. */
export function parseFlags<T extends z.ZodTypeAny>(
  env: CliEnvironment,
  schema: T,
  raw: unknown,
): z.infer<T> | null {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    emitResult(
      env.stdout,
      fail(
        SystemCode.invalidArgs,
        parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      ),
      "text",
    );
    return null;
  }
  return parsed.data;
}

/** Runs a command body, turning escaped errors into a printed failure. */
export async function runCommand(
  env: CliEnvironment,
  format: OutputFormat,
  body: (runtime: CliRuntime) => Promise<void>,
): Promise<void> {
  try {
    const runtime = env.runtime();
    try {
      await body(runtime);
    } finally {
      await runtime.services.close();
    }
  } catch (error) {
    const code =
      error instanceof CodedError
        ? error.code
        : error instanceof SettingsError
          ? SystemCode.invalidArgs
          : SystemCode.internal;
    emitResult(env.stdout, fail(code, errorMessage(error)), format);
  }
}
