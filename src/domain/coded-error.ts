import type { CommandInvocation, CommandOutcome } from "../ports/command-runner.js";

export class CodedError extends Error {
  readonly code: number;
  readonly detail?: string;

  constructor(
    code: number,
    message: string,
    options: { readonly detail?: string; readonly cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CodedError";
    this.code = code;
    this.detail = options.detail;
  }
}

export class PitrError extends CodedError {
  constructor(
    code: number,
    message: string,
    options: { readonly detail?: string; readonly cause?: unknown } = {},
  ) {
    super(code, message, options);
    this.name = "PitrError";
  }
}

export class BackupError extends CodedError {
  constructor(
    code: number,
    message: string,
    options: { readonly detail?: string; readonly cause?: unknown } = {},
  ) {
    super(code, message, options);
    this.name = "BackupError";
  }
}

export class CommandFailedError extends Error {
  constructor(
    readonly invocation: CommandInvocation,
    readonly outcome: CommandOutcome,
  ) {
    const output = combinedOutput(outcome);
    super(
      `${invocation.command} exited with code ${outcome.exitCode}${output ? `: ${output}` : ""}`,
    );
    this.name = "CommandFailedError";
  }
}

export function combinedOutput(outcome: CommandOutcome): string {
  return [outcome.stdout, outcome.stderr]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join("\n");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
