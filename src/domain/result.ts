import { CodedError, errorMessage } from "./coded-error.js";
import { exitCodeOf, SystemCode } from "./error-codes.js";

export interface CommandResult<T = unknown> {
  readonly success: boolean;
  readonly code: number;
  readonly message: string;
  readonly detail?: string;
  readonly data?: T;
}

export function ok<T>(message: string, data?: T): CommandResult<T> {
  return {
    success: true,
    code: 0,
    message,
    ...(data === undefined ? {} : { data }),
  };
}

export function fail<T = never>(
  code: number,
  message: string,
  detail?: string,
): CommandResult<T> {
  return {
    success: false,
    code,
    message,
    ...(detail ? { detail } : {}),
  };
}

export function failFromError<T = never>(
  error: unknown,
  fallbackCode: number = SystemCode.internal,
): CommandResult<T> {
  if (error instanceof CodedError) {
    return fail(error.code, error.message, error.detail);
  }
  return fail(fallbackCode, errorMessage(error));
}

export function resultExitCode(result: CommandResult): number {
  return exitCodeOf(result.code);
}
