export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  readonly component?: string;
  readonly runId?: string;
  readonly phase?: string;
  readonly dataDir?: string;
  readonly dbsu?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  child(context: LogContext): Logger;
  debug(message: string, fields?: LogContext): void;
  info(message: string, fields?: LogContext): void;
  warn(message: string, fields?: LogContext): void;
  error(message: string, fields?: LogContext): void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Records go to stderr; stdout carries command results.
export function createLogger(
  context: LogContext = {},
  minLevel: LogLevel = "info",
): Logger {
  const emit = (level: LogLevel, message: string, fields?: LogContext): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    writeLog(level, message, context, fields);
  };

  return {
    child(childContext: LogContext): Logger {
      return createLogger(
        {
          ...context,
          ...compact(childContext),
        },
        minLevel,
      );
    },
    debug(message: string, fields?: LogContext): void {
      emit("debug", message, fields);
    },
    info(message: string, fields?: LogContext): void {
      emit("info", message, fields);
    },
    warn(message: string, fields?: LogContext): void {
      emit("warn", message, fields);
    },
    error(message: string, fields?: LogContext): void {
      emit("error", message, fields);
    },
  };
}

export const silentLogger: Logger = {
  child: () => silentLogger,
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function writeLog(
  level: LogLevel,
  message: string,
  context: LogContext,
  fields?: LogContext,
): void {
  const record = {
    ts: new Date().toISOString(),
    level,
    message,
    ...compact(context),
    ...compact(fields),
  };

  const serialized = JSON.stringify(record);
  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.error(serialized);
}

function compact(input: LogContext | undefined): LogContext {
  if (!input) {
    return {};
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
