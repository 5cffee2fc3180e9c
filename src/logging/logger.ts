export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(event: string, context?: LogContext): void;
  info(event: string, context?: LogContext): void;
  warn(event: string, context?: LogContext): void;
  error(event: string, context?: LogContext): void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...("code" in error ? { code: error.code } : {}),
    };
  }
  return { message: String(error) };
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return serializeError(value);
  }
  return value;
}

/** Render one log line. Exposed for tests and for hosts that ship lines elsewhere. */
export function formatLogLine(level: LogLevel, event: string, context: LogContext = {}): string {
  return JSON.stringify({ ts: new Date().toISOString(), level, event, ...context }, jsonReplacer);
}

export function createLogger(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const write = (entryLevel: LogLevel, event: string, context?: LogContext) => {
    if (LOG_LEVEL_ORDER[entryLevel] < LOG_LEVEL_ORDER[level]) {
      return;
    }
    const line = formatLogLine(entryLevel, event, context);
    // JSON line for log collectors
    if (entryLevel === "warn" || entryLevel === "error") {
      process.stderr.write(`${line}\n`);
      return;
    }
    process.stdout.write(`${line}\n`);
  };

  return {
    debug: (event, context) => write("debug", event, context),
    info: (event, context) => write("info", event, context),
    warn: (event, context) => write("warn", event, context),
    error: (event, context) => write("error", event, context),
  };
}

export const logger: Logger = createLogger();
