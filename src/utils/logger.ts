/**
 * Levelled console logger with structured context.
 * The threshold comes from GARDEN_LOG_LEVEL (debug | info | warn | error), default warn.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  plant?: string;
  unit?: string;
  date?: string;
  path?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(logLevels, value);
}

export function currentLogLevel(): LogLevel {
  const raw = (process.env.GARDEN_LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
}

function shouldLog(level: LogLevel): boolean {
  return logLevels[level] >= logLevels[currentLogLevel()];
}

function formatMessage(level: LogLevel, message: string, context?: LogContext): unknown[] {
  const prefix = `[${level.toUpperCase()}]`;
  if (context && Object.keys(context).length > 0) {
    return [`${prefix} ${message}`, safeStringify(context)];
  }
  return [prefix, message];
}

function safeStringify(context: LogContext): string {
  try {
    return JSON.stringify(context);
  } catch (err) {
    const fallbackMessage = err instanceof Error ? err.message : "Unable to serialize context";
    return JSON.stringify({
      serializationError: fallbackMessage,
      contextKeys: Object.keys(context),
    });
  }
}

function writeToConsole(level: LogLevel, args: unknown[]): void {
  switch (level) {
    case "warn":
      console.warn(...args);
      break;
    case "error":
      console.error(...args);
      break;
    default:
      console.log(...args);
  }
}

function logWithLevel(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;
  writeToConsole(level, formatMessage(level, message, context));
}

export function debug(message: string, context?: LogContext): void {
  logWithLevel("debug", message, context);
}

export function info(message: string, context?: LogContext): void {
  logWithLevel("info", message, context);
}

export function warn(message: string, context?: LogContext): void {
  logWithLevel("warn", message, context);
}

export function error(message: string, context?: LogContext, err?: unknown): void {
  const errorDetails: LogContext =
    err instanceof Error
      ? { errorMessage: err.message, errorName: err.name }
      : err !== undefined
        ? { error: String(err) }
        : {};
  logWithLevel("error", message, { ...context, ...errorDetails });
}

export const logger = {
  debug,
  info,
  warn,
  error,
};
