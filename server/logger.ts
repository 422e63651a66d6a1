import { LOG_LEVELS, type LogLevel } from "./src/config/env";

type LogMeta = Record<string, unknown>;

// Read on every call so LOG_LEVEL can change without restarting
function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel());
}

function format(message: string, source: string, meta?: LogMeta): string {
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${source}] ${message}${suffix}`;
}

export function log(message: string, source = "app", meta?: LogMeta): void {
  if (enabled("info")) console.log(format(message, source, meta));
}

export function logDebug(message: string, source = "app", meta?: LogMeta): void {
  if (enabled("debug")) console.debug(format(message, source, meta));
}

export function logWarn(message: string, source = "app", meta?: LogMeta): void {
  if (enabled("warn")) console.warn(format(message, source, meta));
}

export function logError(message: string, source = "app", error?: unknown, meta?: LogMeta): void {
  if (!enabled("error")) return;
  const details: LogMeta = { ...meta };
  if (error instanceof Error) {
    details.error = error.message;
  } else if (error !== undefined) {
    details.error = String(error);
  }
  console.error(format(message, source, details));
}
