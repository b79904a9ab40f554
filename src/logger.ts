import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type Level, type Logger, type StreamEntry } from "pino";

/**
 * Logging capability handed to the sync components.
 * Any pino logger (or child) satisfies it.
 */
export type SyncLogger = Pick<Logger, "info" | "warn" | "error" | "debug">;

export type LogLevel = Level | "silent";

export interface LogSettings {
  level: LogLevel;
  /** Also append JSON lines to this file */
  file?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return value === "silent" || Object.hasOwn(pino.levels.values, value);
}

/**
 * LOG_LEVEL from the environment; unknown names fall back to "info".
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase() ?? "";
  return isLogLevel(level) ? level : "info";
}

export function createLogger(settings: LogSettings): Logger {
  const { level, file } = settings;
  if (file === undefined || file === "") {
    return pino({ level });
  }

  const logDir = dirname(file);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // stdout and file; multistream needs a concrete level per stream
  const streamLevel: Level = level === "silent" ? "fatal" : level;
  const streams: StreamEntry[] = [
    { level: streamLevel, stream: process.stdout },
    { level: streamLevel, stream: pino.destination({ dest: file, sync: false }) },
  ];

  return pino({ level }, pino.multistream(streams));
}

const settings: LogSettings = {
  level: resolveLogLevel(process.env.LOG_LEVEL),
  file: process.env.LOG_FILE,
};

export const logger = createLogger(settings);

// Child loggers for different modules
export const apiLogger = logger.child({ module: "directory-api" });
export const identityLogger = logger.child({ module: "identity" });
export const dbLogger = logger.child({ module: "database" });
export const syncLogger = logger.child({ module: "sync" });

if (settings.file !== undefined && settings.file !== "") {
  logger.info(
    { logFile: settings.file, logLevel: settings.level },
    "Logging to file enabled"
  );
}
