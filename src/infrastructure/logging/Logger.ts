import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerSettings {
  level: LogThreshold;
  /** JSON-lines file every entry is appended to; undefined keeps logs on the console only. */
  file: string | undefined;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_RANK;
}

function thresholdFromEnv(): LogThreshold {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isThreshold(raw) ? raw : "info";
}

const settings: LoggerSettings = {
  level: thresholdFromEnv(),
  file: undefined,
};

/**
 * Applies the logging configuration loaded at startup. Until this is called
 * entries go to the console only, at the LOG_LEVEL found in the environment.
 */
export function configureLogger(next: Partial<LoggerSettings>): void {
  if (next.level !== undefined) {
    settings.level = next.level;
  }
  if ("file" in next) {
    settings.file = next.file ? path.resolve(next.file) : undefined;
  }
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[settings.level];
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (level === "error") {
    console.error(entry);
  } else {
    console.log(entry);
  }

  if (!settings.file) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(settings.file), { recursive: true });
    fs.appendFileSync(settings.file, JSON.stringify(entry) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("Failed to write log file:", err);
  }
}

/**
 * Structured logger.
 *
 * - log(): `{ timestamp, level, message, ...meta }`
 * - event(): `{ timestamp, type, ...payload }`, written at info level.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!enabled(level)) {
      return;
    }

    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    if (!enabled("info")) {
      return;
    }

    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}
