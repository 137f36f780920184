/**
 * Leveled console logger for the backend processes.
 *
 * LOG_LEVEL picks the lowest level that is written (default "info"). Without
 * an explicit level it is read on every call, so a `.env` loaded after import
 * still applies.
 * Errors passed to `error` are also reported to Sentry; without
 * SENTRY_DSN the Sentry client is not initialized and the capture is a no-op.
 */
import * as Sentry from "@sentry/node";

import { readEnv } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** What services accept; `console` satisfies it. */
export type ServiceLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
};

export type Logger = ServiceLogger & {
  debug: (message: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
};

export const resolveLogLevel = (raw: string | undefined): LogLevel => {
  const normalized = (raw ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
};

const formatLine = (level: LogLevel, message: string): string => {
  return `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
};

export const createLogger = (fixedLevel?: LogLevel): Logger => {
  const shouldLog = (level: LogLevel): boolean => {
    const threshold = fixedLevel ?? resolveLogLevel(readEnv("LOG_LEVEL"));
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  };

  return {
    debug(message: string): void {
      if (shouldLog("debug")) {
        console.debug(formatLine("debug", message));
      }
    },

    info(message: string): void {
      if (shouldLog("info")) {
        console.log(formatLine("info", message));
      }
    },

    warn(message: string): void {
      if (shouldLog("warn")) {
        console.warn(formatLine("warn", message));
      }
    },

    error(message: string, error?: unknown): void {
      if (error !== undefined) {
        Sentry.captureException(error);
      }

      if (!shouldLog("error")) {
        return;
      }

      if (error === undefined) {
        console.error(formatLine("error", message));
        return;
      }

      console.error(formatLine("error", message), error);
    },
  };
};

export const logger = createLogger();
