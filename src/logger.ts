/**
 * Migrator logger.
 *
 * Winston behind the Logger interface, so components (and tests) only see
 * info/warn/error/debug. warn and error go to stderr, the rest to stdout.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Accepted levels, most verbose first. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

export function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some((level) => level === v);
}

export interface MigratorLoggerOptions {
  /** Tag in front of the level on every line. Default: "migrator". */
  prefix?: string;
  level?: LogLevel;
}

const STDERR_LEVELS: LogLevel[] = ["warn", "error"];

/** Lines read `<timestamp> [<prefix>:<level>] <message>`. */
export function createMigratorLogger(opts: MigratorLoggerOptions = {}): Logger {
  const { prefix = "migrator", level = "info" } = opts;

  const line = winston.format.printf(({ timestamp, level: lvl, message }) =>
    `${String(timestamp)} [${prefix}:${lvl}] ${String(message)}`
  );

  const out = winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      line,
    ),
    transports: [
      new winston.transports.Console({ forceConsole: true, stderrLevels: STDERR_LEVELS }),
    ],
  });

  return {
    info: (msg) => out.info(msg),
    warn: (msg) => out.warn(msg),
    error: (msg) => out.error(msg),
    debug: (msg) => out.debug(msg),
  };
}
