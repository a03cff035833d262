/**
 * Migrator configuration resolution.
 * Merges a raw config object with the defaults.
 *
 *   resolveMigratorConfig(raw)  normalize an already-parsed object
 *   loadMigratorConfig()        find and read the config file
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export type DatabaseBackend = "memory" | "file";

const DB_BACKENDS: readonly DatabaseBackend[] = ["memory", "file"];

export interface MigratorConfig {
  /** Directory for the file backend's JSON documents. */
  dataDir: string;
  dbBackend: DatabaseBackend;
  http: {
    host: string;
    port: number;
  };
  /** Simulated transfer time used when a start request names none. */
  defaultDelayMinutes: number;
  logLevel: LogLevel;
}

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return { ...v };
  }
  return {};
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function resolveMigratorConfig(raw?: Record<string, unknown> | null): MigratorConfig {
  const r = raw ?? {};
  const httpRaw = toRecord(r.http);

  const port = httpRaw.port;
  const delay = r.defaultDelayMinutes;

  return {
    dataDir: typeof r.dataDir === "string" && r.dataDir.trim() ? r.dataDir : ".migrator",
    dbBackend: pick(r.dbBackend, DB_BACKENDS, "memory"),
    http: {
      host: typeof httpRaw.host === "string" && httpRaw.host.trim() ? httpRaw.host : "127.0.0.1",
      port: typeof port === "number" && Number.isInteger(port) && port >= 0 && port <= 65535 ? port : 5000,
    },
    defaultDelayMinutes:
      typeof delay === "number" && Number.isFinite(delay) && delay >= 0 ? delay : 0.1,
    logLevel: pick(r.logLevel, LOG_LEVELS, "info"),
  };
}

/**
 * Config file search paths (highest priority first):
 *   1. $MIGRATOR_CONFIG env
 *   2. ./migrator.json (cwd)
 *   3. ~/.migrator/migrator.json
 */
function resolveConfigPath(): string | null {
  if (process.env.MIGRATOR_CONFIG) {
    return process.env.MIGRATOR_CONFIG;
  }
  const cwdPath = path.resolve("migrator.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".migrator", "migrator.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load migrator config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadMigratorConfig(): MigratorConfig {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveMigratorConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid migrator config at ${configPath}: expected a JSON object`);
  }
  return resolveMigratorConfig(toRecord(raw));
}
