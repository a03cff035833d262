/**
 * Workload migrator public API.
 */

export * from "./models/index.js";
export * from "./errors.js";
export type { Logger } from "./types.js";
export { createMigratorLogger, LOG_LEVELS, isLogLevel } from "./logger.js";
export type { LogLevel, MigratorLoggerOptions } from "./logger.js";
export { loadMigratorConfig, resolveMigratorConfig } from "./config.js";
export type { MigratorConfig, DatabaseBackend } from "./config.js";
export { createDatabase, createMemoryDatabase, createFileDatabase } from "./db/index.js";
export type { MigratorDatabase, ObjectStore, ObjectKind } from "./db/index.js";
export * from "./services/index.js";
export { createApiHandler } from "./api/routes.js";
export type { ApiContext } from "./api/routes.js";
export { startMigratorHttpServer, stopMigratorHttpServer, readJsonBody } from "./server.js";
export { startMigrator } from "./standalone.js";
export type { MigratorInstance, StartMigratorOptions } from "./standalone.js";
