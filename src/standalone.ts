/**
 * Migrator runtime.
 *
 * Wires config, logger, database, services and the HTTP server together.
 *
 * Usage:
 *   import { startMigrator } from "./standalone.js";
 *   const instance = await startMigrator();          // load config from file
 *   const instance = await startMigrator(config);    // explicit config
 *   await instance.stop();
 */

import type { Server } from "node:http";
import { createApiHandler } from "./api/routes.js";
import { loadMigratorConfig, type MigratorConfig } from "./config.js";
import { createDatabase } from "./db/index.js";
import type { MigratorDatabase } from "./db/interface.js";
import { createMigratorLogger } from "./logger.js";
import { startMigratorHttpServer, stopMigratorHttpServer } from "./server.js";
import { createMigrationService, type MigrationService } from "./services/migrations.js";
import { createWorkloadService, type WorkloadService } from "./services/workloads.js";
import type { Logger } from "./types.js";

export interface MigratorInstance {
  config: MigratorConfig;
  logger: Logger;
  db: MigratorDatabase;
  workloads: WorkloadService;
  migrations: MigrationService;
  server: Server;
  /** Port the server is bound to (differs from config when it asked for 0). */
  port: number;
  /** Stop accepting requests, let running migrations finish, close the database. */
  stop(): Promise<void>;
}

export interface StartMigratorOptions {
  /** Replaces the winston console logger. */
  logger?: Logger;
}

export async function startMigrator(
  config: MigratorConfig = loadMigratorConfig(),
  opts: StartMigratorOptions = {},
): Promise<MigratorInstance> {
  const logger = opts.logger ?? createMigratorLogger({ level: config.logLevel });

  const db = createDatabase(config);
  db.migrate();
  logger.info(`[migrator] Database backend: ${db.backend}`);

  const workloads = createWorkloadService({ db, logger });
  const migrations = createMigrationService({ db, logger });
  migrations.recoverInterrupted();

  const handler = createApiHandler({
    workloads,
    migrations,
    logger,
    defaultDelayMinutes: config.defaultDelayMinutes,
  });

  let server: Server;
  try {
    server = await startMigratorHttpServer(handler, {
      port: config.http.port,
      host: config.http.host,
      logger,
    });
  } catch (err) {
    db.close();
    throw err;
  }

  const addr = server.address();
  const port = addr && typeof addr !== "string" ? addr.port : config.http.port;

  async function stop(): Promise<void> {
    const closing = stopMigratorHttpServer(server);
    const pending = migrations.inFlight();
    if (pending.length > 0) {
      logger.info(`[migrator] Waiting for ${pending.length} running migration(s)`);
    }
    await migrations.drain();
    await closing;
    db.close();
    logger.info("[migrator] Stopped");
  }

  return { config, logger, db, workloads, migrations, server, port, stop };
}
