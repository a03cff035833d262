/**
 * Migration service: creating, editing, running and inspecting migration jobs.
 *
 * Every request rehydrates its own Migration from the store, so the
 * per-instance run guard alone cannot stop two requests from starting the
 * same id. The service therefore claims an id synchronously before the run
 * begins and releases it when the run settles.
 *
 * Each state change is written through to the store as it happens, so a
 * status read during a run sees "running".
 */

import { InvalidArgumentError, InvalidStateError } from "../errors.js";
import { Migration } from "../models/migration.js";
import { Workload } from "../models/workload.js";
import type { MigrationTarget } from "../models/migration-target.js";
import type { MountPoint } from "../models/mount-point.js";
import type { MigrationState } from "../models/records.js";
import { isTerminalState } from "../models/records.js";
import type { MigratorDatabase } from "../db/interface.js";
import type { Logger } from "../types.js";

export interface CreateMigrationInput {
  selectedMountPoints: readonly MountPoint[];
  migrationTarget: MigrationTarget;
  /** Embedded source machine. Takes precedence over sourceIp. */
  source?: Workload;
  /** IP of a registered workload; its current value is copied into the migration. */
  sourceIp?: string;
}

export interface MigrationPatch {
  selectedMountPoints?: readonly MountPoint[];
}

/** Response to a status query. */
export interface MigrationStatus {
  migration_id: string;
  state: MigrationState;
  finished: boolean;
}

export interface MigrationService {
  create(input: CreateMigrationInput): Migration;
  get(id: string): Migration;
  list(): Migration[];
  update(id: string, patch: MigrationPatch): Migration;
  remove(id: string): void;

  /** Run to completion; resolves with the migration in its terminal state. */
  start(id: string, delayMs: number): Promise<Migration>;

  /**
   * Start without waiting. Returns the migration already in "running";
   * a failure of the run is logged and recorded as state "error".
   */
  startInBackground(id: string, delayMs: number): Migration;

  status(id: string): MigrationStatus;

  /** Ids of migrations currently running in this process. */
  inFlight(): string[];

  /** Wait for every in-flight run to settle. */
  drain(): Promise<void>;

  /**
   * Mark migrations persisted as "running" but not running in this process
   * as "error". Called at startup, after a previous process died mid-run.
   * Returns the ids it changed.
   */
  recoverInterrupted(): string[];
}

export interface MigrationServiceParams {
  db: MigratorDatabase;
  logger: Logger;
}

export function createMigrationService(params: MigrationServiceParams): MigrationService {
  const { db, logger } = params;
  const running = new Map<string, Promise<Migration>>();

  function create(input: CreateMigrationInput): Migration {
    const source = resolveSource(input);
    const migration = new Migration({
      selectedMountPoints: input.selectedMountPoints,
      source,
      migrationTarget: input.migrationTarget,
    });
    db.migrations.create(migration.id, migration.toRecord());
    logger.info(
      `[migrator:migrations] Created migration ${migration.id} for ${source.ip} → ${migration.migrationTarget.cloudType}`,
    );
    return migration;
  }

  function resolveSource(input: CreateMigrationInput): Workload {
    if (input.source) return input.source;
    if (input.sourceIp) return Workload.fromRecord(db.workloads.read(input.sourceIp));
    throw new InvalidArgumentError("A migration needs a source workload or a source_ip");
  }

  function get(id: string): Migration {
    return Migration.fromRecord(db.migrations.read(id));
  }

  function list(): Migration[] {
    return db.migrations.listAll().map((record) => Migration.fromRecord(record));
  }

  function update(id: string, patch: MigrationPatch): Migration {
    assertNotInFlight(id, "modify");
    const migration = get(id);
    if (patch.selectedMountPoints) {
      migration.selectMountPoints(patch.selectedMountPoints);
    }
    db.migrations.update(id, migration.toRecord());
    logger.info(`[migrator:migrations] Updated migration ${id}`);
    return migration;
  }

  function remove(id: string): void {
    assertNotInFlight(id, "delete");
    const migration = get(id);
    if (migration.state === "running") {
      throw new InvalidStateError(`Cannot delete migration ${id} while it is running`);
    }
    db.migrations.delete(id);
    logger.info(`[migrator:migrations] Removed migration ${id}`);
  }

  function assertNotInFlight(id: string, action: string): void {
    if (running.has(id)) {
      throw new InvalidStateError(`Cannot ${action} migration ${id} while it is running`);
    }
  }

  /**
   * Load the migration and register the run. Synchronous from the guard
   * to the registration, so concurrent starts cannot both get here.
   */
  function launch(id: string, delayMs: number): { migration: Migration; done: Promise<Migration> } {
    if (running.has(id)) {
      throw new InvalidStateError(`Migration ${id} is already running`);
    }
    const migration = get(id);
    if (migration.state === "running") {
      throw new InvalidStateError(`Migration ${id} is already running`);
    }
    if (isTerminalState(migration.state)) {
      throw new InvalidStateError(
        `Migration ${id} already finished with state ${migration.state}; create a new migration to retry`,
      );
    }

    const done = execute(migration, delayMs);
    running.set(id, done);
    return { migration, done };
  }

  async function execute(migration: Migration, delayMs: number): Promise<Migration> {
    try {
      await migration.run(delayMs, {
        onTransition: (state, m) => {
          db.migrations.update(m.id, m.toRecord());
          logger.info(`[migrator:migrations] ${m.id}: → ${state}`);
        },
      });
      return migration;
    } finally {
      running.delete(migration.id);
    }
  }

  async function start(id: string, delayMs: number): Promise<Migration> {
    const { done } = launch(id, delayMs);
    return done;
  }

  function startInBackground(id: string, delayMs: number): Migration {
    const { migration, done } = launch(id, delayMs);
    void done.catch((err: unknown) => {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`[migrator:migrations] Background run of ${id} failed: ${msg}`);
    });
    return migration;
  }

  function status(id: string): MigrationStatus {
    const record = db.migrations.read(id);
    return {
      migration_id: id,
      state: record.state,
      finished: isTerminalState(record.state),
    };
  }

  function inFlight(): string[] {
    return Array.from(running.keys());
  }

  async function drain(): Promise<void> {
    await Promise.allSettled(running.values());
  }

  function recoverInterrupted(): string[] {
    const recovered: string[] = [];
    for (const record of db.migrations.listAll()) {
      if (record.state !== "running" || running.has(record.id)) continue;
      db.migrations.update(record.id, { ...record, state: "error" });
      logger.warn(`[migrator:migrations] ${record.id} was interrupted while running; marked as error`);
      recovered.push(record.id);
    }
    return recovered;
  }

  return {
    create,
    get,
    list,
    update,
    remove,
    start,
    startInBackground,
    status,
    inFlight,
    drain,
    recoverInterrupted,
  };
}
