/**
 * Database interface: backend-agnostic storage abstraction.
 *
 * All persistence goes through this interface. Implementations:
 * - In-memory (testing, default)
 * - File (one JSON document per object)
 */

import type { MigrationRecord, WorkloadRecord } from "../models/records.js";

/**
 * Key-addressed store for one object type.
 *
 * Records go in and come out as copies; mutating a returned record never
 * changes what is stored.
 */
export interface ObjectStore<T> {
  /** Throws AlreadyExistsError when the key is present. */
  create(key: string, record: T): T;
  /** Throws NotFoundError when the key is absent. */
  read(key: string): T;
  /** Throws NotFoundError when the key is absent. */
  update(key: string, record: T): T;
  /** Throws NotFoundError when the key is absent. */
  delete(key: string): void;
  has(key: string): boolean;
  /** Every record. Memory keeps insertion order; the file backend sorts by key. */
  listAll(): T[];
}

/** Object kinds and the natural key each is stored under. */
export type ObjectKind = "workload" | "migration";

export interface MigratorDatabase {
  readonly backend: string; // "memory" | "file"

  /** Keyed by IP. */
  workloads: ObjectStore<WorkloadRecord>;
  /** Keyed by migration id. */
  migrations: ObjectStore<MigrationRecord>;

  /** Prepare the backend (create tables / directories). Idempotent. */
  migrate(): void;

  /** Graceful shutdown (close connections, flush buffers). */
  close(): void;
}
