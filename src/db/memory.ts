/**
 * In-memory database backend.
 * For testing and development. No persistence.
 */

import { AlreadyExistsError, NotFoundError } from "../errors.js";
import type { MigrationRecord, WorkloadRecord } from "../models/records.js";
import type { MigratorDatabase, ObjectKind, ObjectStore } from "./interface.js";

function createMemoryObjectStore<T>(kind: ObjectKind): ObjectStore<T> {
  const store = new Map<string, T>();

  return {
    create(key, record) {
      if (store.has(key)) throw new AlreadyExistsError(`${kind} ${key} already exists`);
      store.set(key, structuredClone(record));
      return structuredClone(record);
    },
    read(key) {
      const record = store.get(key);
      if (record === undefined) throw new NotFoundError(`${kind} ${key} not found`);
      return structuredClone(record);
    },
    update(key, record) {
      if (!store.has(key)) throw new NotFoundError(`${kind} ${key} not found`);
      store.set(key, structuredClone(record));
      return structuredClone(record);
    },
    delete(key) {
      if (!store.delete(key)) throw new NotFoundError(`${kind} ${key} not found`);
    },
    has(key) {
      return store.has(key);
    },
    listAll() {
      return Array.from(store.values(), (record) => structuredClone(record));
    },
  };
}

export function createMemoryDatabase(): MigratorDatabase {
  return {
    backend: "memory",
    workloads: createMemoryObjectStore<WorkloadRecord>("workload"),
    migrations: createMemoryObjectStore<MigrationRecord>("migration"),
    migrate() {
      // no-op
    },
    close() {
      // no-op
    },
  };
}
