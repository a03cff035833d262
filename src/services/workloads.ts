/**
 * Workload service: registration of source machines.
 *
 * Enforces IP uniqueness before delegating to the store, and keeps the IP
 * of a registered workload fixed on update.
 */

import { DuplicateKeyError } from "../errors.js";
import { Credentials } from "../models/credentials.js";
import { Storage } from "../models/storage.js";
import { Workload } from "../models/workload.js";
import type { MigratorDatabase } from "../db/interface.js";
import type { Logger } from "../types.js";

/** Fields an update may carry. Omitted fields keep their value. */
export interface WorkloadPatch {
  /** Must equal the current IP; anything else is a reassignment attempt. */
  ip?: string;
  credentials?: Credentials;
  /** Replaces the whole storage. */
  storage?: Storage;
}

export interface WorkloadService {
  create(workload: Workload): Workload;
  get(ip: string): Workload;
  list(): Workload[];
  update(ip: string, patch: WorkloadPatch): Workload;
  remove(ip: string): void;
}

export interface WorkloadServiceParams {
  db: MigratorDatabase;
  logger: Logger;
}

export function createWorkloadService(params: WorkloadServiceParams): WorkloadService {
  const { db, logger } = params;

  function create(workload: Workload): Workload {
    if (db.workloads.has(workload.ip)) {
      throw new DuplicateKeyError(`Workload with IP ${workload.ip} already exists`);
    }
    const stored = db.workloads.create(workload.ip, workload.toRecord());
    logger.info(`[migrator:workloads] Registered workload ${workload.ip}`);
    return Workload.fromRecord(stored);
  }

  function get(ip: string): Workload {
    return Workload.fromRecord(db.workloads.read(ip));
  }

  function list(): Workload[] {
    return db.workloads.listAll().map((record) => Workload.fromRecord(record));
  }

  function update(ip: string, patch: WorkloadPatch): Workload {
    const workload = get(ip);

    if (patch.ip !== undefined && patch.ip !== workload.ip) {
      // The setter rejects with InvalidStateError.
      workload.ip = patch.ip;
    }
    if (patch.credentials) {
      workload.credentials = patch.credentials;
    }
    if (patch.storage) {
      workload.storage = patch.storage;
    }

    const stored = db.workloads.update(ip, workload.toRecord());
    logger.info(`[migrator:workloads] Updated workload ${ip}`);
    return Workload.fromRecord(stored);
  }

  function remove(ip: string): void {
    db.workloads.delete(ip);
    logger.info(`[migrator:workloads] Removed workload ${ip}`);
  }

  return { create, get, list, update, remove };
}
