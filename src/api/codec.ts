/**
 * Request body decoding: untrusted JSON in, domain objects out.
 *
 * Shape errors and domain rule violations both surface as
 * InvalidArgumentError, before anything touches the store.
 */

import { InvalidArgumentError } from "../errors.js";
import { Credentials } from "../models/credentials.js";
import { MigrationTarget } from "../models/migration-target.js";
import { MountPoint } from "../models/mount-point.js";
import { Storage } from "../models/storage.js";
import { Workload } from "../models/workload.js";
import {
  expectNumber,
  expectObject,
  expectString,
  readCredentialsRecord,
  readMigrationTargetRecord,
  readMountPointList,
  readStorageRecord,
  readWorkloadRecord,
} from "../models/records.js";
import type { CreateMigrationInput, MigrationPatch } from "../services/migrations.js";
import type { WorkloadPatch } from "../services/workloads.js";

const MS_PER_MINUTE = 60_000;

function mountPoints(value: unknown, field: string): MountPoint[] {
  return readMountPointList(value, field).map((mp) => MountPoint.fromRecord(mp));
}

export function decodeWorkload(body: unknown): Workload {
  return Workload.fromRecord(readWorkloadRecord(body, "workload"));
}

export function decodeWorkloadPatch(body: unknown): WorkloadPatch {
  const obj = expectObject(body, "workload");
  const patch: WorkloadPatch = {};
  if (obj.ip !== undefined) {
    patch.ip = expectString(obj.ip, "workload.ip");
  }
  if (obj.credentials !== undefined) {
    patch.credentials = Credentials.fromRecord(readCredentialsRecord(obj.credentials, "workload.credentials"));
  }
  if (obj.storage !== undefined) {
    patch.storage = Storage.fromRecord(readStorageRecord(obj.storage, "workload.storage"));
  }
  return patch;
}

export function decodeMigration(body: unknown): CreateMigrationInput {
  const obj = expectObject(body, "migration");
  const input: CreateMigrationInput = {
    selectedMountPoints: mountPoints(obj.selected_mount_points, "migration.selected_mount_points"),
    migrationTarget: MigrationTarget.fromRecord(
      readMigrationTargetRecord(obj.migration_target, "migration.migration_target"),
    ),
  };
  if (obj.source !== undefined) {
    input.source = Workload.fromRecord(readWorkloadRecord(obj.source, "migration.source"));
  } else if (obj.source_ip !== undefined) {
    input.sourceIp = expectString(obj.source_ip, "migration.source_ip");
  }
  return input;
}

export function decodeMigrationPatch(body: unknown): MigrationPatch {
  const obj = expectObject(body, "migration");
  if (obj.selected_mount_points === undefined) {
    return {};
  }
  return {
    selectedMountPoints: mountPoints(obj.selected_mount_points, "migration.selected_mount_points"),
  };
}

/**
 * Delay for a start request, in milliseconds. Reads `delay_minutes`
 * (or the older `sleep_minutes`); an empty body or a missing field uses
 * the configured default.
 */
export function decodeStartDelay(body: unknown, defaultMinutes: number): number {
  if (body === undefined || body === null) {
    return Math.round(defaultMinutes * MS_PER_MINUTE);
  }
  const obj = expectObject(body, "start");
  const raw = obj.delay_minutes !== undefined ? obj.delay_minutes : obj.sleep_minutes;
  if (raw === undefined || raw === null) {
    return Math.round(defaultMinutes * MS_PER_MINUTE);
  }
  const minutes = expectNumber(raw, "start.delay_minutes");
  if (minutes < 0) {
    throw new InvalidArgumentError(`start.delay_minutes must not be negative, got ${minutes}`);
  }
  return Math.round(minutes * MS_PER_MINUTE);
}
