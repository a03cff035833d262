/**
 * Structured (JSON) representation of every entity, and the parse-or-fail
 * readers that turn untrusted input into those shapes.
 *
 * Readers only check shape. Value rules (non-empty names, sizes, the boot
 * volume) belong to the domain constructors.
 */

import { InvalidArgumentError } from "../errors.js";

// --- Enumerations ---

export type CloudType = "aws" | "azure" | "vsphere" | "vcloud";

/** All cloud types as a readonly array for runtime validation. */
export const CLOUD_TYPES: readonly CloudType[] = ["aws", "azure", "vsphere", "vcloud"] as const;

const VALID_CLOUD_TYPES = new Set<string>(CLOUD_TYPES);

/** Runtime check for CloudType. */
export function isCloudType(v: unknown): v is CloudType {
  return typeof v === "string" && VALID_CLOUD_TYPES.has(v);
}

/**
 * Normalize a free-form cloud type (case-insensitive, surrounding
 * whitespace ignored). Fails with InvalidArgumentError on anything else.
 */
export function parseCloudType(value: unknown): CloudType {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : value;
  if (!isCloudType(normalized)) {
    throw new InvalidArgumentError(
      `Invalid cloud type: ${String(value)} (expected one of ${CLOUD_TYPES.join(", ")})`,
    );
  }
  return normalized;
}

/** Migration states. Terminal states: success, error. */
export type MigrationState = "not_started" | "running" | "error" | "success";

export const MIGRATION_STATES: readonly MigrationState[] = [
  "not_started",
  "running",
  "error",
  "success",
] as const;

const VALID_STATES = new Set<string>(MIGRATION_STATES);

/** Runtime check for MigrationState. */
export function isMigrationState(v: unknown): v is MigrationState {
  return typeof v === "string" && VALID_STATES.has(v);
}

/** Terminal migration states. No transition leaves them. */
export const TERMINAL_STATES: ReadonlySet<MigrationState> = new Set<MigrationState>([
  "success",
  "error",
]);

export function isTerminalState(state: MigrationState): boolean {
  return TERMINAL_STATES.has(state);
}

// --- Records ---

export interface CredentialsRecord {
  username: string;
  password: string;
  domain: string;
}

export interface MountPointRecord {
  name: string;
  total_size: number;
}

export interface StorageRecord {
  mount_points: MountPointRecord[];
}

export interface WorkloadRecord {
  ip: string;
  credentials: CredentialsRecord;
  storage: StorageRecord;
}

export interface MigrationTargetRecord {
  cloud_type: CloudType;
  cloud_credentials: CredentialsRecord;
  target_vm: WorkloadRecord;
}

export interface MigrationRecord {
  id: string;
  selected_mount_points: MountPointRecord[];
  source: WorkloadRecord;
  migration_target: MigrationTargetRecord;
  state: MigrationState;
  created_at: string;
}

// --- Shape helpers ---

/** Narrow a value to a string-keyed object or fail. */
export function expectObject(value: unknown, field: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidArgumentError(`${field} must be an object`);
  }
  return { ...value };
}

export function expectString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`${field} must be a string`);
  }
  return value;
}

export function expectNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidArgumentError(`${field} must be a number`);
  }
  return value;
}

export function expectArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(`${field} must be an array`);
  }
  return value;
}

// --- Readers ---

export function readCredentialsRecord(value: unknown, field = "credentials"): CredentialsRecord {
  const obj = expectObject(value, field);
  return {
    username: expectString(obj.username, `${field}.username`),
    password: expectString(obj.password, `${field}.password`),
    // domain is optional on input and defaults to empty
    domain: obj.domain === undefined || obj.domain === null ? "" : expectString(obj.domain, `${field}.domain`),
  };
}

/** Accepts the legacy `mount_point_name` key as well as `name`. */
export function readMountPointRecord(value: unknown, field = "mount_point"): MountPointRecord {
  const obj = expectObject(value, field);
  const rawName = obj.name !== undefined ? obj.name : obj.mount_point_name;
  return {
    name: expectString(rawName, `${field}.name`),
    total_size: expectNumber(obj.total_size, `${field}.total_size`),
  };
}

export function readMountPointList(value: unknown, field: string): MountPointRecord[] {
  return expectArray(value, field).map((mp, i) => readMountPointRecord(mp, `${field}[${i}]`));
}

/** A missing storage block reads as empty storage. */
export function readStorageRecord(value: unknown, field = "storage"): StorageRecord {
  if (value === undefined || value === null) {
    return { mount_points: [] };
  }
  const obj = expectObject(value, field);
  if (obj.mount_points === undefined) {
    return { mount_points: [] };
  }
  return { mount_points: readMountPointList(obj.mount_points, `${field}.mount_points`) };
}

export function readWorkloadRecord(value: unknown, field = "workload"): WorkloadRecord {
  const obj = expectObject(value, field);
  return {
    ip: expectString(obj.ip, `${field}.ip`),
    credentials: readCredentialsRecord(obj.credentials, `${field}.credentials`),
    storage: readStorageRecord(obj.storage, `${field}.storage`),
  };
}

export function readMigrationTargetRecord(value: unknown, field = "migration_target"): MigrationTargetRecord {
  const obj = expectObject(value, field);
  return {
    cloud_type: parseCloudType(obj.cloud_type),
    cloud_credentials: readCredentialsRecord(obj.cloud_credentials, `${field}.cloud_credentials`),
    target_vm: readWorkloadRecord(obj.target_vm, `${field}.target_vm`),
  };
}

export function readMigrationRecord(value: unknown, field = "migration"): MigrationRecord {
  const obj = expectObject(value, field);
  const state = obj.state;
  if (!isMigrationState(state)) {
    throw new InvalidArgumentError(`${field}.state is not a valid migration state: ${String(state)}`);
  }
  return {
    id: expectString(obj.id, `${field}.id`),
    selected_mount_points: readMountPointList(obj.selected_mount_points, `${field}.selected_mount_points`),
    source: readWorkloadRecord(obj.source, `${field}.source`),
    migration_target: readMigrationTargetRecord(obj.migration_target, `${field}.migration_target`),
    state,
    created_at: expectString(obj.created_at, `${field}.created_at`),
  };
}
