export { Credentials } from "./credentials.js";
export { MountPoint } from "./mount-point.js";
export { Storage } from "./storage.js";
export { Workload } from "./workload.js";
export { MigrationTarget } from "./migration-target.js";
export { Migration } from "./migration.js";
export type { MigrationParams, RunOptions } from "./migration.js";
export { BOOT_VOLUME_NAMES, isBootVolume, assertBootVolumeSelected } from "./boot-volume.js";
export type {
  CloudType,
  MigrationState,
  CredentialsRecord,
  MountPointRecord,
  StorageRecord,
  WorkloadRecord,
  MigrationTargetRecord,
  MigrationRecord,
} from "./records.js";
export {
  CLOUD_TYPES,
  MIGRATION_STATES,
  TERMINAL_STATES,
  isCloudType,
  isMigrationState,
  isTerminalState,
  parseCloudType,
  readCredentialsRecord,
  readMountPointRecord,
  readMountPointList,
  readStorageRecord,
  readWorkloadRecord,
  readMigrationTargetRecord,
  readMigrationRecord,
} from "./records.js";
