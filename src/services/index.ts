export { createWorkloadService } from "./workloads.js";
export type { WorkloadService, WorkloadPatch, WorkloadServiceParams } from "./workloads.js";
export { createMigrationService } from "./migrations.js";
export type {
  MigrationService,
  MigrationPatch,
  MigrationStatus,
  CreateMigrationInput,
  MigrationServiceParams,
} from "./migrations.js";
