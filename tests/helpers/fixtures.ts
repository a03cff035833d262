import { vi } from "vitest";
import { Credentials } from "../../src/models/credentials.js";
import { MigrationTarget } from "../../src/models/migration-target.js";
import { MountPoint } from "../../src/models/mount-point.js";
import { Storage } from "../../src/models/storage.js";
import { Workload } from "../../src/models/workload.js";
import type { Logger } from "../../src/types.js";

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function makeCredentials(username = "operator"): Credentials {
  return new Credentials(username, "test-secret", "lab.local");
}

/** Source machine with C:\ (1000) and D:\ (2000). */
export function makeSource(ip = "10.0.0.1"): Workload {
  return new Workload(
    ip,
    makeCredentials(),
    new Storage([new MountPoint("C:\\", 1000), new MountPoint("D:\\", 2000)]),
  );
}

export function makeTarget(): MigrationTarget {
  return new MigrationTarget(
    "aws",
    new Credentials("cloud-user", "test-secret", "cloud.local"),
    new Workload("10.0.1.1", new Credentials("target-user", "test-secret", "")),
  );
}

/** JSON body for POST /workloads. */
export function workloadBody(ip = "10.0.0.1") {
  return {
    ip,
    credentials: { username: "operator", password: "test-secret", domain: "lab.local" },
    storage: {
      mount_points: [
        { name: "C:\\", total_size: 1000 },
        { name: "D:\\", total_size: 2000 },
      ],
    },
  };
}

/** JSON body for POST /migrations with an embedded source. */
export function migrationBody(selected: Array<{ name: string; total_size: number }> = [{ name: "C:\\", total_size: 1000 }]) {
  return {
    selected_mount_points: selected,
    source: workloadBody(),
    migration_target: {
      cloud_type: "aws",
      cloud_credentials: { username: "cloud-user", password: "test-secret", domain: "cloud.local" },
      target_vm: {
        ip: "10.0.1.1",
        credentials: { username: "target-user", password: "test-secret", domain: "" },
        storage: { mount_points: [] },
      },
    },
  };
}
