import { describe, it, expect } from "vitest";
import {
  isMigrationState,
  isTerminalState,
  parseCloudType,
  readMigrationRecord,
  readMountPointRecord,
  readStorageRecord,
  readWorkloadRecord,
} from "../../src/models/records.js";
import { InvalidArgumentError } from "../../src/errors.js";
import { workloadBody } from "../helpers/fixtures.js";

describe("parseCloudType", () => {
  it("accepts every cloud type case-insensitively", () => {
    expect(parseCloudType("aws")).toBe("aws");
    expect(parseCloudType("Azure")).toBe("azure");
    expect(parseCloudType("VSPHERE")).toBe("vsphere");
    expect(parseCloudType(" vCloud ")).toBe("vcloud");
  });

  it("rejects unknown values", () => {
    expect(() => parseCloudType("gcp")).toThrow(InvalidArgumentError);
    expect(() => parseCloudType("gcp")).toThrow("Invalid cloud type: gcp (expected one of aws, azure, vsphere, vcloud)");
  });

  it("rejects non-strings", () => {
    expect(() => parseCloudType(3)).toThrow(InvalidArgumentError);
    expect(() => parseCloudType(undefined)).toThrow(InvalidArgumentError);
  });
});

describe("migration states", () => {
  it("recognizes the four states", () => {
    expect(["not_started", "running", "error", "success"].every(isMigrationState)).toBe(true);
    expect(isMigrationState("RUNNING")).toBe(false);
  });

  it("treats success and error as terminal", () => {
    expect(isTerminalState("success")).toBe(true);
    expect(isTerminalState("error")).toBe(true);
    expect(isTerminalState("running")).toBe(false);
    expect(isTerminalState("not_started")).toBe(false);
  });
});

describe("record readers", () => {
  it("reads the legacy mount_point_name key", () => {
    expect(readMountPointRecord({ mount_point_name: "D:\\", total_size: 5 })).toEqual({
      name: "D:\\",
      total_size: 5,
    });
  });

  it("prefers name over mount_point_name", () => {
    expect(readMountPointRecord({ name: "E:\\", mount_point_name: "D:\\", total_size: 5 }).name).toBe("E:\\");
  });

  it("names the failing field", () => {
    expect(() => readMountPointRecord({ name: "C:\\", total_size: "big" }, "mp")).toThrow(
      "mp.total_size must be a number",
    );
    expect(() =>
      readWorkloadRecord({ ip: "10.0.0.1", credentials: { username: 1, password: "x" } }),
    ).toThrow("workload.credentials.username must be a string");
  });

  it("reads a missing storage as empty", () => {
    expect(readStorageRecord(undefined)).toEqual({ mount_points: [] });
    expect(readStorageRecord({})).toEqual({ mount_points: [] });
  });

  it("defaults a missing domain to empty", () => {
    const record = readWorkloadRecord({ ip: "10.0.0.5", credentials: { username: "u", password: "test-secret" } });
    expect(record).toEqual({
      ip: "10.0.0.5",
      credentials: { username: "u", password: "test-secret", domain: "" },
      storage: { mount_points: [] },
    });
  });

  it("rejects a non-object body", () => {
    expect(() => readWorkloadRecord([])).toThrow("workload must be an object");
    expect(() => readWorkloadRecord(null)).toThrow("workload must be an object");
  });

  it("rejects an unknown migration state", () => {
    expect(() =>
      readMigrationRecord({
        id: "mig-1",
        selected_mount_points: [],
        source: workloadBody(),
        migration_target: {},
        state: "paused",
        created_at: "2026-01-01T00:00:00.000Z",
      }),
    ).toThrow("migration.state is not a valid migration state: paused");
  });
});
