import { describe, it, expect, beforeEach, vi } from "vitest";
import { createMemoryDatabase } from "../../src/db/memory.js";
import type { MigratorDatabase } from "../../src/db/interface.js";
import { createWorkloadService, type WorkloadService } from "../../src/services/workloads.js";
import { Credentials } from "../../src/models/credentials.js";
import { MountPoint } from "../../src/models/mount-point.js";
import { Storage } from "../../src/models/storage.js";
import { DuplicateKeyError, InvalidStateError, NotFoundError } from "../../src/errors.js";
import { makeLogger, makeSource } from "../helpers/fixtures.js";

describe("WorkloadService", () => {
  let db: MigratorDatabase;
  let service: WorkloadService;

  beforeEach(() => {
    db = createMemoryDatabase();
    service = createWorkloadService({ db, logger: makeLogger() });
  });

  it("registers and reads back a workload", () => {
    service.create(makeSource("10.0.0.1"));
    expect(service.get("10.0.0.1").equals(makeSource("10.0.0.1"))).toBe(true);
    expect(service.list().map((w) => w.ip)).toEqual(["10.0.0.1"]);
  });

  it("logs the registration", () => {
    const logger = makeLogger();
    createWorkloadService({ db, logger }).create(makeSource("10.0.0.1"));
    expect(logger.info).toHaveBeenCalledWith("[migrator:workloads] Registered workload 10.0.0.1");
  });

  it("rejects a second workload with the same IP", () => {
    service.create(makeSource("10.0.0.1"));
    expect(() => service.create(makeSource("10.0.0.1"))).toThrow(DuplicateKeyError);
    expect(() => service.create(makeSource("10.0.0.1"))).toThrow("Workload with IP 10.0.0.1 already exists");
    expect(db.workloads.listAll()).toHaveLength(1);
  });

  it("checks the IP with a keyed lookup", () => {
    service.create(makeSource("10.0.0.1"));
    const has = vi.spyOn(db.workloads, "has");
    const listAll = vi.spyOn(db.workloads, "listAll");

    expect(() => service.create(makeSource("10.0.0.1"))).toThrow(DuplicateKeyError);
    expect(has).toHaveBeenCalledWith("10.0.0.1");
    expect(listAll).not.toHaveBeenCalled();
  });

  it("allows the IP again after delete", () => {
    service.create(makeSource("10.0.0.1"));
    service.remove("10.0.0.1");
    expect(() => service.get("10.0.0.1")).toThrow(NotFoundError);
    service.create(makeSource("10.0.0.1"));
    expect(service.list()).toHaveLength(1);
  });

  it("fails to remove an unknown workload", () => {
    expect(() => service.remove("10.9.9.9")).toThrow(NotFoundError);
  });

  it("updates credentials and replaces storage", () => {
    service.create(makeSource("10.0.0.1"));
    const updated = service.update("10.0.0.1", {
      credentials: new Credentials("admin", "test-secret", "corp"),
      storage: new Storage([new MountPoint("C:\\", 10)]),
    });
    expect(updated.credentials.username).toBe("admin");
    expect(service.get("10.0.0.1").storage.toRecord()).toEqual({
      mount_points: [{ name: "C:\\", total_size: 10 }],
    });
  });

  it("accepts an update that repeats the current IP", () => {
    service.create(makeSource("10.0.0.1"));
    expect(service.update("10.0.0.1", { ip: "10.0.0.1" }).ip).toBe("10.0.0.1");
  });

  it("refuses to change the IP and leaves the record alone", () => {
    service.create(makeSource("10.0.0.1"));
    expect(() =>
      service.update("10.0.0.1", { ip: "10.0.0.2", credentials: new Credentials("admin", "test-secret") }),
    ).toThrow(InvalidStateError);
    expect(service.get("10.0.0.1").credentials.username).toBe("operator");
    expect(() => service.get("10.0.0.2")).toThrow(NotFoundError);
  });

  it("fails to update an unknown workload", () => {
    expect(() => service.update("10.9.9.9", {})).toThrow(NotFoundError);
  });
});
