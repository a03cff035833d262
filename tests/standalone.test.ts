import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { startMigrator } from "../src/standalone.js";
import { resolveMigratorConfig } from "../src/config.js";
import { MountPoint } from "../src/models/mount-point.js";
import { makeLogger, makeSource, makeTarget } from "./helpers/fixtures.js";

describe("startMigrator (standalone)", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "migrator-standalone-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("binds an ephemeral port and reports the backend", async () => {
    const logger = makeLogger();
    const instance = await startMigrator(resolveMigratorConfig({ http: { port: 0 } }), { logger });
    try {
      expect(instance.port).toBeGreaterThan(0);
      expect(instance.db.backend).toBe("memory");
      expect(logger.info).toHaveBeenCalledWith("[migrator] Database backend: memory");
    } finally {
      await instance.stop();
    }
  });

  it("keeps data across restarts with the file backend", async () => {
    const config = resolveMigratorConfig({ dbBackend: "file", dataDir: tmpDir, http: { port: 0 } });

    const first = await startMigrator(config, { logger: makeLogger() });
    first.workloads.create(makeSource("10.0.0.1"));
    await first.stop();

    const second = await startMigrator(config, { logger: makeLogger() });
    try {
      expect(second.workloads.get("10.0.0.1").equals(makeSource("10.0.0.1"))).toBe(true);
    } finally {
      await second.stop();
    }
  });

  it("marks a run interrupted by a restart as error", async () => {
    const config = resolveMigratorConfig({ dbBackend: "file", dataDir: tmpDir, http: { port: 0 } });
    const first = await startMigrator(config, { logger: makeLogger() });
    const m = first.migrations.create({
      selectedMountPoints: [new MountPoint("C:\\", 1000)],
      source: makeSource(),
      migrationTarget: makeTarget(),
    });
    // the process dies mid-run: the record is left in "running"
    first.db.migrations.update(m.id, { ...m.toRecord(), state: "running" });
    await first.stop();

    const logger = makeLogger();
    const second = await startMigrator(config, { logger });
    try {
      expect(second.migrations.status(m.id)).toEqual({ migration_id: m.id, state: "error", finished: true });
      expect(logger.warn).toHaveBeenCalledWith(
        `[migrator:migrations] ${m.id} was interrupted while running; marked as error`,
      );
      second.migrations.remove(m.id);
      expect(second.migrations.list()).toEqual([]);
    } finally {
      await second.stop();
    }
  });

  it("lets running migrations finish on stop", async () => {
    const config = resolveMigratorConfig({ dbBackend: "file", dataDir: tmpDir, http: { port: 0 } });
    const instance = await startMigrator(config, { logger: makeLogger() });

    const m = instance.migrations.create({
      selectedMountPoints: [new MountPoint("C:\\", 1000)],
      source: makeSource(),
      migrationTarget: makeTarget(),
    });
    instance.migrations.startInBackground(m.id, 20);
    await instance.stop();

    expect(instance.db.migrations.read(m.id).state).toBe("success");
  });
});
