/**
 * File database backend: one JSON document per object.
 *
 * Layout: `<dataDir>/objects/<kind>_<encoded key>.json`. Keys are
 * URI-encoded so IPv6 addresses and ids with separators stay one segment.
 * Writes go through a temp file and a rename, so a reader never sees a
 * half-written document. listAll() returns records in file name order.
 */

import fs from "node:fs";
import path from "node:path";
import { AlreadyExistsError, NotFoundError } from "../errors.js";
import { readMigrationRecord, readWorkloadRecord } from "../models/records.js";
import type { MigratorDatabase, ObjectKind, ObjectStore } from "./interface.js";

function createFileObjectStore<T>(
  dir: string,
  kind: ObjectKind,
  decode: (raw: unknown) => T,
): ObjectStore<T> {
  const prefix = `${kind}_`;

  function filePath(key: string): string {
    return path.join(dir, `${prefix}${encodeURIComponent(key)}.json`);
  }

  function readFile(file: string): T {
    return decode(JSON.parse(fs.readFileSync(file, "utf-8")));
  }

  function writeFile(file: string, record: T): void {
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(record, null, 2), "utf-8");
    fs.renameSync(tmp, file);
  }

  return {
    create(key, record) {
      const file = filePath(key);
      if (fs.existsSync(file)) throw new AlreadyExistsError(`${kind} ${key} already exists`);
      writeFile(file, record);
      return readFile(file);
    },

    read(key) {
      const file = filePath(key);
      if (!fs.existsSync(file)) throw new NotFoundError(`${kind} ${key} not found`);
      return readFile(file);
    },

    update(key, record) {
      const file = filePath(key);
      if (!fs.existsSync(file)) throw new NotFoundError(`${kind} ${key} not found`);
      writeFile(file, record);
      return readFile(file);
    },

    delete(key) {
      const file = filePath(key);
      if (!fs.existsSync(file)) throw new NotFoundError(`${kind} ${key} not found`);
      fs.unlinkSync(file);
    },

    has(key) {
      return fs.existsSync(filePath(key));
    },

    listAll() {
      return fs.readdirSync(dir)
        .filter((name) => name.startsWith(prefix) && name.endsWith(".json"))
        .sort()
        .map((name) => readFile(path.join(dir, name)));
    },
  };
}

export function createFileDatabase(dataDir: string): MigratorDatabase {
  const dir = path.join(dataDir, "objects");

  return {
    backend: "file",
    workloads: createFileObjectStore(dir, "workload", (raw) => readWorkloadRecord(raw)),
    migrations: createFileObjectStore(dir, "migration", (raw) => readMigrationRecord(raw)),

    migrate() {
      fs.mkdirSync(dir, { recursive: true });
    },

    close() {
      // nothing held open
    },
  };
}
