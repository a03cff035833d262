/**
 * Database factory: creates the appropriate backend based on config.
 */

export type { MigratorDatabase, ObjectStore, ObjectKind } from "./interface.js";
export { createMemoryDatabase } from "./memory.js";
export { createFileDatabase } from "./file.js";
export type { DatabaseBackend } from "../config.js";

import type { MigratorConfig } from "../config.js";
import type { MigratorDatabase } from "./interface.js";
import { createMemoryDatabase } from "./memory.js";
import { createFileDatabase } from "./file.js";

export function createDatabase(config: Pick<MigratorConfig, "dbBackend" | "dataDir">): MigratorDatabase {
  switch (config.dbBackend) {
    case "memory":
      return createMemoryDatabase();

    case "file":
      return createFileDatabase(config.dataDir);
  }
}
