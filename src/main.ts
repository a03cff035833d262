#!/usr/bin/env node
/**
 * Migrator entry point: start the HTTP service and stop it on SIGINT/SIGTERM.
 */

import { startMigrator } from "./standalone.js";

async function main(): Promise<void> {
  const instance = await startMigrator();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    instance.logger.info(`[migrator] ${signal} received, shutting down`);
    void instance.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        instance.logger.error(`[migrator] Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
