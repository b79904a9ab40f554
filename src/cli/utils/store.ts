import { InvalidArgumentError } from "commander";

import { loadConfig, type SyncConfig } from "../../config.js";
import { createDatabase, type DatabaseHandle } from "../../db/index.js";
import { runMigration } from "../../db/migrate.js";
import { dbLogger } from "../../logger.js";

/**
 * Load config, open the mirror and make sure the schema exists, then run
 * `action`. The database is closed afterwards whatever happens.
 */
export async function withStore<T>(
  action: (handle: DatabaseHandle, config: SyncConfig) => Promise<T>
): Promise<T> {
  const config = loadConfig();
  const handle = createDatabase(config.dbPath);
  try {
    await runMigration(handle.db, dbLogger);
    return await action(handle, config);
  } finally {
    await handle.close();
  }
}

/**
 * Commander argument parser for "12,15, 18".
 */
export function parseIdList(value: string): number[] {
  const ids = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map(Number);

  if (ids.length === 0 || ids.some((id) => !Number.isInteger(id) || id <= 0)) {
    throw new InvalidArgumentError("Expected a comma-separated list of ids.");
  }
  return ids;
}

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
