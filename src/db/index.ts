import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { StoreError } from "../errors.js";

import type { Database } from "./schema.js";

export interface DatabaseHandle {
  db: Kysely<Database>;
  /** Raw handle, used for online backups */
  sqlite: SQLite.Database;
  path: string;
  close(): Promise<void>;
}

/**
 * Open (or create) the SQLite mirror. Pass ":memory:" for a throwaway store.
 */
export function createDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  let sqlite: SQLite.Database;
  try {
    sqlite = new SQLite(path);
  } catch (error) {
    throw new StoreError(`Cannot open database at ${path}`, { cause: error });
  }
  sqlite.pragma("foreign_keys = ON");
  if (path !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  const db = new Kysely<Database>({
    dialect: new SqliteDialect({ database: sqlite }),
  });

  return {
    db,
    sqlite,
    path,
    // db.destroy() closes the underlying SQLite handle
    close: () => db.destroy(),
  };
}

export * from "./schema.js";
