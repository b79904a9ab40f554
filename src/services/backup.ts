/**
 * Pre-sync snapshots of the SQLite mirror.
 */

import { existsSync, mkdirSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";

import { errorMessage } from "../errors.js";
import { systemClock, type Clock } from "../utils/clock.js";

import type { SyncLogger } from "../logger.js";
import type SQLite from "better-sqlite3";

export interface SnapshotProvider {
  /** Returns the snapshot path, or null when none was taken */
  createSnapshot(): Promise<string | null>;
}

export interface SqliteSnapshotOptions {
  backupDir: string;
  logger: SyncLogger;
  keepLast?: number;
  prefix?: string;
  clock?: Clock;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * "20240301_142530_120" in local time; sorts chronologically.
 */
export function snapshotTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    `_${pad(date.getMilliseconds(), 3)}`
  );
}

/**
 * Online backup through better-sqlite3, safe while the database is open.
 */
export class SqliteSnapshotProvider implements SnapshotProvider {
  private keepLast: number;
  private prefix: string;
  private clock: Clock;

  constructor(
    private sqlite: SQLite.Database,
    private options: SqliteSnapshotOptions
  ) {
    this.keepLast = options.keepLast ?? 20;
    this.prefix = options.prefix ?? "pre_sync";
    this.clock = options.clock ?? systemClock;
  }

  async createSnapshot(): Promise<string | null> {
    const { backupDir, logger } = this.options;

    if (this.sqlite.memory) {
      logger.warn("In-memory database, no snapshot taken");
      return null;
    }

    if (!existsSync(backupDir)) {
      mkdirSync(backupDir, { recursive: true });
    }

    const target = join(
      backupDir,
      `${this.prefix}_${snapshotTimestamp(this.clock.wallTime())}.db`
    );

    try {
      await this.sqlite.backup(target);
    } catch (error) {
      logger.error({ target, error: errorMessage(error) }, "Snapshot failed");
      return null;
    }

    logger.info({ target }, "Snapshot created");
    this.prune();
    return target;
  }

  /**
   * Delete all but the newest `keepLast` snapshots with this prefix.
   */
  prune(): string[] {
    const { backupDir, logger } = this.options;
    const snapshots = this.list();
    const stale = snapshots.slice(0, Math.max(0, snapshots.length - this.keepLast));

    for (const name of stale) {
      rmSync(join(backupDir, name), { force: true });
    }
    if (stale.length > 0) {
      logger.info({ removed: stale.length }, "Old snapshots removed");
    }
    return stale;
  }

  /** Snapshot file names, oldest first */
  list(): string[] {
    const { backupDir } = this.options;
    if (!existsSync(backupDir)) {
      return [];
    }
    return readdirSync(backupDir)
      .filter((name) => name.startsWith(`${this.prefix}_`) && name.endsWith(".db"))
      .sort();
  }
}
