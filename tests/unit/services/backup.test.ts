import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { createDatabase, type DatabaseHandle } from "../../../src/db/index.js";
import { runMigration } from "../../../src/db/migrate.js";
import { SqliteSnapshotProvider, snapshotTimestamp } from "../../../src/services/backup.js";
import { FakeClock } from "../../mocks/clock.js";
import { createTestDatabase } from "../../mocks/db.js";
import { silentLogger } from "../../mocks/logger.js";

describe("services/backup", () => {
  describe("snapshotTimestamp", () => {
    it("should format local time down to milliseconds", () => {
      expect(snapshotTimestamp(new Date(2024, 2, 1, 14, 25, 30, 120))).toBe("20240301_142530_120");
      expect(snapshotTimestamp(new Date(2024, 10, 9, 7, 5, 3, 4))).toBe("20241109_070503_004");
    });
  });

  describe("SqliteSnapshotProvider", () => {
    let dir: string;
    let handle: DatabaseHandle;
    let clock: FakeClock;

    const provider = (keepLast?: number) =>
      new SqliteSnapshotProvider(handle.sqlite, {
        backupDir: join(dir, "backups"),
        logger: silentLogger,
        keepLast,
        clock,
      });

    beforeEach(async () => {
      dir = mkdtempSync(join(tmpdir(), "school-sync-"));
      handle = createDatabase(join(dir, "mirror.db"));
      await runMigration(handle.db, silentLogger);
      clock = new FakeClock(new Date(2024, 2, 1, 9, 0, 0, 0));
    });

    afterEach(async () => {
      await handle.close();
      rmSync(dir, { recursive: true, force: true });
    });

    it("should write a snapshot that opens as a database", async () => {
      await handle.db
        .insertInto("class_units")
        .values({ id: 12, name: "10-А", created_at: "t", updated_at: "t" })
        .execute();

      const target = await provider().createSnapshot();

      expect(target).toBe(join(dir, "backups", "pre_sync_20240301_090000_000.db"));
      const copy = createDatabase(target ?? "");
      try {
        const rows = await copy.db.selectFrom("class_units").select("name").execute();
        expect(rows).toEqual([{ name: "10-А" }]);
      } finally {
        await copy.close();
      }
    });

    it("should keep only the newest snapshots", async () => {
      const snapshots = provider(2);
      for (const second of [1, 2, 3]) {
        clock.setWallTime(new Date(2024, 2, 1, 9, 0, second, 0));
        await snapshots.createSnapshot();
      }

      expect(snapshots.list()).toEqual([
        "pre_sync_20240301_090002_000.db",
        "pre_sync_20240301_090003_000.db",
      ]);
    });

    it("should ignore files with another prefix", async () => {
      const backups = join(dir, "backups");
      await provider().createSnapshot();
      writeFileSync(join(backups, "manual_20200101_000000_000.db"), "");
      writeFileSync(join(backups, "notes.txt"), "");

      expect(provider().list()).toEqual(["pre_sync_20240301_090000_000.db"]);
      expect(provider(0).prune()).toEqual(["pre_sync_20240301_090000_000.db"]);
      expect(readdirSync(backups).sort()).toEqual(["manual_20200101_000000_000.db", "notes.txt"]);
    });

    it("should skip in-memory databases", async () => {
      const memory = await createTestDatabase();
      try {
        const snapshots = new SqliteSnapshotProvider(memory.sqlite, {
          backupDir: join(dir, "backups"),
          logger: silentLogger,
          clock,
        });
        expect(await snapshots.createSnapshot()).toBeNull();
        expect(snapshots.list()).toEqual([]);
      } finally {
        await memory.close();
      }
    });
  });
});
