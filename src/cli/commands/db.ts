import chalk from "chalk";
import ora from "ora";

import { getTableStats } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { SqliteSnapshotProvider } from "../../services/backup.js";
import { withStore } from "../utils/store.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create missing tables and indexes")
    .action(async () => {
      const spinner = ora("Running migration...").start();

      try {
        const stats = await withStore((handle) => getTableStats(handle.db));
        spinner.succeed("Migration completed successfully");

        console.log("\nTables:");
        for (const row of stats) {
          console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
        }
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // db backup
  db.command("backup")
    .description("Snapshot the database into the backup directory")
    .action(async () => {
      const spinner = ora("Creating snapshot...").start();

      try {
        const path = await withStore((handle, config) =>
          new SqliteSnapshotProvider(handle.sqlite, {
            backupDir: config.backupDir,
            keepLast: config.backupKeep,
            logger: syncLogger,
            prefix: "manual",
          }).createSnapshot()
        );

        if (path === null) {
          spinner.fail("No snapshot taken");
          process.exitCode = 1;
        } else {
          spinner.succeed(`Snapshot written to ${path}`);
        }
      } catch (error) {
        spinner.fail(`Backup failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // db status
  db.command("status")
    .description("Show database location, row counts and snapshots")
    .action(async () => {
      try {
        await withStore(async (handle, config) => {
          console.log(`\nDatabase: ${handle.path}`);

          console.log("\nTables:");
          for (const row of await getTableStats(handle.db)) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }

          const snapshots = new SqliteSnapshotProvider(handle.sqlite, {
            backupDir: config.backupDir,
            logger: syncLogger,
          }).list();
          console.log(`\nSnapshots in ${config.backupDir}: ${String(snapshots.length)}`);
          const latest = snapshots.at(-1);
          if (latest !== undefined) {
            console.log(`  Latest: ${latest}`);
          }
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
