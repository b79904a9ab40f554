import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { createSyncRuntime } from "../../services/sync/runtime.js";
import { displaySyncReport } from "../utils/display.js";
import { parseIdList, withStore } from "../utils/store.js";

import type { SyncOptions } from "../../services/sync/orchestrator.js";
import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

async function runSync(label: string, options: SyncOptions): Promise<void> {
  const spinner = ora(`Syncing ${label}...`).start();

  try {
    const report = await withStore(async (handle, config) => {
      const { orchestrator } = createSyncRuntime(config, handle);
      orchestrator.setProgressCallback((progress) => {
        const item =
          progress.currentItem !== undefined ? ` (class ${progress.currentItem})` : "";
        spinner.text = `${progress.phase}: ${String(progress.current)}/${String(progress.total)}${item}`;
      });
      return orchestrator.run(options);
    });

    const incomplete = [report.staff, report.classes, report.students].some(
      (stats) => stats?.fetchFailed === true
    );
    if (report.errors.length > 0 || incomplete) {
      spinner.warn(`Sync of ${label} finished with problems`);
      process.exitCode = 1;
    } else {
      spinner.succeed(`Synced ${label}`);
    }
    displaySyncReport(report);
  } catch (error) {
    spinner.fail(`Failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Mirror the school directory into the local database")
    .addHelpText(
      "after",
      `
SYNC ORDER:
  staff     GET /teacher_profiles (paged)
  classes   GET /class_units, mentor links need staff first
  students  GET /student_profiles per class, with parents

Rows missing from a complete fetch are deactivated, never deleted.
`
    );

  // sync all
  sync
    .command("all")
    .description("Snapshot the database, then sync staff, classes and students")
    .option("--no-backup", "Skip the pre-sync snapshot")
    .option("--skip-staff", "Skip the staff stage")
    .option("--skip-classes", "Skip the class stage")
    .option("--skip-students", "Skip the student stage")
    .option("--class <ids>", "Only sync students of these classes", parseIdList)
    .action(
      async (options: {
        backup: boolean;
        skipStaff?: boolean;
        skipClasses?: boolean;
        skipStudents?: boolean;
        class?: number[];
      }) => {
        await runSync("directory", {
          backup: options.backup,
          staff: options.skipStaff !== true,
          classes: options.skipClasses !== true,
          students: options.skipStudents !== true,
          classIds: options.class,
        });
      }
    );

  // sync staff
  sync
    .command("staff")
    .description("Sync staff only")
    .action(async () => {
      await runSync("staff", { backup: false, classes: false, students: false });
    });

  // sync classes
  sync
    .command("classes")
    .description("Sync classes and mentor links only")
    .action(async () => {
      await runSync("classes", { backup: false, staff: false, students: false });
    });

  // sync students
  sync
    .command("students")
    .description("Sync students and parents of stored classes")
    .option("--class <ids>", "Only these classes", parseIdList)
    .action(async (options: { class?: number[] }) => {
      if (options.class !== undefined) {
        console.log(chalk.gray(`Classes: ${options.class.join(", ")}`));
      }
      await runSync("students", {
        backup: false,
        staff: false,
        classes: false,
        classIds: options.class,
      });
    });
}
