import { confirm } from "@inquirer/prompts";
import chalk from "chalk";

import { errorMessage } from "../../errors.js";
import {
  findProblematicStaff,
  getStaffDetails,
  listInactiveStaff,
  searchStaff,
} from "../../services/reports.js";
import { deactivateStaffWithoutUserId } from "../../services/sync/staff.js";
import {
  displayInactiveStaff,
  displayStaffDetails,
  displayStaffProblems,
  displayStaffTable,
} from "../utils/display.js";
import { parsePositiveInt, withStore } from "../utils/store.js";

import type { Command } from "commander";

// ============================================================================
// Staff Commands
// ============================================================================

export function registerStaffCommand(program: Command): void {
  const staff = program.command("staff").description("Inspect staff records");

  // staff problems
  staff
    .command("problems")
    .description("Count staff rows with missing data")
    .option("--clean", "Deactivate active rows without user_id")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (options: { clean?: boolean; yes?: boolean }) => {
      try {
        await withStore(async (handle) => {
          const problems = await findProblematicStaff(handle.db);
          displayStaffProblems(problems);

          if (options.clean !== true || problems.noUserId === 0) {
            return;
          }

          const proceed =
            options.yes === true ||
            !process.stdin.isTTY ||
            (await confirm({
              message: `Deactivate staff without user_id?`,
              default: false,
            }));
          if (!proceed) {
            console.log(chalk.gray("Nothing changed"));
            return;
          }

          const count = await deactivateStaffWithoutUserId(
            handle.db,
            new Date().toISOString()
          );
          console.log(chalk.green(`Deactivated ${String(count)} staff rows`));
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // staff inactive
  staff
    .command("inactive")
    .description("List deactivated staff with the likely reason")
    .option("-l, --limit <n>", "Rows to show", parsePositiveInt, 20)
    .action(async (options: { limit: number }) => {
      try {
        await withStore(async (handle) => {
          displayInactiveStaff(
            await listInactiveStaff(handle.db, new Date(), options.limit)
          );
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // staff search
  staff
    .command("search <term>")
    .description("Find active staff by name")
    .action(async (term: string) => {
      try {
        await withStore(async (handle) => {
          const rows = await searchStaff(handle.db, term);
          if (rows.length === 0) {
            console.log(chalk.gray(`No active staff matching "${term}"`));
            return;
          }
          displayStaffTable(rows);
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // staff show
  staff
    .command("show <personId>")
    .description("Show one active staff member and their classes")
    .action(async (personId: string) => {
      try {
        await withStore(async (handle) => {
          const details = await getStaffDetails(handle.db, parsePositiveInt(personId));
          if (details === null) {
            console.log(chalk.yellow(`No active staff with id ${personId}`));
            process.exitCode = 1;
            return;
          }
          displayStaffDetails(details);
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
