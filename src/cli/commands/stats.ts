import chalk from "chalk";

import { errorMessage } from "../../errors.js";
import {
  getDirectoryStatistics,
  getStaffStatistics,
} from "../../services/reports.js";
import {
  displayDirectoryStatistics,
  displayStaffStatistics,
} from "../utils/display.js";
import { withStore } from "../utils/store.js";

import type { Command } from "commander";

export function registerStatsCommand(program: Command): void {
  program
    .command("stats")
    .description("Show directory and staff statistics")
    .action(async () => {
      try {
        await withStore(async (handle) => {
          displayDirectoryStatistics(await getDirectoryStatistics(handle.db));
          displayStaffStatistics(await getStaffStatistics(handle.db));
        });
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
