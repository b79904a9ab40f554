#!/usr/bin/env node

/**
 * School directory sync CLI
 *
 * Mirrors staff, classes, students and parents from the school directory
 * API into a local SQLite database.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerStaffCommand } from "./commands/staff.js";
import { registerStatsCommand } from "./commands/stats.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("school-sync")
  .description("School directory mirror")
  .version("0.4.0");

registerDbCommand(program);
registerSyncCommand(program);
registerStatsCommand(program);
registerStaffCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
