/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { Staff } from "../../db/schema.js";
import type {
  DirectoryStatistics,
  InactiveStaffReport,
  StaffDetails,
  StaffProblems,
  StaffStatistics,
} from "../../services/reports.js";
import type { SyncReport } from "../../services/sync/orchestrator.js";
import type { SyncStats } from "../../types/index.js";

const STAGES = ["staff", "classes", "students", "parents"] as const;

/**
 * One row per stage that ran.
 */
export function displaySyncReport(report: SyncReport): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Stage"),
      chalk.cyan("Seen"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Unchanged"),
      chalk.cyan("Skipped"),
      chalk.cyan("Errors"),
      chalk.cyan("Deactivated"),
    ],
  });

  for (const stage of STAGES) {
    const stats: SyncStats | null = report[stage];
    if (stats === null) {
      continue;
    }
    const skipped = stats.skipped + stats.invalid + stats.suspicious;
    table.push([
      stats.fetchFailed ? chalk.red(`${stage} (incomplete)`) : stage,
      String(stats.seen),
      chalk.green(String(stats.created)),
      String(stats.updated),
      chalk.gray(String(stats.unchanged)),
      String(skipped),
      stats.errors > 0 ? chalk.red(String(stats.errors)) : "0",
      String(stats.deactivated + stats.cleaned),
    ]);
  }

  console.log(table.toString());

  if (report.snapshot !== null) {
    console.log(`Snapshot: ${report.snapshot}`);
  }
  console.log(`Mentor links: ${String(report.staffLinks)}`);
  console.log(`Identity cache: ${String(report.identityCacheSize)} entries`);
  console.log(
    `Request cache: ${String(report.requestCache.hits)} hits, ${String(report.requestCache.misses)} misses (${report.requestCache.hitRate})`
  );
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(1)}s`);

  for (const error of report.errors) {
    console.log(chalk.red(`  ✗ ${error}`));
  }
}

export function displayDirectoryStatistics(stats: DirectoryStatistics): void {
  const table = new CliTable3({
    head: [chalk.cyan(""), chalk.cyan("Active"), chalk.cyan("Total")],
  });
  table.push(
    ["Classes", "", String(stats.classes)],
    ["Students", String(stats.studentsActive), String(stats.studentsTotal)],
    ["Parents", String(stats.parentsActive), String(stats.parentsTotal)],
    ["Staff", String(stats.staffActive), String(stats.staffTotal)]
  );
  console.log(chalk.bold("\nDirectory:\n"));
  console.log(table.toString());
}

export function displayStaffStatistics(stats: StaffStatistics): void {
  console.log(chalk.bold("\nStaff:\n"));
  console.log(`  Total:          ${String(stats.total)}`);
  console.log(`  Active:         ${chalk.green(String(stats.active))}`);
  console.log(`  Deactivated:    ${chalk.gray(String(stats.deactivated))}`);
  console.log(`  With phone:     ${String(stats.withPhone)}`);
  console.log(`  With email:     ${String(stats.withEmail)}`);
  console.log(`  With identity:  ${String(stats.withExternalId)}`);

  const types = Object.entries(stats.byType);
  if (types.length > 0) {
    console.log(chalk.bold("\n  By type:"));
    for (const [type, count] of types) {
      console.log(`    ${type}: ${String(count)}`);
    }
  }
  console.log();
}

export function displayStaffProblems(problems: StaffProblems): void {
  console.log(chalk.bold("\nProblematic staff records:\n"));
  console.log(`  Without user_id:   ${String(problems.noUserId)}`);
  console.log(`  Without name:      ${String(problems.noName)}`);
  console.log(`  Without contacts:  ${String(problems.noContacts)}`);

  if (problems.examples.length > 0) {
    console.log(chalk.bold("\n  Examples without user_id:"));
    for (const row of problems.examples) {
      console.log(`    ${String(row.person_id)}: ${row.name ?? chalk.gray("(no name)")}`);
    }
  }
  console.log();
}

export function displayInactiveStaff(report: InactiveStaffReport): void {
  if (report.total === 0) {
    console.log(chalk.gray("No inactive staff"));
    return;
  }

  console.log(chalk.bold(`\nInactive staff: ${String(report.total)}\n`));
  console.log(`  Deactivated today:      ${String(report.deactivatedToday)}`);
  console.log(`  Deactivated this week:  ${String(report.deactivatedThisWeek)}`);
  console.log(`  Without user_id:        ${String(report.noUserId)}`);
  console.log(`  Suspicious names:       ${String(report.suspiciousNames)}`);

  const table = new CliTable3({
    head: [chalk.cyan("ID"), chalk.cyan("Name"), chalk.cyan("Deactivated"), chalk.cyan("Reason")],
    colWidths: [12, 40, 20, 20],
    wordWrap: true,
  });
  for (const row of report.rows) {
    table.push([
      String(row.personId),
      row.name ?? chalk.gray("(no name)"),
      row.deactivatedAt?.slice(0, 16).replace("T", " ") ?? chalk.gray("unknown"),
      row.reason,
    ]);
  }
  console.log(table.toString());

  if (report.total > report.rows.length) {
    console.log(chalk.gray(`... and ${String(report.total - report.rows.length)} more`));
  }
}

export function displayStaffTable(rows: Staff[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("ID"), chalk.cyan("Name"), chalk.cyan("Type"), chalk.cyan("Phone"), chalk.cyan("Email")],
    colWidths: [12, 40, 14, 14, 30],
    wordWrap: true,
  });
  for (const row of rows) {
    table.push([
      String(row.person_id),
      row.name ?? "",
      row.type ?? "",
      row.phone ?? "",
      row.email ?? "",
    ]);
  }
  console.log(table.toString());
}

export function displayStaffDetails({ staff, classes }: StaffDetails): void {
  console.log(chalk.bold.underline(`\n${staff.name ?? String(staff.person_id)}\n`));
  console.log(`  Person ID:   ${String(staff.person_id)}`);
  console.log(`  Type:        ${staff.type ?? chalk.gray("N/A")}`);
  console.log(`  Phone:       ${staff.phone ?? chalk.gray("N/A")}`);
  console.log(`  Email:       ${staff.email ?? chalk.gray("N/A")}`);
  console.log(`  External ID: ${staff.external_id ?? chalk.gray("N/A")}`);
  console.log(`  Last seen:   ${staff.last_seen_at ?? chalk.gray("never")}`);
  console.log(
    `  Classes:     ${classes.length > 0 ? classes.join(", ") : chalk.gray("none")}`
  );
  console.log();
}
