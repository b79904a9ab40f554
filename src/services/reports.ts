/**
 * Read-only summaries of the mirror for the CLI.
 */

import { sql, type Kysely } from "kysely";

import { isSuspiciousName } from "../utils/normalize.js";

import type { Database, Staff } from "../db/schema.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// Counts of active rows, via conditional aggregation
const activeCount = sql<number>`COALESCE(SUM(CASE WHEN is_active = 1 THEN 1 ELSE 0 END), 0)`;

export interface DirectoryStatistics {
  classes: number;
  studentsActive: number;
  studentsTotal: number;
  parentsActive: number;
  parentsTotal: number;
  staffActive: number;
  staffTotal: number;
}

export async function getDirectoryStatistics(
  db: Kysely<Database>
): Promise<DirectoryStatistics> {
  const classes = await db
    .selectFrom("class_units")
    .select((eb) => eb.fn.countAll<number>().as("total"))
    .executeTakeFirstOrThrow();

  const students = await db
    .selectFrom("students")
    .select((eb) => [eb.fn.countAll<number>().as("total"), activeCount.as("active")])
    .executeTakeFirstOrThrow();

  const parents = await db
    .selectFrom("parents")
    .select((eb) => [eb.fn.countAll<number>().as("total"), activeCount.as("active")])
    .executeTakeFirstOrThrow();

  const staff = await db
    .selectFrom("staff")
    .select((eb) => [eb.fn.countAll<number>().as("total"), activeCount.as("active")])
    .executeTakeFirstOrThrow();

  return {
    classes: Number(classes.total),
    studentsActive: Number(students.active),
    studentsTotal: Number(students.total),
    parentsActive: Number(parents.active),
    parentsTotal: Number(parents.total),
    staffActive: Number(staff.active),
    staffTotal: Number(staff.total),
  };
}

export interface StaffStatistics {
  total: number;
  active: number;
  deactivated: number;
  /** Active staff per type, sorted by type */
  byType: Record<string, number>;
  withPhone: number;
  withEmail: number;
  withExternalId: number;
}

export async function getStaffStatistics(
  db: Kysely<Database>
): Promise<StaffStatistics> {
  const totals = await db
    .selectFrom("staff")
    .select((eb) => [eb.fn.countAll<number>().as("total"), activeCount.as("active")])
    .executeTakeFirstOrThrow();

  const contacts = await db
    .selectFrom("staff")
    .where("is_active", "=", 1)
    .select((eb) => [
      eb.fn.count<number>("phone").as("withPhone"),
      eb.fn.count<number>("email").as("withEmail"),
      eb.fn.count<number>("external_id").as("withExternalId"),
    ])
    .executeTakeFirstOrThrow();

  const types = await db
    .selectFrom("staff")
    .where("is_active", "=", 1)
    .where("type", "is not", null)
    .select((eb) => ["type", eb.fn.countAll<number>().as("count")])
    .groupBy("type")
    .orderBy("type")
    .execute();

  const byType: Record<string, number> = {};
  for (const row of types) {
    if (row.type !== null) {
      byType[row.type] = Number(row.count);
    }
  }

  const total = Number(totals.total);
  const active = Number(totals.active);
  return {
    total,
    active,
    deactivated: total - active,
    byType,
    withPhone: Number(contacts.withPhone),
    withEmail: Number(contacts.withEmail),
    withExternalId: Number(contacts.withExternalId),
  };
}

export interface StaffProblems {
  noUserId: number;
  noName: number;
  noContacts: number;
  /** A few rows without user_id */
  examples: Pick<Staff, "person_id" | "name">[];
}

export async function findProblematicStaff(
  db: Kysely<Database>
): Promise<StaffProblems> {
  const counts = await db
    .selectFrom("staff")
    .select([
      sql<number>`COALESCE(SUM(CASE WHEN user_id IS NULL THEN 1 ELSE 0 END), 0)`.as("noUserId"),
      sql<number>`COALESCE(SUM(CASE WHEN name IS NULL OR name = '' THEN 1 ELSE 0 END), 0)`.as("noName"),
      sql<number>`COALESCE(SUM(CASE WHEN phone IS NULL AND email IS NULL THEN 1 ELSE 0 END), 0)`.as("noContacts"),
    ])
    .executeTakeFirstOrThrow();

  const examples = await db
    .selectFrom("staff")
    .select(["person_id", "name"])
    .where("user_id", "is", null)
    .orderBy("person_id")
    .limit(3)
    .execute();

  return {
    noUserId: Number(counts.noUserId),
    noName: Number(counts.noName),
    noContacts: Number(counts.noContacts),
    examples,
  };
}

export type InactiveReason = "missing user_id" | "suspicious name" | "absent from API";

export interface InactiveStaffReport {
  total: number;
  deactivatedToday: number;
  deactivatedThisWeek: number;
  noUserId: number;
  suspiciousNames: number;
  rows: {
    personId: number;
    name: string | null;
    deactivatedAt: string | null;
    reason: InactiveReason;
  }[];
}

export function inactiveReason(row: Pick<Staff, "user_id" | "name">): InactiveReason {
  if (row.user_id === null) {
    return "missing user_id";
  }
  if (isSuspiciousName(row.name)) {
    return "suspicious name";
  }
  return "absent from API";
}

/**
 * Deactivated staff with the likely reason. "Today" is the UTC date of `now`.
 */
export async function listInactiveStaff(
  db: Kysely<Database>,
  now: Date,
  limit = 20
): Promise<InactiveStaffReport> {
  const inactive = await db
    .selectFrom("staff")
    .select(["person_id", "user_id", "name", "deactivated_at"])
    .where("is_active", "=", 0)
    .orderBy("deactivated_at", "desc")
    .orderBy("person_id")
    .execute();

  const today = now.toISOString().slice(0, 10);
  const weekAgo = new Date(now.getTime() - 7 * DAY_MS).toISOString();

  const report: InactiveStaffReport = {
    total: inactive.length,
    deactivatedToday: 0,
    deactivatedThisWeek: 0,
    noUserId: 0,
    suspiciousNames: 0,
    rows: [],
  };

  for (const row of inactive) {
    if (row.deactivated_at !== null) {
      if (row.deactivated_at.startsWith(today)) {
        report.deactivatedToday++;
      }
      if (row.deactivated_at >= weekAgo) {
        report.deactivatedThisWeek++;
      }
    }

    const reason = inactiveReason(row);
    if (reason === "missing user_id") {
      report.noUserId++;
    } else if (reason === "suspicious name") {
      report.suspiciousNames++;
    }

    if (report.rows.length < limit) {
      report.rows.push({
        personId: row.person_id,
        name: row.name,
        deactivatedAt: row.deactivated_at,
        reason,
      });
    }
  }

  return report;
}

/**
 * Active staff whose name fields contain `term` (case-insensitive for ASCII).
 */
export async function searchStaff(
  db: Kysely<Database>,
  term: string
): Promise<Staff[]> {
  const pattern = `%${term}%`;
  return db
    .selectFrom("staff")
    .selectAll()
    .where("is_active", "=", 1)
    .where((eb) =>
      eb.or([
        eb("last_name", "like", pattern),
        eb("first_name", "like", pattern),
        eb("name", "like", pattern),
      ])
    )
    .orderBy("last_name")
    .orderBy("person_id")
    .execute();
}

export interface StaffDetails {
  staff: Staff;
  classes: string[];
}

/**
 * An active staff member with the classes they lead.
 */
export async function getStaffDetails(
  db: Kysely<Database>,
  personId: number
): Promise<StaffDetails | null> {
  const staff = await db
    .selectFrom("staff")
    .selectAll()
    .where("person_id", "=", personId)
    .where("is_active", "=", 1)
    .executeTakeFirst();

  if (staff === undefined) {
    return null;
  }

  const classes = await db
    .selectFrom("class_staff")
    .innerJoin("class_units", "class_units.id", "class_staff.class_unit_id")
    .select("class_units.name")
    .where("class_staff.staff_id", "=", staff.id)
    .orderBy("class_units.name")
    .execute();

  return { staff, classes: classes.map((row) => row.name) };
}
