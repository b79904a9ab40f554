import { sql, type Kysely } from "kysely";

import type { SyncLogger } from "../logger.js";
import type { Database } from "./schema.js";

// ============================================================================
// Migration Functions
// ============================================================================

const TABLES = [
  "staff",
  "class_units",
  "students",
  "parents",
  "class_staff",
  "parent_student",
] as const;

/**
 * Create the mirror schema. Safe to run on every start: every table and
 * index is created only if missing, inside one transaction.
 */
export async function runMigration(
  db: Kysely<Database>,
  logger: SyncLogger
): Promise<void> {
  logger.info("Running schema migration...");

  await db.transaction().execute(async (trx) => {
    await trx.schema
      .createTable("staff")
      .ifNotExists()
      .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
      .addColumn("person_id", "integer", (col) => col.notNull())
      .addColumn("user_id", "integer")
      .addColumn("name", "text")
      .addColumn("last_name", "text")
      .addColumn("first_name", "text")
      .addColumn("middle_name", "text")
      .addColumn("email", "text")
      .addColumn("phone", "text")
      .addColumn("type", "text")
      .addColumn("external_id", "text")
      .addColumn("external_link", "text")
      .addColumn("updated_at_api", "text")
      .addColumn("is_active", "integer", (col) => col.notNull().defaultTo(1))
      .addColumn("deactivated_at", "text")
      .addColumn("last_seen_at", "text")
      .addColumn("created_at", "text", (col) => col.notNull())
      .addColumn("updated_at", "text", (col) => col.notNull())
      .addCheckConstraint(
        "check_staff_phone_length",
        sql`length(phone) = 11 OR phone IS NULL`
      )
      .execute();

    await trx.schema
      .createTable("class_units")
      .ifNotExists()
      .addColumn("id", "integer", (col) => col.primaryKey())
      .addColumn("school_id", "integer")
      .addColumn("class_level_id", "integer")
      .addColumn("name", "text", (col) => col.notNull())
      .addColumn("parallel", "text")
      .addColumn("literal", "text")
      .addColumn("created_at", "text", (col) => col.notNull())
      .addColumn("updated_at", "text", (col) => col.notNull())
      .execute();

    await trx.schema
      .createTable("students")
      .ifNotExists()
      .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
      .addColumn("person_id", "integer", (col) => col.notNull())
      .addColumn("user_name", "text")
      .addColumn("last_name", "text")
      .addColumn("first_name", "text")
      .addColumn("middle_name", "text")
      .addColumn("email", "text")
      .addColumn("phone", "text")
      .addColumn("class_unit_id", "integer", (col) =>
        col.references("class_units.id").onDelete("set null")
      )
      .addColumn("external_id", "text")
      .addColumn("external_link", "text")
      .addColumn("is_active", "integer", (col) => col.notNull().defaultTo(1))
      .addColumn("deactivated_at", "text")
      .addColumn("created_at", "text", (col) => col.notNull())
      .addColumn("updated_at", "text", (col) => col.notNull())
      .addCheckConstraint(
        "check_student_phone_length",
        sql`length(phone) = 11 OR phone IS NULL`
      )
      .execute();

    await trx.schema
      .createTable("parents")
      .ifNotExists()
      .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
      .addColumn("person_id", "integer", (col) => col.notNull())
      .addColumn("name", "text")
      .addColumn("last_name", "text")
      .addColumn("first_name", "text")
      .addColumn("middle_name", "text")
      .addColumn("email", "text")
      .addColumn("phone", "text")
      .addColumn("external_id", "text")
      .addColumn("external_link", "text")
      .addColumn("is_active", "integer", (col) => col.notNull().defaultTo(1))
      .addColumn("deactivated_at", "text")
      .addColumn("created_at", "text", (col) => col.notNull())
      .addColumn("updated_at", "text", (col) => col.notNull())
      .addCheckConstraint(
        "check_parent_phone_length",
        sql`length(phone) = 11 OR phone IS NULL`
      )
      .execute();

    await trx.schema
      .createTable("class_staff")
      .ifNotExists()
      .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
      .addColumn("class_unit_id", "integer", (col) =>
        col.notNull().references("class_units.id").onDelete("cascade")
      )
      .addColumn("staff_id", "integer", (col) =>
        col.notNull().references("staff.id").onDelete("cascade")
      )
      .addColumn("is_leader", "integer", (col) => col.notNull().defaultTo(0))
      .addColumn("subject", "text")
      .addColumn("created_at", "text", (col) => col.notNull())
      .addUniqueConstraint("uq_class_staff", ["class_unit_id", "staff_id"])
      .execute();

    await trx.schema
      .createTable("parent_student")
      .ifNotExists()
      .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
      .addColumn("parent_id", "integer", (col) =>
        col.notNull().references("parents.id").onDelete("cascade")
      )
      .addColumn("student_id", "integer", (col) =>
        col.notNull().references("students.id").onDelete("cascade")
      )
      .addColumn("relationship_type", "text")
      .addColumn("created_at", "text", (col) => col.notNull())
      .addUniqueConstraint("uq_parent_student", ["parent_id", "student_id"])
      .execute();

    const indexes: [string, (typeof TABLES)[number], string[], boolean][] = [
      ["ix_staff_person_id", "staff", ["person_id"], true],
      ["ix_staff_user_id", "staff", ["user_id"], false],
      ["ix_staff_active_type", "staff", ["is_active", "type"], false],
      ["ix_staff_external_id", "staff", ["external_id"], false],
      ["ix_class_name", "class_units", ["name"], false],
      ["ix_student_person_id", "students", ["person_id"], true],
      ["ix_student_active_class", "students", ["is_active", "class_unit_id"], false],
      ["ix_student_name", "students", ["last_name", "first_name"], false],
      ["ix_parent_person_id", "parents", ["person_id"], true],
      ["ix_parent_name", "parents", ["last_name", "first_name"], false],
      ["ix_class_staff_staff", "class_staff", ["staff_id"], false],
      ["ix_parent_student_student", "parent_student", ["student_id"], false],
    ];

    for (const [name, table, columns, unique] of indexes) {
      let builder = trx.schema
        .createIndex(name)
        .ifNotExists()
        .on(table)
        .columns(columns);
      if (unique) {
        builder = builder.unique();
      }
      await builder.execute();
    }
  });

  logger.info("Schema migration completed");
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Row counts for every mirror table
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of TABLES) {
    const result = await sql<{
      count: number;
    }>`SELECT COUNT(*) AS count FROM ${sql.table(table)}`.execute(db);
    stats.push({ table_name: table, row_count: Number(result.rows[0]?.count ?? 0) });
  }
  return stats;
}
