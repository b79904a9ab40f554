/**
 * Student sync, one class at a time: GET /student_profiles into `students`,
 * with the embedded parents upserted into `parents` and linked through
 * `parent_student`.
 */

import {
  chunk,
  commitPage,
  mergeFields,
  missingIds,
  needsReactivation,
  withSavepoint,
  type SyncDeps,
} from "./reconcile.js";
import { errorMessage } from "../../errors.js";
import {
  parseParentRecord,
  parseStudentRecord,
  type ValidParentRecord,
  type ValidStudentRecord,
} from "../../types/api.js";
import { emptyStats, type ExternalIdentity, type SyncStats } from "../../types/index.js";
import {
  nonEmpty,
  normalizeEmail,
  normalizePhone,
  splitFullName,
} from "../../utils/normalize.js";

import type { Database, Student } from "../../db/schema.js";
import type { Transaction } from "kysely";

export const STUDENT_ENDPOINT = "student_profiles";

export interface StudentFields {
  user_name: string | null;
  last_name: string | null;
  first_name: string | null;
  middle_name: string | null;
  email: string | null;
  phone: string | null;
  class_unit_id: number;
  external_id: string | null;
  external_link: string | null;
}

export interface ParentFields {
  name: string | null;
  last_name: string | null;
  first_name: string | null;
  middle_name: string | null;
  email: string | null;
  phone: string | null;
  external_id: string | null;
  external_link: string | null;
}

export interface StagedParent {
  personId: number;
  fields: ParentFields;
}

export interface StagedStudent {
  personId: number;
  fields: StudentFields;
  parents: StagedParent[];
}

export interface StudentSyncResult {
  students: SyncStats;
  parents: SyncStats;
}

export function toStudentFields(
  record: ValidStudentRecord,
  classUnitId: number,
  identity: ExternalIdentity | null
): StudentFields {
  let lastName = nonEmpty(record.last_name);
  let firstName = nonEmpty(record.first_name);
  let middleName = nonEmpty(record.middle_name);

  if (lastName === null && firstName === null) {
    const parts = splitFullName(record.name);
    lastName = parts.lastName;
    firstName = parts.firstName;
    middleName = middleName ?? parts.middleName;
  }

  return {
    user_name: nonEmpty(record.user_name),
    last_name: lastName,
    first_name: firstName,
    middle_name: middleName,
    email: normalizeEmail(record.email_ezd) ?? normalizeEmail(record.email),
    phone: normalizePhone(record.phone_number),
    class_unit_id: classUnitId,
    external_id: identity?.externalId ?? null,
    external_link: identity?.externalLink ?? null,
  };
}

export function toParentFields(
  record: ValidParentRecord,
  identity: ExternalIdentity | null
): ParentFields {
  const { lastName, firstName, middleName } = splitFullName(record.name);
  return {
    name: nonEmpty(record.name),
    last_name: lastName,
    first_name: firstName,
    middle_name: middleName,
    email: normalizeEmail(record.email),
    phone: normalizePhone(record.phone_number),
    external_id: identity?.externalId ?? null,
    external_link: identity?.externalLink ?? null,
  };
}

export class StudentSyncService {
  constructor(private deps: SyncDeps) {}

  /**
   * Sync the students (and their parents) of one class.
   */
  async syncClass(classUnitId: number): Promise<StudentSyncResult> {
    const { fetcher, logger } = this.deps;
    const students = emptyStats();
    const parents = emptyStats();
    const currentSet = new Set<number>();

    logger.info({ classUnitId }, "Starting student sync for class");
    await this.ensureClass(classUnitId);

    for await (const page of fetcher.fetchPages(STUDENT_ENDPOINT, {
      class_unit_ids: classUnitId,
      with_deleted: "false",
      with_parents: "true",
      with_user_info: "true",
    })) {
      if (page.status === "failed") {
        students.fetchFailed = true;
        logger.error(
          { classUnitId, page: page.page, reason: page.reason },
          "Student fetch failed, keeping existing rows active"
        );
        break;
      }

      students.pages++;
      students.seen += page.records.length;

      const staged = await this.stagePage(
        page.records,
        classUnitId,
        { students, parents },
        currentSet
      );
      await this.writePage(staged, { students, parents });
    }

    if (students.fetchFailed) {
      logger.warn({ classUnitId }, "Skipping student deactivation: fetch incomplete");
    } else if (currentSet.size === 0) {
      logger.warn({ classUnitId }, "Skipping student deactivation: class returned no students");
    } else {
      students.deactivated = await this.deactivateMissing(classUnitId, currentSet);
    }

    logger.info(
      { classUnitId, students: { ...students }, parents: { ...parents } },
      "Class student sync completed"
    );
    return { students, parents };
  }

  /**
   * Deactivate active parents with no link to an active student.
   */
  async deactivateOrphanParents(): Promise<number> {
    const { db, clock, logger } = this.deps;
    const now = clock.wallTime().toISOString();

    const result = await db
      .updateTable("parents")
      .set({ is_active: 0, deactivated_at: now, updated_at: now })
      .where("is_active", "=", 1)
      .where(({ not, exists, selectFrom }) =>
        not(
          exists(
            selectFrom("parent_student")
              .innerJoin("students", "students.id", "parent_student.student_id")
              .select("parent_student.id")
              .whereRef("parent_student.parent_id", "=", "parents.id")
              .where("students.is_active", "=", 1)
          )
        )
      )
      .executeTakeFirst();

    const count = Number(result.numUpdatedRows);
    if (count > 0) {
      logger.info({ count }, "Deactivated parents without active students");
    }
    return count;
  }

  /**
   * Validate, normalize and resolve identities for one page, outside any
   * transaction.
   */
  async stagePage(
    records: unknown[],
    classUnitId: number,
    stats: StudentSyncResult,
    currentSet: Set<number>
  ): Promise<StagedStudent[]> {
    const { identity, logger } = this.deps;
    const valid: { record: ValidStudentRecord; parents: ValidParentRecord[] }[] = [];

    for (const raw of records) {
      const parsed = parseStudentRecord(raw);
      if (!parsed.ok) {
        if (parsed.reason === "invalid") {
          stats.students.invalid++;
          logger.warn({ classUnitId, record: raw }, "Invalid student record");
        } else {
          stats.students.skipped++;
        }
        continue;
      }

      const record = parsed.record;
      if (currentSet.has(record.person_id)) {
        stats.students.duplicates++;
        continue;
      }
      currentSet.add(record.person_id);

      // Siblings share parents; only a repeat under one student is a duplicate
      const parents: ValidParentRecord[] = [];
      const parentIds = new Set<number>();
      for (const rawParent of record.parents ?? []) {
        stats.parents.seen++;
        const parent = parseParentRecord(rawParent);
        if (parent.ok) {
          if (parentIds.has(parent.record.person_id)) {
            stats.parents.duplicates++;
            continue;
          }
          parentIds.add(parent.record.person_id);
          parents.push(parent.record);
        } else if (parent.reason === "invalid") {
          stats.parents.invalid++;
        } else {
          stats.parents.skipped++;
        }
      }

      valid.push({ record, parents });
    }

    const personIds = new Set<number>();
    for (const { record, parents } of valid) {
      personIds.add(record.person_id);
      for (const parent of parents) {
        personIds.add(parent.person_id);
      }
    }
    const identities = await identity.resolveBatch("person", [...personIds]);
    const lookup = (id: number): ExternalIdentity | null =>
      identities.get(String(id)) ?? null;

    return valid.map(({ record, parents }) => ({
      personId: record.person_id,
      fields: toStudentFields(record, classUnitId, lookup(record.person_id)),
      parents: parents.map((parent) => ({
        personId: parent.person_id,
        fields: toParentFields(parent, lookup(parent.person_id)),
      })),
    }));
  }

  private async writePage(
    staged: StagedStudent[],
    stats: StudentSyncResult
  ): Promise<void> {
    const { db, clock, logger } = this.deps;
    const now = clock.wallTime().toISOString();

    const result = await commitPage<StagedStudent, Student>(
      db,
      staged,
      {
        personId: (s) => s.personId,
        loadExisting: async (trx, personIds) => {
          const rows = await trx
            .selectFrom("students")
            .selectAll()
            .where("person_id", "in", personIds)
            .execute();
          return new Map(rows.map((row) => [row.person_id, row]));
        },
        insertMany: async (trx, items) => {
          await trx
            .insertInto("students")
            .values(
              items.map((s) => ({
                person_id: s.personId,
                ...s.fields,
                is_active: 1,
                deactivated_at: null,
                created_at: now,
                updated_at: now,
              }))
            )
            .execute();
        },
        update: async (trx, s, existing) => {
          const changes = mergeFields<StudentFields>(existing, s.fields);
          if (Object.keys(changes).length === 0 && !needsReactivation(existing)) {
            return "unchanged";
          }
          await trx
            .updateTable("students")
            .set({ ...changes, is_active: 1, deactivated_at: null, updated_at: now })
            .where("id", "=", existing.id)
            .execute();
          return "updated";
        },
        afterWrite: (trx, s) => this.writeParents(trx, s, stats.parents, now),
      },
      logger,
      "students"
    );

    stats.students.created += result.created;
    stats.students.updated += result.updated;
    stats.students.unchanged += result.unchanged;
    stats.students.saved += result.savedIds.length;
    stats.students.errors += result.errors;
    stats.parents.errors += result.relationErrors;
  }

  /**
   * Upsert a student's parents and link them. Each parent has its own
   * savepoint; a failing parent is counted and skipped.
   */
  private async writeParents(
    trx: Transaction<Database>,
    student: StagedStudent,
    stats: SyncStats,
    now: string
  ): Promise<void> {
    if (student.parents.length === 0) {
      return;
    }

    const row = await trx
      .selectFrom("students")
      .select("id")
      .where("person_id", "=", student.personId)
      .executeTakeFirstOrThrow();

    for (const parent of student.parents) {
      const write = await withSavepoint(trx, "parent_write", async () => {
        const parentId = await this.upsertParent(trx, parent, stats, now);
        await trx
          .insertInto("parent_student")
          .values({
            parent_id: parentId,
            student_id: row.id,
            relationship_type: null,
            created_at: now,
          })
          .onConflict((oc) => oc.columns(["parent_id", "student_id"]).doNothing())
          .execute();
      });

      if (write.ok) {
        stats.saved++;
      } else {
        stats.errors++;
        this.deps.logger.error(
          {
            parentId: parent.personId,
            studentId: student.personId,
            error: errorMessage(write.error),
          },
          "Failed to save parent"
        );
      }
    }
  }

  private async upsertParent(
    trx: Transaction<Database>,
    parent: StagedParent,
    stats: SyncStats,
    now: string
  ): Promise<number> {
    const existing = await trx
      .selectFrom("parents")
      .selectAll()
      .where("person_id", "=", parent.personId)
      .executeTakeFirst();

    if (existing === undefined) {
      const inserted = await trx
        .insertInto("parents")
        .values({
          person_id: parent.personId,
          ...parent.fields,
          is_active: 1,
          deactivated_at: null,
          created_at: now,
          updated_at: now,
        })
        .returning("id")
        .executeTakeFirstOrThrow();
      stats.created++;
      return inserted.id;
    }

    const changes = mergeFields<ParentFields>(existing, parent.fields);
    if (Object.keys(changes).length === 0 && !needsReactivation(existing)) {
      stats.unchanged++;
      return existing.id;
    }

    await trx
      .updateTable("parents")
      .set({ ...changes, is_active: 1, deactivated_at: null, updated_at: now })
      .where("id", "=", existing.id)
      .execute();
    stats.updated++;
    return existing.id;
  }

  /**
   * Students are only deactivated within the class that was fetched.
   */
  private async deactivateMissing(
    classUnitId: number,
    currentSet: ReadonlySet<number>
  ): Promise<number> {
    const { db, clock, logger } = this.deps;
    const now = clock.wallTime().toISOString();

    const count = await db.transaction().execute(async (trx) => {
      const active = await trx
        .selectFrom("students")
        .select("person_id")
        .where("class_unit_id", "=", classUnitId)
        .where("is_active", "=", 1)
        .execute();

      const missing = missingIds(
        active.map((row) => row.person_id),
        currentSet
      );

      let updated = 0;
      for (const ids of chunk(missing)) {
        const result = await trx
          .updateTable("students")
          .set({ is_active: 0, deactivated_at: now, updated_at: now })
          .where("person_id", "in", ids)
          .executeTakeFirst();
        updated += Number(result.numUpdatedRows);
      }
      return updated;
    });

    if (count > 0) {
      logger.info({ classUnitId, count }, "Deactivated students missing from class");
    }
    return count;
  }

  /**
   * Students reference their class, so a class synced on its own (without
   * the class stage) gets a placeholder row.
   */
  private async ensureClass(classUnitId: number): Promise<void> {
    const { db, clock } = this.deps;
    const now = clock.wallTime().toISOString();
    await db
      .insertInto("class_units")
      .values({
        id: classUnitId,
        name: `Class_${String(classUnitId)}`,
        school_id: null,
        class_level_id: null,
        parallel: null,
        literal: null,
        created_at: now,
        updated_at: now,
      })
      .onConflict((oc) => oc.column("id").doNothing())
      .execute();
  }
}
