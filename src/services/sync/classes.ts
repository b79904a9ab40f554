/**
 * Class sync: GET /class_units into `class_units`, plus mentor links in
 * `class_staff`.
 */

import { mergeFields, withSavepoint, type SyncDeps } from "./reconcile.js";
import { errorMessage } from "../../errors.js";
import { parseClassUnitRecord, type ClassUnitRecord } from "../../types/api.js";
import { emptyStats, type SyncStats } from "../../types/index.js";
import { nonEmpty, parseClassName } from "../../utils/normalize.js";

import type { Database } from "../../db/schema.js";
import type { Transaction } from "kysely";

export const CLASS_ENDPOINT = "class_units";

export interface ClassFields {
  name: string;
  school_id: number | null;
  class_level_id: number | null;
  parallel: string | null;
  literal: string | null;
}

export interface ClassSyncResult {
  stats: SyncStats;
  /** Valid class ids in API order, for the student stage */
  classIds: number[];
  /** Mentor links written to class_staff */
  staffLinks: number;
}

export function toClassFields(record: ClassUnitRecord): ClassFields {
  const name = nonEmpty(record.name) ?? `Class_${String(record.id)}`;
  const { parallel, literal } = parseClassName(name);
  return {
    name,
    school_id: record.school_id ?? null,
    class_level_id: record.class_level_id ?? null,
    parallel,
    literal,
  };
}

export class ClassSyncService {
  constructor(private deps: SyncDeps) {}

  async sync(): Promise<ClassSyncResult> {
    const { db, fetcher, logger } = this.deps;
    const stats = emptyStats();
    const result: ClassSyncResult = { stats, classIds: [], staffLinks: 0 };

    logger.info("Starting class sync");

    const response = await fetcher.fetchOnce(CLASS_ENDPOINT, {
      with_home_based: "true",
    });
    if (response.kind !== "found") {
      stats.fetchFailed = true;
      logger.error(
        { reason: response.kind === "not-found" ? "not found" : response.reason },
        "Class list fetch failed"
      );
      return result;
    }

    stats.pages = 1;
    stats.seen = response.value.length;

    const records: ClassUnitRecord[] = [];
    const seen = new Set<number>();
    for (const raw of response.value) {
      const record = parseClassUnitRecord(raw);
      if (record === null) {
        stats.invalid++;
        logger.warn({ record: raw }, "Invalid class record");
        continue;
      }
      if (seen.has(record.id)) {
        stats.duplicates++;
        continue;
      }
      seen.add(record.id);
      records.push(record);
    }

    await db.transaction().execute(async (trx) => {
      for (const record of records) {
        const write = await withSavepoint(trx, "class_write", async () => {
          const outcome = await this.upsertClass(trx, record);
          stats[outcome]++;
          if (Array.isArray(record.mentor_ids)) {
            result.staffLinks += await this.rebuildMentorLinks(
              trx,
              record.id,
              record.mentor_ids
            );
          }
        });
        if (write.ok) {
          stats.saved++;
          result.classIds.push(record.id);
        } else {
          stats.errors++;
          logger.error(
            { classId: record.id, error: errorMessage(write.error) },
            "Failed to save class"
          );
        }
      }
    });

    logger.info({ ...stats, staffLinks: result.staffLinks }, "Class sync completed");
    return result;
  }

  private async upsertClass(
    trx: Transaction<Database>,
    record: ClassUnitRecord
  ): Promise<"created" | "updated" | "unchanged"> {
    const now = this.deps.clock.wallTime().toISOString();
    const fields = toClassFields(record);

    const existing = await trx
      .selectFrom("class_units")
      .selectAll()
      .where("id", "=", record.id)
      .executeTakeFirst();

    if (existing === undefined) {
      await trx
        .insertInto("class_units")
        .values({ id: record.id, ...fields, created_at: now, updated_at: now })
        .execute();
      return "created";
    }

    const changes = mergeFields<ClassFields>(existing, fields);
    if (Object.keys(changes).length === 0) {
      return "unchanged";
    }

    await trx
      .updateTable("class_units")
      .set({ ...changes, updated_at: now })
      .where("id", "=", record.id)
      .execute();
    return "updated";
  }

  /**
   * Replace the class's staff links with its current mentors. Mentors not
   * (or no longer) active in `staff` are left out.
   */
  private async rebuildMentorLinks(
    trx: Transaction<Database>,
    classUnitId: number,
    mentorIds: number[]
  ): Promise<number> {
    const now = this.deps.clock.wallTime().toISOString();

    await trx
      .deleteFrom("class_staff")
      .where("class_unit_id", "=", classUnitId)
      .execute();

    if (mentorIds.length === 0) {
      return 0;
    }

    const staff = await trx
      .selectFrom("staff")
      .select(["id", "person_id"])
      .where("person_id", "in", mentorIds)
      .where("is_active", "=", 1)
      .execute();

    const byPersonId = new Map(staff.map((row) => [row.person_id, row.id]));
    let linked = 0;

    for (const mentorId of new Set(mentorIds)) {
      const staffId = byPersonId.get(mentorId);
      if (staffId === undefined) {
        this.deps.logger.debug({ classUnitId, mentorId }, "Mentor not in staff");
        continue;
      }
      await trx
        .insertInto("class_staff")
        .values({
          class_unit_id: classUnitId,
          staff_id: staffId,
          is_leader: 1,
          subject: null,
          created_at: now,
        })
        .execute();
      linked++;
    }

    return linked;
  }
}
