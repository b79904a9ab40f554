/**
 * Staff sync: GET /teacher_profiles, paged, into the `staff` table.
 */

import { commitPage, chunk, mergeFields, missingIds, needsReactivation, type SyncDeps } from "./reconcile.js";
import { parseStaffRecord, type ValidStaffRecord } from "../../types/api.js";
import { emptyStats, type ExternalIdentity, type SyncStats } from "../../types/index.js";
import {
  isSuspiciousName,
  nonEmpty,
  normalizeEmail,
  normalizePhone,
  parseApiDate,
  splitFullName,
} from "../../utils/normalize.js";

import type { Database, Staff } from "../../db/schema.js";
import type { Kysely } from "kysely";

export const STAFF_ENDPOINT = "teacher_profiles";

/** Columns taken from the API; bookkeeping columns are managed separately */
export interface StaffFields {
  user_id: number;
  name: string | null;
  last_name: string | null;
  first_name: string | null;
  middle_name: string | null;
  email: string | null;
  phone: string | null;
  type: string | null;
  external_id: string | null;
  external_link: string | null;
  updated_at_api: string | null;
}

export interface StagedStaff {
  personId: number;
  fields: StaffFields;
}

/**
 * Map a validated API record to staff columns.
 * Names come from the nested user, falling back to splitting `name`.
 */
export function toStaffFields(
  record: ValidStaffRecord,
  identity: ExternalIdentity | null
): StaffFields {
  const user = record.user ?? {};
  let lastName = nonEmpty(user.last_name);
  let firstName = nonEmpty(user.first_name);
  let middleName = nonEmpty(user.middle_name);

  if (lastName === null && firstName === null) {
    const parts = splitFullName(record.name);
    lastName = parts.lastName;
    firstName = parts.firstName;
    middleName = middleName ?? parts.middleName;
  }

  return {
    user_id: record.user_id,
    name: nonEmpty(record.name),
    last_name: lastName,
    first_name: firstName,
    middle_name: middleName,
    email: normalizeEmail(user.email) ?? normalizeEmail(user.email_ezd),
    phone: normalizePhone(user.phone_number),
    type: nonEmpty(record.type),
    external_id: identity?.externalId ?? null,
    external_link: identity?.externalLink ?? null,
    updated_at_api: parseApiDate(record.updated_at),
  };
}

export class StaffSyncService {
  constructor(
    private deps: SyncDeps,
    private schoolId: number
  ) {}

  /**
   * Fetch every staff page and reconcile the table against it.
   */
  async sync(): Promise<SyncStats> {
    const { fetcher, logger } = this.deps;
    const stats = emptyStats();
    const currentSet = new Set<number>();

    logger.info({ schoolId: this.schoolId }, "Starting staff sync");

    for await (const page of fetcher.fetchPages(STAFF_ENDPOINT, {
      school_id: this.schoolId,
    })) {
      if (page.status === "failed") {
        stats.fetchFailed = true;
        logger.error(
          { page: page.page, reason: page.reason },
          "Staff fetch failed, keeping existing rows active"
        );
        break;
      }

      stats.pages++;
      stats.seen += page.records.length;

      const staged = await this.stagePage(page.records, stats, currentSet);
      await this.writePage(staged, stats);

      logger.info(
        {
          page: page.page,
          records: page.records.length,
          staged: staged.length,
          saved: stats.saved,
        },
        "Staff page processed"
      );
    }

    await this.finish(currentSet, stats);

    logger.info({ ...stats }, "Staff sync completed");
    return stats;
  }

  /**
   * Validate and normalize a page outside any transaction.
   * Identities are resolved here so no network wait holds a write lock.
   */
  async stagePage(
    records: unknown[],
    stats: SyncStats,
    currentSet: Set<number>
  ): Promise<StagedStaff[]> {
    const { identity, logger } = this.deps;
    const valid: ValidStaffRecord[] = [];

    for (const raw of records) {
      const parsed = parseStaffRecord(raw);
      if (!parsed.ok) {
        if (parsed.reason === "invalid") {
          stats.invalid++;
          logger.warn({ record: raw }, "Invalid staff record");
        } else {
          stats.skipped++;
        }
        continue;
      }

      const record = parsed.record;
      if (isSuspiciousName(record.name)) {
        stats.suspicious++;
        logger.debug({ id: record.id, name: record.name }, "Suspicious staff name");
        continue;
      }
      if (currentSet.has(record.id)) {
        stats.duplicates++;
        continue;
      }

      currentSet.add(record.id);
      valid.push(record);
    }

    const integrationIds: (string | number)[] = [];
    for (const record of valid) {
      const integrationId = record.user_integration_id;
      if (integrationId !== null && integrationId !== undefined && integrationId !== "") {
        integrationIds.push(integrationId);
      }
    }
    const identities = await identity.resolveBatch("staff", integrationIds);

    return valid.map((record) => {
      const integrationId = record.user_integration_id;
      const resolved =
        integrationId === null || integrationId === undefined
          ? null
          : (identities.get(String(integrationId)) ?? null);
      return { personId: record.id, fields: toStaffFields(record, resolved) };
    });
  }

  private async writePage(staged: StagedStaff[], stats: SyncStats): Promise<void> {
    const { db, clock, logger } = this.deps;
    const now = clock.wallTime().toISOString();

    const result = await commitPage<StagedStaff, Staff>(
      db,
      staged,
      {
        personId: (s) => s.personId,
        loadExisting: async (trx, personIds) => {
          const rows = await trx
            .selectFrom("staff")
            .selectAll()
            .where("person_id", "in", personIds)
            .execute();
          return new Map(rows.map((row) => [row.person_id, row]));
        },
        insertMany: async (trx, items) => {
          await trx
            .insertInto("staff")
            .values(
              items.map((s) => ({
                person_id: s.personId,
                ...s.fields,
                is_active: 1,
                deactivated_at: null,
                last_seen_at: now,
                created_at: now,
                updated_at: now,
              }))
            )
            .execute();
        },
        update: async (trx, s, existing) => {
          const changes = mergeFields<StaffFields>(existing, s.fields);
          const changed =
            Object.keys(changes).length > 0 || needsReactivation(existing);

          await trx
            .updateTable("staff")
            .set(
              changed
                ? {
                    ...changes,
                    is_active: 1,
                    deactivated_at: null,
                    last_seen_at: now,
                    updated_at: now,
                  }
                : { last_seen_at: now }
            )
            .where("id", "=", existing.id)
            .execute();

          return changed ? "updated" : "unchanged";
        },
      },
      logger,
      "staff"
    );

    stats.created += result.created;
    stats.updated += result.updated;
    stats.unchanged += result.unchanged;
    stats.saved += result.savedIds.length;
    stats.errors += result.errors;
  }

  /**
   * Deactivation and cleanup in one transaction. Deactivation is skipped
   * when the fetch did not complete or returned nobody.
   */
  private async finish(currentSet: Set<number>, stats: SyncStats): Promise<void> {
    const { db, clock, logger } = this.deps;
    const now = clock.wallTime().toISOString();

    await db.transaction().execute(async (trx) => {
      if (stats.fetchFailed) {
        logger.warn("Skipping staff deactivation: fetch incomplete");
      } else if (currentSet.size === 0) {
        logger.warn("Skipping staff deactivation: API returned no staff");
      } else {
        stats.deactivated = await deactivateMissingStaff(trx, currentSet, now);
      }
      stats.cleaned = await deactivateStaffWithoutUserId(trx, now);
    });

    if (stats.deactivated > 0) {
      logger.info({ count: stats.deactivated }, "Deactivated staff missing from API");
    }
    if (stats.cleaned > 0) {
      logger.info({ count: stats.cleaned }, "Deactivated staff without user_id");
    }
  }
}

/**
 * Deactivate active staff whose person_id is not in `currentSet`.
 */
export async function deactivateMissingStaff(
  db: Kysely<Database>,
  currentSet: ReadonlySet<number>,
  now: string
): Promise<number> {
  const active = await db
    .selectFrom("staff")
    .select("person_id")
    .where("is_active", "=", 1)
    .execute();

  const missing = missingIds(
    active.map((row) => row.person_id),
    currentSet
  );

  let count = 0;
  for (const ids of chunk(missing)) {
    const result = await db
      .updateTable("staff")
      .set({ is_active: 0, deactivated_at: now, updated_at: now })
      .where("person_id", "in", ids)
      .executeTakeFirst();
    count += Number(result.numUpdatedRows);
  }
  return count;
}

/**
 * Deactivate active staff rows that lack user_id.
 */
export async function deactivateStaffWithoutUserId(
  db: Kysely<Database>,
  now: string
): Promise<number> {
  const result = await db
    .updateTable("staff")
    .set({ is_active: 0, deactivated_at: now, updated_at: now })
    .where("user_id", "is", null)
    .where("is_active", "=", 1)
    .executeTakeFirst();
  return Number(result.numUpdatedRows);
}
