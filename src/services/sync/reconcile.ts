/**
 * Shared reconciliation helpers: field merging, per-record savepoints and
 * the page commit used by every person-type sync.
 */

import { sql, type Kysely, type Transaction } from "kysely";

import { errorMessage } from "../../errors.js";

import type { Database } from "../../db/schema.js";
import type { SyncLogger } from "../../logger.js";
import type { IdentityResolver } from "../../scraper/identity.js";
import type { PaginatedFetcher } from "../../scraper/paginator.js";
import type { Clock } from "../../utils/clock.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Everything a sync service needs, passed in explicitly.
 */
export interface SyncDeps {
  db: Kysely<Database>;
  fetcher: PaginatedFetcher;
  identity: IdentityResolver;
  clock: Clock;
  logger: SyncLogger;
}

export type FieldValue = string | number | null;

export type WriteOutcome = "created" | "updated" | "unchanged";

export interface PageHandlers<S, E> {
  personId(staged: S): number;
  /** Existing rows for the page, keyed by person_id, in one query */
  loadExisting(
    trx: Transaction<Database>,
    personIds: number[]
  ): Promise<Map<number, E>>;
  insertMany(trx: Transaction<Database>, staged: S[]): Promise<void>;
  update(
    trx: Transaction<Database>,
    staged: S,
    existing: E
  ): Promise<Exclude<WriteOutcome, "created">>;
  /** Relation work once the row exists; failures keep the row */
  afterWrite?(trx: Transaction<Database>, staged: S): Promise<void>;
}

export interface PageWriteResult {
  created: number;
  updated: number;
  unchanged: number;
  errors: number;
  /** Saved records whose relation writes failed; the records stay saved */
  relationErrors: number;
  savedIds: number[];
}

// ============================================================================
// Field Merging
// ============================================================================

function isEmpty(value: FieldValue | undefined): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === "string" && value.trim() === "")
  );
}

/**
 * Fields that would change if `incoming` were applied to `existing`.
 * An empty incoming value never overwrites a populated one.
 */
export function mergeFields<F extends { [K in keyof F]: FieldValue }>(
  existing: { [K in keyof F]: F[K] | null },
  incoming: F
): Partial<F> {
  const changes: Partial<F> = {};
  for (const key in incoming) {
    const next = incoming[key];
    if (isEmpty(next)) {
      continue;
    }
    if (next !== existing[key]) {
      changes[key] = next;
    }
  }
  return changes;
}

/**
 * Whether a stored row needs flipping back to active.
 */
export function needsReactivation(row: {
  is_active: number;
  deactivated_at: string | null;
}): boolean {
  return row.is_active !== 1 || row.deactivated_at !== null;
}

// ============================================================================
// Savepoints
// ============================================================================

/**
 * Run `work` under a savepoint. On failure only the savepoint's writes are
 * undone and the error is returned instead of thrown.
 */
export async function withSavepoint(
  trx: Transaction<Database>,
  name: string,
  work: () => Promise<void>
): Promise<{ ok: true } | { ok: false; error: unknown }> {
  await sql`SAVEPOINT ${sql.raw(name)}`.execute(trx);
  try {
    await work();
    await sql`RELEASE SAVEPOINT ${sql.raw(name)}`.execute(trx);
    return { ok: true };
  } catch (error) {
    await sql`ROLLBACK TO SAVEPOINT ${sql.raw(name)}`.execute(trx);
    await sql`RELEASE SAVEPOINT ${sql.raw(name)}`.execute(trx);
    return { ok: false, error };
  }
}

// ============================================================================
// Page Commit
// ============================================================================

/**
 * Write one page of staged records as a single transaction.
 *
 * Existing rows are loaded in one query; new rows go in one bulk insert.
 * Every record runs under its own savepoint, so a failing record rolls back
 * only itself. If the bulk insert fails the creates are retried one by one
 * to isolate the bad row.
 */
export async function commitPage<S, E>(
  db: Kysely<Database>,
  staged: S[],
  handlers: PageHandlers<S, E>,
  logger: SyncLogger,
  entity: string
): Promise<PageWriteResult> {
  const result: PageWriteResult = {
    created: 0,
    updated: 0,
    unchanged: 0,
    errors: 0,
    relationErrors: 0,
    savedIds: [],
  };

  if (staged.length === 0) {
    return result;
  }

  const runAfterWrite = async (
    trx: Transaction<Database>,
    item: S,
    personId: number
  ): Promise<void> => {
    const { afterWrite } = handlers;
    if (afterWrite === undefined) {
      return;
    }
    const relations = await withSavepoint(trx, "relations", () =>
      afterWrite(trx, item)
    );
    if (!relations.ok) {
      result.relationErrors++;
      logger.error(
        { entity, personId, error: errorMessage(relations.error) },
        "Failed to write relations"
      );
    }
  };

  const writeAll = async (trx: Transaction<Database>): Promise<void> => {
    const existing = await handlers.loadExisting(
      trx,
      staged.map((s) => handlers.personId(s))
    );

    const creates: S[] = [];
    for (const item of staged) {
      const personId = handlers.personId(item);
      const row = existing.get(personId);
      if (row === undefined) {
        creates.push(item);
        continue;
      }

      const write = await withSavepoint(trx, "record_write", async () => {
        const outcome = await handlers.update(trx, item, row);
        result[outcome]++;
      });
      if (write.ok) {
        result.savedIds.push(personId);
        await runAfterWrite(trx, item, personId);
      } else {
        result.errors++;
        logger.error(
          { entity, personId, error: errorMessage(write.error) },
          "Failed to update record"
        );
      }
    }

    if (creates.length === 0) {
      return;
    }

    const bulk = await withSavepoint(trx, "bulk_insert", () =>
      handlers.insertMany(trx, creates)
    );

    if (bulk.ok) {
      for (const item of creates) {
        const personId = handlers.personId(item);
        result.created++;
        result.savedIds.push(personId);
        await runAfterWrite(trx, item, personId);
      }
      return;
    }

    logger.warn(
      { entity, count: creates.length, error: errorMessage(bulk.error) },
      "Bulk insert failed, inserting one by one"
    );

    for (const item of creates) {
      const personId = handlers.personId(item);
      const insert = await withSavepoint(trx, "record_write", () =>
        handlers.insertMany(trx, [item])
      );
      if (insert.ok) {
        result.created++;
        result.savedIds.push(personId);
        await runAfterWrite(trx, item, personId);
      } else {
        result.errors++;
        logger.error(
          { entity, personId, error: errorMessage(insert.error) },
          "Failed to insert record"
        );
      }
    }
  };

  try {
    await db.transaction().execute(writeAll);
  } catch (error) {
    // The page transaction rolled back as a whole
    logger.error(
      { entity, count: staged.length, error: errorMessage(error) },
      "Page transaction failed"
    );
    return {
      created: 0,
      updated: 0,
      unchanged: 0,
      errors: staged.length,
      relationErrors: 0,
      savedIds: [],
    };
  }

  return result;
}

// ============================================================================
// Set Helpers
// ============================================================================

/**
 * Ids in `previous` that are missing from `current`.
 */
export function missingIds(
  previous: Iterable<number>,
  current: ReadonlySet<number>
): number[] {
  const missing: number[] = [];
  for (const id of previous) {
    if (!current.has(id)) {
      missing.push(id);
    }
  }
  return missing;
}

/**
 * Split into chunks of at most `size` (keeps IN lists under SQLite's
 * bound-parameter limit).
 */
export function chunk<T>(items: T[], size = 500): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
