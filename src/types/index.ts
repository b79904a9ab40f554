// Shared types for the sync pipeline

// =====================
// Lookup Results
// =====================

/**
 * Outcome of a remote lookup. Retry decisions read `kind`;
 * only `transient-failure` is ever retried.
 */
export type LookupResult<T> =
  | { kind: "found"; value: T }
  | { kind: "not-found" }
  | { kind: "transient-failure"; reason: string; retryAfterMs?: number }
  | { kind: "permanent-failure"; reason: string };

export function found<T>(value: T): LookupResult<T> {
  return { kind: "found", value };
}

export const notFound = { kind: "not-found" } as const;

export function transientFailure(
  reason: string,
  retryAfterMs?: number
): LookupResult<never> {
  return retryAfterMs === undefined
    ? { kind: "transient-failure", reason }
    : { kind: "transient-failure", reason, retryAfterMs };
}

export function permanentFailure(reason: string): LookupResult<never> {
  return { kind: "permanent-failure", reason };
}

// =====================
// External Identity
// =====================

/**
 * Secondary identity from the dependent service. The link can be known
 * while the numeric id could not be extracted.
 */
export interface ExternalIdentity {
  externalId: string | null;
  externalLink: string;
}

/** Which query parameter the identity service is asked by. */
export type IdentityKind = "staff" | "person";

// =====================
// Sync Statistics
// =====================

export interface SyncStats {
  /** Records returned by the API for the scope */
  seen: number;
  /** Records written (created + updated + unchanged) */
  saved: number;
  created: number;
  updated: number;
  unchanged: number;
  /** Valid shape but missing the required field (user_id / person_id) */
  skipped: number;
  /** Staff with placeholder names */
  suspicious: number;
  /** Not an object, or failed schema validation */
  invalid: number;
  duplicates: number;
  errors: number;
  deactivated: number;
  /** Staff deactivated for lacking user_id */
  cleaned: number;
  pages: number;
  fetchFailed: boolean;
}

export function emptyStats(): SyncStats {
  return {
    seen: 0,
    saved: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    skipped: 0,
    suspicious: 0,
    invalid: 0,
    duplicates: 0,
    errors: 0,
    deactivated: 0,
    cleaned: 0,
    pages: 0,
    fetchFailed: false,
  };
}

/**
 * Add `source` counters into `target`. `fetchFailed` is sticky.
 */
export function mergeStats(target: SyncStats, source: SyncStats): SyncStats {
  target.seen += source.seen;
  target.saved += source.saved;
  target.created += source.created;
  target.updated += source.updated;
  target.unchanged += source.unchanged;
  target.skipped += source.skipped;
  target.suspicious += source.suspicious;
  target.invalid += source.invalid;
  target.duplicates += source.duplicates;
  target.errors += source.errors;
  target.deactivated += source.deactivated;
  target.cleaned += source.cleaned;
  target.pages += source.pages;
  target.fetchFailed = target.fetchFailed || source.fetchFailed;
  return target;
}
