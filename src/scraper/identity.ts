/**
 * External identity resolution.
 *
 * Two stages per person:
 * 1. Ask the directory's partner endpoint for the person's link
 *    (`?staff_id=` for staff, `?person_id=` for students and parents).
 * 2. Load the link and pull the numeric user id out of the page's inline
 *    state (`data:{user:{id:123,`), falling back to scanning <script> blocks.
 *
 * Every outcome, including "not found", is memoized for the lifetime of the
 * resolver so one sync run never asks twice for the same person.
 */

import { DEFAULT_RETRY_AFTER_MS, httpGet, parseRetryAfter, type FetchFn } from "./http.js";
import { parseIdentityLink } from "../types/api.js";
import {
  found,
  notFound,
  transientFailure,
  type ExternalIdentity,
  type IdentityKind,
  type LookupResult,
} from "../types/index.js";
import { systemClock, type Clock } from "../utils/clock.js";

import type { RateLimiter } from "./rate-limiter.js";
import type { SyncLogger } from "../logger.js";

const PRIMARY_ID_PATTERN = /data:\{user:\{id:(\d+),/;
const SCRIPT_ID_PATTERN = /user:\{id:(\d+),/;
const SCRIPT_BLOCK_PATTERN = /<script\b[^>]*>([\s\S]*?)<\/script>/gi;

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export interface IdentityResolverOptions {
  /** Partner endpoint, e.g. https://host/v2/external-partners/check-for-max-user */
  identityUrl: string;
  rateLimiter: RateLimiter;
  logger: SyncLogger;
  headers?: Record<string, string>;
  fetch?: FetchFn;
  clock?: Clock;
  timeoutMs?: number;
  maxRetries?: number;
  /** Pause between the two stages */
  pacingMs?: number;
  /** Backoff step after a network error in stage one */
  networkBackoffMs?: number;
  /** Batch helper: pause between calls */
  batchDelayMs?: number;
  /** Batch helper: longer pause after every 5th call */
  batchPauseMs?: number;
}

/**
 * Extract the numeric identity from the link page.
 */
export function extractExternalId(html: string): string | null {
  const direct = PRIMARY_ID_PATTERN.exec(html);
  if (direct?.[1] !== undefined) {
    return direct[1];
  }

  for (const block of html.matchAll(SCRIPT_BLOCK_PATTERN)) {
    const script = block[1];
    if (script === undefined || !script.includes("user:{id:")) {
      continue;
    }
    const match = SCRIPT_ID_PATTERN.exec(script);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }

  return null;
}

export class IdentityResolver {
  private cache = new Map<string, LookupResult<ExternalIdentity>>();
  private fetchFn: FetchFn;
  private clock: Clock;
  private maxRetries: number;
  private pacingMs: number;
  private networkBackoffMs: number;
  private batchDelayMs: number;
  private batchPauseMs: number;

  constructor(private options: IdentityResolverOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.maxRetries = options.maxRetries ?? 3;
    this.pacingMs = options.pacingMs ?? 2000;
    this.networkBackoffMs = options.networkBackoffMs ?? DEFAULT_RETRY_AFTER_MS;
    this.batchDelayMs = options.batchDelayMs ?? 2000;
    this.batchPauseMs = options.batchPauseMs ?? 10_000;
  }

  /**
   * Resolve one person's external identity.
   */
  async resolve(
    kind: IdentityKind,
    id: string | number,
    maxRetries: number = this.maxRetries
  ): Promise<LookupResult<ExternalIdentity>> {
    const cacheKey = `${kind}:${String(id)}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      this.options.logger.debug({ kind, id }, "Identity cache hit");
      return cached;
    }

    const result = await this.lookup(kind, id, maxRetries);
    this.cache.set(cacheKey, result);
    return result;
  }

  /**
   * Best-effort variant for the sync services: anything but a found
   * identity becomes null. Never throws.
   */
  async resolveOrNull(
    kind: IdentityKind,
    id: string | number | null | undefined,
    maxRetries?: number
  ): Promise<ExternalIdentity | null> {
    if (id === null || id === undefined || id === "") {
      return null;
    }
    try {
      const result = await this.resolve(kind, id, maxRetries);
      return result.kind === "found" ? result.value : null;
    } catch (error) {
      this.options.logger.debug({ kind, id, error }, "Identity lookup threw");
      return null;
    }
  }

  /**
   * Resolve many ids of one kind with pacing between network calls:
   * a short delay after each, a longer pause after every 5th.
   */
  async resolveBatch(
    kind: IdentityKind,
    ids: (string | number)[],
    maxRetries = 2
  ): Promise<Map<string, ExternalIdentity | null>> {
    const { logger } = this.options;
    const results = new Map<string, ExternalIdentity | null>();
    const total = ids.length;
    let networkCalls = 0;

    if (total > 0) {
      logger.info({ kind, total }, "Resolving external identities");
    }

    for (const [index, id] of ids.entries()) {
      if ((index + 1) % 10 === 0) {
        logger.info(
          {
            kind,
            progress: `${String(index + 1)}/${String(total)}`,
            percent: `${(((index + 1) / total) * 100).toFixed(1)}%`,
          },
          "Identity resolution progress"
        );
      }

      const wasCached = this.isCached(kind, id);
      results.set(String(id), await this.resolveOrNull(kind, id, maxRetries));

      if (wasCached) {
        continue;
      }
      networkCalls++;
      if (networkCalls % 5 === 0) {
        logger.debug(
          { kind, networkCalls, pauseMs: this.batchPauseMs },
          "Pausing identity lookups"
        );
        await this.clock.sleep(this.batchPauseMs);
      } else {
        await this.clock.sleep(this.batchDelayMs);
      }
    }

    return results;
  }

  isCached(kind: IdentityKind, id: string | number): boolean {
    return this.cache.has(`${kind}:${String(id)}`);
  }

  cacheSize(): number {
    return this.cache.size;
  }

  // ==========================================================================
  // Protocol
  // ==========================================================================

  private linkRequestUrl(kind: IdentityKind, id: string | number): string {
    const param = kind === "staff" ? "staff_id" : "person_id";
    const url = new URL(this.options.identityUrl);
    url.searchParams.set(param, String(id));
    return url.toString();
  }

  private async lookup(
    kind: IdentityKind,
    id: string | number,
    maxRetries: number
  ): Promise<LookupResult<ExternalIdentity>> {
    const { logger, rateLimiter } = this.options;
    const linkUrl = this.linkRequestUrl(kind, id);
    let attempts = 0;

    const backOff = async (waitMs: number, reason: string): Promise<void> => {
      attempts++;
      if (attempts < maxRetries) {
        logger.warn({ kind, id, attempts, waitMs, reason }, "Identity lookup backing off");
        await this.clock.sleep(waitMs);
      }
    };

    while (attempts < maxRetries) {
      await rateLimiter.admit();

      // Stage 1: link
      const linkResponse = await httpGet(this.fetchFn, linkUrl, logger, {
        headers: this.options.headers,
        timeoutMs: this.options.timeoutMs,
      });

      if (linkResponse.kind !== "found") {
        await backOff(this.networkBackoffMs * (attempts + 1), "network error");
        continue;
      }

      const { status, headers, body } = linkResponse.value;
      if (status === 429) {
        await backOff(parseRetryAfter(headers), "rate limited");
        continue;
      }
      if (status !== 200) {
        logger.debug({ kind, id, status }, "No external identity");
        return notFound;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        logger.debug({ kind, id }, "Identity link response is not JSON");
        return notFound;
      }

      const link = parseIdentityLink(payload);
      if (link === null) {
        return notFound;
      }

      await this.clock.sleep(this.pacingMs);

      // Stage 2: page behind the link
      const pageResponse = await httpGet(this.fetchFn, link, logger, {
        headers: { "user-agent": BROWSER_USER_AGENT },
        timeoutMs: this.options.timeoutMs,
      });

      if (pageResponse.kind !== "found") {
        return found({ externalId: null, externalLink: link });
      }

      const page = pageResponse.value;
      if (page.status === 200) {
        const externalId = extractExternalId(page.body);
        if (externalId === null) {
          logger.debug({ kind, id }, "External id not present on link page");
        } else {
          logger.debug({ kind, id, externalId }, "External identity resolved");
        }
        return found({ externalId, externalLink: link });
      }
      if (page.status === 429) {
        await backOff(parseRetryAfter(page.headers), "rate limited on link page");
        continue;
      }

      logger.debug({ kind, id, status: page.status }, "Link page unavailable");
      return found({ externalId: null, externalLink: link });
    }

    logger.warn({ kind, id, maxRetries }, "External identity lookup exhausted retries");
    return transientFailure(
      `identity lookup gave up after ${String(maxRetries)} attempts`
    );
  }
}
