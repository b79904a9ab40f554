import { systemClock, type Clock } from "../utils/clock.js";
import {
  found,
  permanentFailure,
  transientFailure,
  type LookupResult,
} from "../types/index.js";

import type { RequestParams } from "./cache.js";
import type { DirectoryClient } from "./client.js";
import type { SyncLogger } from "../logger.js";

/** A page shorter than this is the last one. */
export const LAST_PAGE_THRESHOLD = 10;

export type PageResult =
  | { status: "ok"; page: number; records: unknown[]; isLast: boolean }
  | { status: "failed"; page: number; reason: string };

export interface PaginatedFetcherOptions {
  maxRetries?: number;
  /** Linear backoff step: attempt n waits n x this */
  retryDelayMs?: number;
  /** Pause between consecutive pages */
  pageDelayMs?: number;
  clock?: Clock;
}

/**
 * Drives paged GET requests against the directory API.
 */
export class PaginatedFetcher {
  private maxRetries: number;
  private retryDelayMs: number;
  private pageDelayMs: number;
  private clock: Clock;

  constructor(
    private client: DirectoryClient,
    private logger: SyncLogger,
    options: PaginatedFetcherOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 10_000;
    this.pageDelayMs = options.pageDelayMs ?? 1000;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Request one array-valued resource. Any failed request (network error,
   * non-200 status, unparseable body) is retried; a 200 whose JSON body is
   * not an array is a permanent failure.
   */
  async fetchOnce(
    endpoint: string,
    params: RequestParams
  ): Promise<LookupResult<unknown[]>> {
    let lastReason = "no attempt made";

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const result = await this.client.request(endpoint, params);

      switch (result.kind) {
        case "found":
          if (!Array.isArray(result.value)) {
            this.logger.warn(
              { endpoint, params, type: typeof result.value },
              "Directory API returned a non-array body"
            );
            return permanentFailure("response body is not an array");
          }
          return found(result.value);
        case "not-found":
          lastReason = "resource not found (404)";
          break;
        case "permanent-failure":
        case "transient-failure":
          lastReason = result.reason;
          break;
      }

      if (attempt < this.maxRetries) {
        const retryAfterMs =
          result.kind === "transient-failure" ? (result.retryAfterMs ?? 0) : 0;
        const waitMs = Math.max(this.retryDelayMs * attempt, retryAfterMs);
        this.logger.warn(
          { endpoint, params, attempt, nextAttempt: attempt + 1, waitMs },
          "Request failed, retrying"
        );
        await this.clock.sleep(waitMs);
      }
    }

    this.logger.error(
      { endpoint, params, attempts: this.maxRetries, reason: lastReason },
      "Request failed after all retries"
    );
    return transientFailure(
      `failed after ${String(this.maxRetries)} attempts: ${lastReason}`
    );
  }

  /**
   * Lazily fetch pages 1, 2, ... of an endpoint.
   *
   * The sequence ends after a short page (fewer than LAST_PAGE_THRESHOLD
   * records) or with a single `failed` item once a page exhausts its
   * retries.
   */
  async *fetchPages(
    endpoint: string,
    baseParams: RequestParams
  ): AsyncGenerator<PageResult, void, undefined> {
    for (let page = 1; ; page++) {
      this.logger.info({ endpoint, page }, "Fetching page");

      const result = await this.fetchOnce(endpoint, { ...baseParams, page });
      if (result.kind !== "found") {
        const reason =
          result.kind === "not-found" ? "not found" : result.reason;
        yield { status: "failed", page, reason };
        return;
      }

      const records = result.value;
      const isLast = records.length < LAST_PAGE_THRESHOLD;
      yield { status: "ok", page, records, isLast };

      if (isLast) {
        this.logger.info({ endpoint, page }, "Last page reached");
        return;
      }

      await this.clock.sleep(this.pageDelayMs);
    }
  }
}
