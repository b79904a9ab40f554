import { createHash } from "node:crypto";

import { systemClock, type Clock } from "../utils/clock.js";

export type RequestParams = Record<string, string | number | boolean>;

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: string;
}

interface CacheEntry {
  value: unknown;
  storedAt: number;
}

export const DEFAULT_CACHE_TTL_MS = 300_000;

/**
 * Deterministic string form of request params (keys sorted).
 */
export function stableParams(params: RequestParams | undefined): string {
  if (params === undefined) {
    return "";
  }
  const sorted = Object.keys(params)
    .sort()
    .map((key) => [key, params[key]]);
  return JSON.stringify(sorted);
}

/**
 * Compute the cache key for an endpoint + params pair.
 */
export function computeCacheKey(
  endpoint: string,
  params: RequestParams | undefined
): string {
  return createHash("sha256")
    .update(`${endpoint}:${stableParams(params)}`)
    .digest("hex");
}

/**
 * TTL cache for directory API responses.
 *
 * Expired entries are dropped lazily on lookup. There is no size bound:
 * a sync run is short and touches a few hundred distinct requests.
 */
export class RequestCache {
  private entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(
    private ttlMs: number = DEFAULT_CACHE_TTL_MS,
    private clock: Clock = systemClock
  ) {}

  get(endpoint: string, params?: RequestParams): unknown {
    const key = computeCacheKey(endpoint, params);
    const entry = this.entries.get(key);

    if (entry !== undefined) {
      if (this.clock.now() - entry.storedAt < this.ttlMs) {
        this.hits++;
        return entry.value;
      }
      this.entries.delete(key);
    }

    this.misses++;
    return undefined;
  }

  set(endpoint: string, params: RequestParams | undefined, value: unknown): void {
    this.entries.set(computeCacheKey(endpoint, params), {
      value,
      storedAt: this.clock.now(),
    });
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    const hitRate = total > 0 ? (this.hits / total) * 100 : 0;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: `${hitRate.toFixed(1)}%`,
    };
  }
}
