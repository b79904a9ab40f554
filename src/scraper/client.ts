import type { CacheStats, RequestCache, RequestParams } from "./cache.js";
import { classifyJsonResponse, httpGet, type FetchFn } from "./http.js";
import { found, type LookupResult } from "../types/index.js";

import type { SyncLogger } from "../logger.js";

export interface DirectoryClientOptions {
  baseUrl: string;
  headers: Record<string, string>;
  cache: RequestCache;
  logger: SyncLogger;
  timeoutMs?: number;
  fetch?: FetchFn;
}

/**
 * Build the full URL for an endpoint with query params.
 */
export function buildUrl(
  baseUrl: string,
  endpoint: string,
  params?: RequestParams
): string {
  const url = `${baseUrl}/${endpoint}`;
  if (params === undefined || Object.keys(params).length === 0) {
    return url;
  }
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.set(key, String(value));
  }
  return `${url}?${query.toString()}`;
}

/**
 * Primary directory API client. Successful responses are cached by
 * endpoint + params; failures never are.
 */
export class DirectoryClient {
  private fetchFn: FetchFn;

  constructor(private options: DirectoryClientOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async request(
    endpoint: string,
    params?: RequestParams
  ): Promise<LookupResult<unknown>> {
    const { cache, logger } = this.options;

    const cached = cache.get(endpoint, params);
    if (cached !== undefined) {
      logger.debug({ endpoint, params }, "Cache hit");
      return found(cached);
    }

    const url = buildUrl(this.options.baseUrl, endpoint, params);
    const response = await httpGet(this.fetchFn, url, logger, {
      headers: this.options.headers,
      timeoutMs: this.options.timeoutMs,
    });

    if (response.kind !== "found") {
      logger.warn({ endpoint, params, response }, "Directory API unreachable");
      return response;
    }

    const result = classifyJsonResponse(response.value);
    if (result.kind === "found") {
      cache.set(endpoint, params, result.value);
      logger.debug(
        {
          endpoint,
          records: Array.isArray(result.value) ? result.value.length : "object",
        },
        "Directory API response"
      );
    } else {
      logger.error(
        { endpoint, params, status: response.value.status, result },
        "Directory API request failed"
      );
    }

    return result;
  }

  cacheStats(): CacheStats {
    return this.options.cache.stats();
  }
}
