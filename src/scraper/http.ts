import { errorMessage } from "../errors.js";
import {
  found,
  notFound,
  permanentFailure,
  transientFailure,
  type LookupResult,
} from "../types/index.js";

import type { SyncLogger } from "../logger.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: string;
}

export interface HttpGetOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export const DEFAULT_RETRY_AFTER_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * GET a URL and read the body as text.
 * Network errors and timeouts come back as transient failures.
 */
export async function httpGet(
  fetchFn: FetchFn,
  url: string,
  logger: SyncLogger,
  options: HttpGetOptions = {}
): Promise<LookupResult<HttpResponse>> {
  logger.debug({ url }, "Sending GET request");

  const startTime = performance.now();
  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    const body = await response.text();
    const duration = Math.round(performance.now() - startTime);

    logger.debug(
      {
        url,
        status: response.status,
        statusText: response.statusText,
        duration: `${String(duration)}ms`,
      },
      "Received response"
    );

    return found({
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      body,
    });
  } catch (error) {
    logger.debug({ url, error: errorMessage(error) }, "Request failed");
    return transientFailure(`network error: ${errorMessage(error)}`);
  }
}

/**
 * Read Retry-After as whole seconds; anything else falls back to the default.
 */
export function parseRetryAfter(
  headers: Headers,
  defaultMs: number = DEFAULT_RETRY_AFTER_MS
): number {
  const raw = headers.get("retry-after");
  if (raw === null || !/^\d+$/.test(raw.trim())) {
    return defaultMs;
  }
  return Number.parseInt(raw.trim(), 10) * 1000;
}

/**
 * Map an HTTP response carrying JSON onto a lookup result.
 *
 * - 200 with parseable JSON: found
 * - 404: not found
 * - 429 and 5xx: transient (429 carries the Retry-After hint)
 * - anything else, or a 200 whose body is not JSON: permanent
 */
export function classifyJsonResponse(
  response: HttpResponse
): LookupResult<unknown> {
  const { status } = response;

  if (status === 200) {
    try {
      return found(JSON.parse(response.body) as unknown);
    } catch {
      return permanentFailure("response body is not valid JSON");
    }
  }
  if (status === 404) {
    return notFound;
  }
  if (status === 429) {
    return transientFailure(
      "rate limited (429)",
      parseRetryAfter(response.headers)
    );
  }
  if (status >= 500) {
    return transientFailure(`server error (${String(status)})`);
  }
  return permanentFailure(`unexpected status ${String(status)}`);
}
