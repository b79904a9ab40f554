import { RequestCache } from "../../src/scraper/cache.js";
import { DirectoryClient } from "../../src/scraper/client.js";
import { PaginatedFetcher } from "../../src/scraper/paginator.js";
import { FakeClock } from "../mocks/clock.js";
import { silentLogger } from "../mocks/logger.js";

import type { FetchFn } from "../../src/scraper/http.js";

export const DIRECTORY_URL = "https://directory.test/v1";

/**
 * Directory client + fetcher over a fake fetch, with no page delay.
 */
export function createTestFetcher(
  fetchFn: FetchFn,
  clock = new FakeClock(),
  options: { maxRetries?: number; pageDelayMs?: number } = {}
): { fetcher: PaginatedFetcher; client: DirectoryClient; cache: RequestCache; clock: FakeClock } {
  const cache = new RequestCache(300_000, clock);
  const client = new DirectoryClient({
    baseUrl: DIRECTORY_URL,
    headers: {},
    cache,
    logger: silentLogger,
    fetch: fetchFn,
  });
  const fetcher = new PaginatedFetcher(client, silentLogger, {
    maxRetries: options.maxRetries ?? 3,
    pageDelayMs: options.pageDelayMs ?? 0,
    clock,
  });
  return { fetcher, client, cache, clock };
}
