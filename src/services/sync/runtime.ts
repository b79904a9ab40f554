import { SyncOrchestrator } from "./orchestrator.js";
import { buildApiHeaders, type SyncConfig } from "../../config.js";
import { apiLogger, identityLogger, syncLogger, type SyncLogger } from "../../logger.js";
import { RequestCache } from "../../scraper/cache.js";
import { DirectoryClient } from "../../scraper/client.js";
import { IdentityResolver } from "../../scraper/identity.js";
import { PaginatedFetcher } from "../../scraper/paginator.js";
import { RateLimiter } from "../../scraper/rate-limiter.js";
import { systemClock, type Clock } from "../../utils/clock.js";
import { SqliteSnapshotProvider } from "../backup.js";

import type { DatabaseHandle } from "../../db/index.js";
import type { FetchFn } from "../../scraper/http.js";

export interface RuntimeOverrides {
  fetch?: FetchFn;
  clock?: Clock;
  logger?: SyncLogger;
}

export interface SyncRuntime {
  orchestrator: SyncOrchestrator;
  client: DirectoryClient;
  fetcher: PaginatedFetcher;
  identity: IdentityResolver;
  rateLimiter: RateLimiter;
  cache: RequestCache;
}

/**
 * Wire the network and store components for one sync run.
 */
export function createSyncRuntime(
  config: SyncConfig,
  handle: DatabaseHandle,
  overrides: RuntimeOverrides = {}
): SyncRuntime {
  const clock = overrides.clock ?? systemClock;
  const headers = buildApiHeaders(config);

  const cache = new RequestCache(config.cacheTtlMs, clock);
  const client = new DirectoryClient({
    baseUrl: config.directoryApiUrl,
    headers,
    cache,
    logger: overrides.logger ?? apiLogger,
    timeoutMs: config.requestTimeoutMs,
    fetch: overrides.fetch,
  });
  const fetcher = new PaginatedFetcher(client, overrides.logger ?? apiLogger, {
    maxRetries: config.maxRetries,
    pageDelayMs: config.pageDelayMs,
    clock,
  });

  const rateLimiter = new RateLimiter(
    overrides.logger ?? identityLogger,
    config.identityRateLimit,
    clock
  );
  const identity = new IdentityResolver({
    identityUrl: config.identityApiUrl,
    rateLimiter,
    logger: overrides.logger ?? identityLogger,
    headers,
    fetch: overrides.fetch,
    clock,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
  });

  const snapshots = new SqliteSnapshotProvider(handle.sqlite, {
    backupDir: config.backupDir,
    keepLast: config.backupKeep,
    logger: overrides.logger ?? syncLogger,
    clock,
  });

  const orchestrator = new SyncOrchestrator(
    {
      db: handle.db,
      fetcher,
      identity,
      clock,
      logger: overrides.logger ?? syncLogger,
      snapshots,
      cacheStats: () => cache.stats(),
    },
    config.schoolId
  );

  return { orchestrator, client, fetcher, identity, rateLimiter, cache };
}
