export { loadConfig, buildApiHeaders, type SyncConfig } from "./config.js";
export { ConfigError, StoreError, errorMessage } from "./errors.js";
export { createDatabase, type DatabaseHandle } from "./db/index.js";
export type * from "./db/schema.js";
export { runMigration, getTableStats } from "./db/migrate.js";
export { logger, type SyncLogger } from "./logger.js";
export { RequestCache, computeCacheKey, type CacheStats } from "./scraper/cache.js";
export { DirectoryClient } from "./scraper/client.js";
export { IdentityResolver, extractExternalId } from "./scraper/identity.js";
export { PaginatedFetcher, type PageResult } from "./scraper/paginator.js";
export { RateLimiter } from "./scraper/rate-limiter.js";
export { SqliteSnapshotProvider, type SnapshotProvider } from "./services/backup.js";
export * from "./services/reports.js";
export * from "./services/sync/index.js";
export * from "./types/index.js";
export * from "./utils/normalize.js";
export { systemClock, type Clock } from "./utils/clock.js";
