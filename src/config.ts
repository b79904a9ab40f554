import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Environment Schema
// ============================================================================

const EnvSchema = Type.Object({
  DIRECTORY_API_URL: Type.String({
    default: "https://school.mos.ru/api/ej/core/teacher/v1",
  }),
  IDENTITY_API_URL: Type.String({
    default: "https://school.mos.ru/v2/external-partners/check-for-max-user",
  }),
  DIRECTORY_API_TOKEN: Type.String({ default: "" }),
  DIRECTORY_PROFILE_ID: Type.String({ default: "" }),
  SCHOOL_ID: Type.Integer({ minimum: 1, default: 28 }),
  DB_PATH: Type.String({ minLength: 1, default: "./data/school.db" }),
  BACKUP_DIR: Type.String({ minLength: 1, default: "./backups" }),
  BACKUP_KEEP: Type.Integer({ minimum: 1, default: 20 }),
  CACHE_TTL_SECONDS: Type.Number({ minimum: 0, default: 300 }),
  IDENTITY_RATE_LIMIT: Type.Integer({ minimum: 11, default: 100 }),
  MAX_RETRIES: Type.Integer({ minimum: 1, maximum: 10, default: 3 }),
  REQUEST_TIMEOUT_MS: Type.Integer({ minimum: 1000, default: 30_000 }),
  PAGE_DELAY_MS: Type.Integer({ minimum: 0, default: 1000 }),
});

export type Env = Static<typeof EnvSchema>;

const ENV_KEYS = Object.keys(EnvSchema.properties);

// ============================================================================
// Resolved Configuration
// ============================================================================

export interface SyncConfig {
  directoryApiUrl: string;
  identityApiUrl: string;
  apiToken: string;
  profileId: string;
  schoolId: number;
  dbPath: string;
  backupDir: string;
  backupKeep: number;
  cacheTtlMs: number;
  identityRateLimit: number;
  maxRetries: number;
  requestTimeoutMs: number;
  pageDelayMs: number;
}

/**
 * Read and validate settings from the environment.
 * Unset or empty variables fall back to their defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): SyncConfig {
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));

  if (!Value.Check(EnvSchema, candidate)) {
    const problems = [...Value.Errors(EnvSchema, candidate)].map(
      (error) => `${error.path.slice(1)}: ${error.message}`
    );
    throw new ConfigError("Invalid configuration", problems);
  }

  return {
    directoryApiUrl: candidate.DIRECTORY_API_URL.replace(/\/+$/, ""),
    identityApiUrl: candidate.IDENTITY_API_URL,
    apiToken: candidate.DIRECTORY_API_TOKEN,
    profileId: candidate.DIRECTORY_PROFILE_ID,
    schoolId: candidate.SCHOOL_ID,
    dbPath: candidate.DB_PATH,
    backupDir: candidate.BACKUP_DIR,
    backupKeep: candidate.BACKUP_KEEP,
    cacheTtlMs: candidate.CACHE_TTL_SECONDS * 1000,
    identityRateLimit: candidate.IDENTITY_RATE_LIMIT,
    maxRetries: candidate.MAX_RETRIES,
    requestTimeoutMs: candidate.REQUEST_TIMEOUT_MS,
    pageDelayMs: candidate.PAGE_DELAY_MS,
  };
}

/**
 * Headers sent to the directory API. Credentials are supplied externally.
 */
export function buildApiHeaders(config: SyncConfig): Record<string, string> {
  const headers: Record<string, string> = {
    accept: "application/json",
  };
  if (config.apiToken !== "") {
    headers.authorization = `Bearer ${config.apiToken}`;
  }
  if (config.profileId !== "") {
    headers["profile-id"] = config.profileId;
  }
  return headers;
}
