/**
 * Sync Configuration
 *
 * Tunables for the progress sync core. Defaults can be overridden through the
 * environment or by passing overrides to resolveSyncConfig().
 *
 * Environment variables:
 *   SYNC_MAX_RETRIES    - retries after the first failed attempt (default 3)
 *   SYNC_BASE_DELAY_MS  - first backoff delay, doubled per retry (default 1000)
 *   SYNC_TIMEOUT_MS     - per-request timeout (default 3000 in development, 7000 otherwise)
 *   LOG_LEVEL           - default logger level (debug | info | warn | error)
 *   LOGS_DB_PATH        - location of the log database (default logs.sqlite)
 */

import type { LogLevel } from "@/lib/logger/types";

export const isDevelopment = process.env.NODE_ENV !== "production";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;
const DEVELOPMENT_TIMEOUT_MS = 3000;
const RELEASE_TIMEOUT_MS = 7000;

const DEFAULT_LOGS_DB_PATH = "logs.sqlite";
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface SyncConfig {
  /** Retries after the initial attempt */
  maxRetries: number;
  /** Delay before the first retry; retry i waits baseDelayMs * 2^i */
  baseDelayMs: number;
  /** Connect/read/write timeout for a single request */
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Request timeout for the current build flavour
 */
export function getDefaultTimeoutMs(development: boolean = isDevelopment): number {
  return development ? DEVELOPMENT_TIMEOUT_MS : RELEASE_TIMEOUT_MS;
}

function readNonNegativeInt(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

/**
 * Build the effective sync configuration.
 * Precedence: explicit overrides, then environment, then defaults.
 */
export function resolveSyncConfig(
  overrides: Partial<SyncConfig> = {},
  env: Env = process.env,
  development: boolean = isDevelopment
): SyncConfig {
  return {
    maxRetries: overrides.maxRetries ?? readNonNegativeInt(env, "SYNC_MAX_RETRIES", DEFAULT_MAX_RETRIES),
    baseDelayMs:
      overrides.baseDelayMs ?? readNonNegativeInt(env, "SYNC_BASE_DELAY_MS", DEFAULT_BASE_DELAY_MS),
    timeoutMs:
      overrides.timeoutMs ??
      readNonNegativeInt(env, "SYNC_TIMEOUT_MS", getDefaultTimeoutMs(development)),
  };
}

export function getLogLevelFromEnv(env: Env = process.env): LogLevel | undefined {
  const value = env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value);
}

export function getLogsDbPath(env: Env = process.env): string {
  return env.LOGS_DB_PATH || DEFAULT_LOGS_DB_PATH;
}
