/**
 * Rate Counter Configuration
 *
 * Reads connection and default settings from environment variables.
 * Env vars: RATE_COUNTER_REDIS_URL, RATE_COUNTER_NAMESPACE,
 * RATE_COUNTER_COMMAND_TIMEOUT_MS, RATE_COUNTER_CONNECT_TIMEOUT_MS,
 * RATE_COUNTER_MAX_RETRIES_PER_REQUEST, LOG_LEVEL.
 */

import { z } from 'zod';
import { MICROS_PER_SECOND } from './clock.js';
import { InvalidCounterConfigError } from './errors.js';

// --------------------------------------------------------------------------
// Counter Defaults
// --------------------------------------------------------------------------

export const DEFAULT_NAMESPACE = 'rate-counter';

export const DEFAULT_LIMIT = 1;

// 3600s: one hour
export const DEFAULT_WINDOW_SECONDS = 3600;

// Largest window whose microsecond length is still an exact integer
export const MAX_WINDOW_SECONDS = Math.floor(Number.MAX_SAFE_INTEGER / MICROS_PER_SECOND);

// --------------------------------------------------------------------------
// Redis Connection Defaults
// --------------------------------------------------------------------------

// 500ms: p99 Redis latency is a few ms; bounds how long a caller blocks on
// a stalled connection.
export const REDIS_COMMAND_TIMEOUT_MS = 500;

export const REDIS_CONNECT_TIMEOUT_MS = 5_000;

// 1: a timed-out increment may already have committed, so retrying at the
// client layer risks overcounting.
export const REDIS_MAX_RETRIES_PER_REQUEST = 1;

// --------------------------------------------------------------------------
// Schemas
// --------------------------------------------------------------------------

/** Limit and window shared by every counter declaration */
export const counterSettingsSchema = z.object({
  limit: z.number().int().positive(),
  window: z.number().int().positive().max(MAX_WINDOW_SECONDS),
});

export type CounterSettings = z.infer<typeof counterSettingsSchema>;

const envSchema = z.object({
  RATE_COUNTER_REDIS_URL: z.string().url().default('redis://localhost:6379'),
  RATE_COUNTER_NAMESPACE: z.string().min(1).default(DEFAULT_NAMESPACE),
  RATE_COUNTER_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(REDIS_COMMAND_TIMEOUT_MS),
  RATE_COUNTER_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(REDIS_CONNECT_TIMEOUT_MS),
  RATE_COUNTER_MAX_RETRIES_PER_REQUEST: z.coerce.number().int().min(0).default(REDIS_MAX_RETRIES_PER_REQUEST),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// --------------------------------------------------------------------------
// Configuration Types
// --------------------------------------------------------------------------

export interface RedisConnectionConfig {
  url: string;
  commandTimeoutMs: number;
  connectTimeoutMs: number;
  maxRetriesPerRequest: number;
}

export interface RateCounterConfig {
  redis: RedisConnectionConfig;
  /** Namespace applied to counters that declare none */
  namespace: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a limit/window pair, throwing InvalidCounterConfigError.
 */
export function parseCounterSettings(input: { limit: number; window: number }): CounterSettings {
  const result = counterSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCounterConfigError(formatIssues(result.error));
  }
  return result.data;
}

// --------------------------------------------------------------------------
// Config Loader
// --------------------------------------------------------------------------

/**
 * Load rate counter configuration from environment variables with defaults.
 *
 * @param env - Variables to read (defaults to process.env)
 */
export function loadRateCounterConfig(
  env: Record<string, string | undefined> = process.env,
): RateCounterConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidCounterConfigError(formatIssues(result.error));
  }
  const parsed = result.data;

  return {
    redis: {
      url: parsed.RATE_COUNTER_REDIS_URL,
      commandTimeoutMs: parsed.RATE_COUNTER_COMMAND_TIMEOUT_MS,
      connectTimeoutMs: parsed.RATE_COUNTER_CONNECT_TIMEOUT_MS,
      maxRetriesPerRequest: parsed.RATE_COUNTER_MAX_RETRIES_PER_REQUEST,
    },
    namespace: parsed.RATE_COUNTER_NAMESPACE,
    logLevel: parsed.LOG_LEVEL,
  };
}
