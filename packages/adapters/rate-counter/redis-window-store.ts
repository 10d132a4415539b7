/**
 * Redis Sliding Window Store
 *
 * Evaluates the sliding-window Lua scripts against Redis. Each operation is
 * one script, so eviction, counting and admission are indivisible as seen by
 * every other client.
 *
 * Scripts run by digest (EVALSHA). The digest is loaded lazily; when Redis
 * answers NOSCRIPT (script cache flushed, failover) the script is reloaded and
 * the call retried exactly once.
 *
 * @module packages/adapters/rate-counter/redis-window-store
 */

import type { Logger } from 'pino';
import type { IncrementResult, SlidingWindowStore } from '../../core/ports/index.js';
import { BackingStoreError } from './errors.js';

// --------------------------------------------------------------------------
// Redis Client Interface
// --------------------------------------------------------------------------

/**
 * Minimal Redis client surface used by the store.
 * Satisfied by ioredis' `Redis` and `Cluster`.
 */
export interface WindowRedisClient {
  evalsha(sha: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  script(subcommand: 'LOAD', script: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

// --------------------------------------------------------------------------
// Lua Scripts
// --------------------------------------------------------------------------

/**
 * TRY_INCREMENT:
 * - Evict entries at or below now - window
 * - Reject when the remaining count has reached the limit
 * - Otherwise record the member at score now and refresh the key TTL
 * Returns: [admitted (0|1), count]
 */
export const TRY_INCREMENT_LUA = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
local member = ARGV[4]

redis.call('ZREMRANGEBYSCORE', key, 0, now - window)

local count = redis.call('ZCOUNT', key, now - window, '+inf')

if count >= limit then
  return {0, count}
end

redis.call('ZADD', key, now, member)
redis.call('EXPIRE', key, math.floor(window / 1000000))
return {1, count + 1}
`;

/**
 * DECREMENT:
 * - Evict expired entries
 * - Remove the oldest in-window entry, if any
 * Returns: count after removal (0 when nothing was in the window)
 */
export const DECREMENT_LUA = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])

redis.call('ZREMRANGEBYSCORE', key, 0, now - window)

local entries = redis.call('ZRANGEBYSCORE', key, now - window, '+inf', 'LIMIT', 0, 1)
if next(entries) == nil then
  return 0
end

redis.call('ZREM', key, entries[1])
return redis.call('ZCOUNT', key, now - window, '+inf')
`;

/**
 * COUNT:
 * - Evict expired entries
 * Returns: in-window count
 */
export const COUNT_LUA = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])

redis.call('ZREMRANGEBYSCORE', key, 0, now - window)
return redis.call('ZCOUNT', key, now - window, '+inf')
`;

export const WINDOW_SCRIPTS = {
  tryIncrement: TRY_INCREMENT_LUA,
  decrement: DECREMENT_LUA,
  count: COUNT_LUA,
} as const;

export type WindowScriptName = keyof typeof WINDOW_SCRIPTS;

// --------------------------------------------------------------------------
// Store
// --------------------------------------------------------------------------

export class RedisWindowStore implements SlidingWindowStore {
  private readonly shas = new Map<WindowScriptName, string>();
  private readonly logger: Logger;

  constructor(
    private readonly redis: WindowRedisClient,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'RedisWindowStore' });
  }

  async tryIncrement(
    key: string,
    nowMicros: number,
    windowMicros: number,
    limit: number,
    member: string,
  ): Promise<IncrementResult> {
    const reply = await this.run('tryIncrement', key, [nowMicros, windowMicros, limit, member]);
    return parseIncrementReply(reply);
  }

  async decrement(key: string, nowMicros: number, windowMicros: number): Promise<number> {
    const reply = await this.run('decrement', key, [nowMicros, windowMicros]);
    return parseCountReply('decrement', reply);
  }

  async count(key: string, nowMicros: number, windowMicros: number): Promise<number> {
    const reply = await this.run('count', key, [nowMicros, windowMicros]);
    return parseCountReply('count', reply);
  }

  async reset(key: string): Promise<void> {
    try {
      await this.redis.del(key);
    } catch (error) {
      this.logger.error({ err: error, key }, 'Sliding window reset failed');
      throw new BackingStoreError('reset', error);
    }
  }

  /**
   * EVALSHA with a single NOSCRIPT reload-and-retry.
   * Every other failure, and a failure of the retry, becomes BackingStoreError.
   */
  private async run(
    name: WindowScriptName,
    key: string,
    argv: (string | number)[],
  ): Promise<unknown> {
    try {
      let sha = await this.ensureScript(name);
      try {
        return await this.redis.evalsha(sha, 1, key, ...argv);
      } catch (err: unknown) {
        if (!isNoScriptError(err)) throw err;
        // Script evicted from the Redis cache: reload and retry once
        this.logger.warn({ script: name, key }, 'Lua script missing from Redis cache, reloading');
        this.shas.delete(name);
        sha = await this.ensureScript(name);
        return await this.redis.evalsha(sha, 1, key, ...argv);
      }
    } catch (error) {
      this.logger.error({ err: error, script: name, key }, 'Sliding window script failed');
      throw new BackingStoreError(name, error);
    }
  }

  /**
   * Load and cache the Lua script SHA in Redis.
   */
  private async ensureScript(name: WindowScriptName): Promise<string> {
    const cached = this.shas.get(name);
    if (cached) return cached;

    const sha = await this.redis.script('LOAD', WINDOW_SCRIPTS[name]);
    if (typeof sha !== 'string') {
      throw new Error(`SCRIPT LOAD returned ${typeof sha} for ${name}`);
    }
    this.logger.debug({ script: name, sha }, 'Lua script loaded');
    this.shas.set(name, sha);
    return sha;
  }
}

// --------------------------------------------------------------------------
// Reply Parsing
// --------------------------------------------------------------------------

function isNoScriptError(err: unknown): boolean {
  return err instanceof Error && err.message.includes('NOSCRIPT');
}

function toCount(value: unknown): number | null {
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

/**
 * Parse the TRY_INCREMENT reply: [admitted (0|1), count]
 */
export function parseIncrementReply(reply: unknown): IncrementResult {
  if (Array.isArray(reply) && reply.length === 2) {
    const flag = toCount(reply[0]);
    const count = toCount(reply[1]);
    if ((flag === 0 || flag === 1) && count !== null) {
      return { admitted: flag === 1, count };
    }
  }
  throw new BackingStoreError('tryIncrement', new Error(`Unexpected reply: ${JSON.stringify(reply)}`));
}

function parseCountReply(operation: WindowScriptName, reply: unknown): number {
  const count = toCount(reply);
  if (count === null) {
    throw new BackingStoreError(operation, new Error(`Unexpected reply: ${JSON.stringify(reply)}`));
  }
  return count;
}
