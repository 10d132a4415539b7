/**
 * Rate Counter Factory
 *
 * Wires an ioredis client, the Redis sliding window store and the logger into
 * the process-wide counter defaults.
 *
 * @module packages/adapters/rate-counter/factory
 */

import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { RateCounterConfig } from './config.js';
import { configureCounters } from './defaults.js';
import { createLogger } from './logger.js';
import { RedisWindowStore } from './redis-window-store.js';

export interface RateCounterRuntime {
  redis: Redis;
  store: RedisWindowStore;
  logger: Logger;
  /** Close the Redis connection */
  shutdown(): Promise<void>;
}

/**
 * Create an ioredis client with the configured timeouts.
 * The connection is opened on first command.
 */
export function createRedisClient(config: RateCounterConfig, logger: Logger): Redis {
  const redis = new Redis(config.redis.url, {
    lazyConnect: true,
    commandTimeout: config.redis.commandTimeoutMs,
    connectTimeout: config.redis.connectTimeoutMs,
    maxRetriesPerRequest: config.redis.maxRetriesPerRequest,
  });

  redis.on('ready', () => {
    logger.info('Redis client ready');
  });
  redis.on('error', (err: Error) => {
    logger.error({ err }, 'Redis client error');
  });

  return redis;
}

/**
 * Build the runtime from config and install it as the process default.
 * Call once at bootstrap, before any counter is constructed.
 */
export function bootstrapCounters(config: RateCounterConfig): RateCounterRuntime {
  const logger = createLogger(config.logLevel);
  const redis = createRedisClient(config, logger);
  const store = new RedisWindowStore(redis, logger);

  configureCounters({ store, namespace: config.namespace, logger });
  logger.info({ namespace: config.namespace }, 'Rate counters configured');

  return {
    redis,
    store,
    logger,
    async shutdown() {
      await redis.quit();
    },
  };
}
