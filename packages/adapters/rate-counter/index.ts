/**
 * Rate Counter — Distributed Sliding Window Counter
 *
 * Lets independent processes agree, through a shared Redis sorted set, on
 * whether an action may proceed under a limit per rolling window.
 *
 * @module packages/adapters/rate-counter
 */

// Store protocol
export type { IncrementResult, SlidingWindowStore } from '../../core/ports/index.js';

// Clock
export { REAL_CLOCK, MICROS_PER_SECOND, type Clock } from './clock.js';

// Errors
export {
  ErrorCodes,
  RateCounterError,
  LimitExceededError,
  StoreNotConfiguredError,
  UnknownCounterError,
  InvalidCounterConfigError,
  BackingStoreError,
  isLimitExceeded,
  type ErrorCode,
} from './errors.js';

// Configuration
export {
  loadRateCounterConfig,
  parseCounterSettings,
  DEFAULT_NAMESPACE,
  DEFAULT_LIMIT,
  DEFAULT_WINDOW_SECONDS,
  MAX_WINDOW_SECONDS,
  type RateCounterConfig,
  type RedisConnectionConfig,
  type CounterSettings,
} from './config.js';

// Process defaults
export {
  configureCounters,
  getCounterDefaults,
  getDefaultStore,
  resetCounterDefaults,
  type CounterDefaults,
} from './defaults.js';

// Logging
export { createLogger } from './logger.js';

// Store implementations
export {
  RedisWindowStore,
  WINDOW_SCRIPTS,
  type WindowRedisClient,
  type WindowScriptName,
} from './redis-window-store.js';
export { InMemoryWindowStore } from './in-memory-window-store.js';

// Counter
export { Counter, type CounterOptions, type TransactionOptions } from './counter.js';

// Registry
export {
  defineCounters,
  literalKey,
  deferredKey,
  CounterRegistryBuilder,
  CounterRegistry,
  CounterBinding,
  type KeySource,
  type LiteralKeySource,
  type DeferredKeySource,
  type CounterDeclaration,
  type CounterEntry,
} from './registry.js';

// Factory
export { createRedisClient, bootstrapCounters, type RateCounterRuntime } from './factory.js';
