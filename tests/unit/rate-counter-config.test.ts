/**
 * Rate Counter Configuration Unit Tests
 *
 * Env parsing, counter settings validation, process defaults and the error
 * hierarchy.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { pino } from 'pino';
import {
  MAX_WINDOW_SECONDS,
  loadRateCounterConfig,
  parseCounterSettings,
} from '../../packages/adapters/rate-counter/config.js';
import {
  configureCounters,
  getCounterDefaults,
  getDefaultStore,
  resetCounterDefaults,
} from '../../packages/adapters/rate-counter/defaults.js';
import {
  BackingStoreError,
  ErrorCodes,
  InvalidCounterConfigError,
  LimitExceededError,
  StoreNotConfiguredError,
  UnknownCounterError,
  isLimitExceeded,
} from '../../packages/adapters/rate-counter/errors.js';
import { InMemoryWindowStore } from '../../packages/adapters/rate-counter/in-memory-window-store.js';

// --------------------------------------------------------------------------
// loadRateCounterConfig
// --------------------------------------------------------------------------

describe('loadRateCounterConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadRateCounterConfig({})).toEqual({
      redis: {
        url: 'redis://localhost:6379',
        commandTimeoutMs: 500,
        connectTimeoutMs: 5000,
        maxRetriesPerRequest: 1,
      },
      namespace: 'rate-counter',
      logLevel: 'info',
    });
  });

  it('reads and coerces overrides', () => {
    const config = loadRateCounterConfig({
      RATE_COUNTER_REDIS_URL: 'redis://cache.internal:6380/2',
      RATE_COUNTER_NAMESPACE: 'billing',
      RATE_COUNTER_COMMAND_TIMEOUT_MS: '250',
      RATE_COUNTER_MAX_RETRIES_PER_REQUEST: '0',
      LOG_LEVEL: 'debug',
    });

    expect(config.redis.url).toBe('redis://cache.internal:6380/2');
    expect(config.redis.commandTimeoutMs).toBe(250);
    expect(config.redis.maxRetriesPerRequest).toBe(0);
    expect(config.namespace).toBe('billing');
    expect(config.logLevel).toBe('debug');
  });

  it('reports every invalid variable', () => {
    let caught: unknown;
    try {
      loadRateCounterConfig({ RATE_COUNTER_COMMAND_TIMEOUT_MS: '-5', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidCounterConfigError);
    if (!(caught instanceof InvalidCounterConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^RATE_COUNTER_COMMAND_TIMEOUT_MS: /);
    expect(caught.issues[1]).toMatch(/^LOG_LEVEL: /);
  });
});

// --------------------------------------------------------------------------
// parseCounterSettings
// --------------------------------------------------------------------------

describe('parseCounterSettings', () => {
  it('accepts positive integers', () => {
    expect(parseCounterSettings({ limit: 3, window: 1 })).toEqual({ limit: 3, window: 1 });
  });

  it('names the offending field', () => {
    expect(() => parseCounterSettings({ limit: 0, window: 1 })).toThrow(/limit: /);
    expect(() => parseCounterSettings({ limit: 1, window: 0.5 })).toThrow(/window: /);
  });

  it('caps the window where its microsecond length stays exact', () => {
    expect(MAX_WINDOW_SECONDS).toBe(9_007_199_254);
    expect(Number.isSafeInteger(MAX_WINDOW_SECONDS * 1_000_000)).toBe(true);
    expect(parseCounterSettings({ limit: 1, window: MAX_WINDOW_SECONDS }).window).toBe(MAX_WINDOW_SECONDS);
    expect(() => parseCounterSettings({ limit: 1, window: MAX_WINDOW_SECONDS + 1 })).toThrow(/window: /);
  });
});

// --------------------------------------------------------------------------
// Process defaults
// --------------------------------------------------------------------------

describe('counter defaults', () => {
  afterEach(() => {
    resetCounterDefaults();
  });

  it('starts without a store', () => {
    expect(getCounterDefaults().store).toBeNull();
    expect(() => getDefaultStore()).toThrow(StoreNotConfiguredError);
  });

  it('keeps fields that a later call leaves out', () => {
    const store = new InMemoryWindowStore();
    const logger = pino({ level: 'silent' });

    configureCounters({ store, logger });
    configureCounters({ namespace: 'jobs' });

    expect(getDefaultStore()).toBe(store);
    expect(getCounterDefaults().logger).toBe(logger);
    expect(getCounterDefaults().namespace).toBe('jobs');
  });

  it('can clear the store explicitly', () => {
    configureCounters({ store: new InMemoryWindowStore() });
    configureCounters({ store: null });

    expect(() => getDefaultStore()).toThrow(StoreNotConfiguredError);
  });
});

// --------------------------------------------------------------------------
// Errors
// --------------------------------------------------------------------------

describe('error hierarchy', () => {
  it('marks LimitExceededError as the only recoverable error', () => {
    const limit = new LimitExceededError(3, 3);

    expect(limit.code).toBe(ErrorCodes.LIMIT_EXCEEDED);
    expect(limit.recoverable).toBe(true);
    expect(limit.message).toBe('Limit of 3 exceeded with count 3');
    expect(isLimitExceeded(limit)).toBe(true);

    expect(new StoreNotConfiguredError().recoverable).toBe(false);
    expect(new UnknownCounterError('x').recoverable).toBe(false);
    expect(isLimitExceeded(new Error('Limit of 3 exceeded'))).toBe(false);
  });

  it('keeps the transport failure as the cause', () => {
    const cause = new Error('ETIMEDOUT');
    const error = new BackingStoreError('tryIncrement', cause);

    expect(error.code).toBe('RC3001');
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: 'BackingStoreError',
      code: 'RC3001',
      message: 'Backing store tryIncrement failed: ETIMEDOUT',
      recoverable: false,
      cause: 'ETIMEDOUT',
    });
  });

  it('omits the owner from UnknownCounterError when not given', () => {
    expect(new UnknownCounterError('x').message).toBe('No counter named "x"');
  });
});
