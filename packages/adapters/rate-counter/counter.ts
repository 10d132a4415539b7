/**
 * Sliding Window Counter
 *
 * Stateless handle over one key, limit and window. All durable state lives in
 * the SlidingWindowStore; a Counter only carries its configuration, so it is
 * cheap to create and safe to share.
 *
 * @module packages/adapters/rate-counter/counter
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { SlidingWindowStore } from '../../core/ports/index.js';
import { MICROS_PER_SECOND, REAL_CLOCK, type Clock } from './clock.js';
import { DEFAULT_LIMIT, DEFAULT_WINDOW_SECONDS, parseCounterSettings } from './config.js';
import { getCounterDefaults, getDefaultStore } from './defaults.js';
import { LimitExceededError } from './errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface CounterOptions {
  /** Key prefix (default: process namespace, `rate-counter` unless configured) */
  namespace?: string;
  /** Key identifier; a random UUID when omitted (disposable counter) */
  key?: string;
  /** Maximum admitted events per window (default: 1) */
  limit?: number;
  /** Window length in whole seconds (default: 3600) */
  window?: number;
  /** Backing store (default: process default store) */
  store?: SlidingWindowStore;
  clock?: Clock;
  logger?: Logger;
}

export interface TransactionOptions {
  /** Decrement when the work fails (default: true) */
  rollback?: boolean;
}

// --------------------------------------------------------------------------
// Counter
// --------------------------------------------------------------------------

export class Counter {
  /** Full store key, `{namespace}:{identifier}` */
  readonly key: string;
  readonly limit: number;
  /** Window length in seconds */
  readonly window: number;

  private readonly store: SlidingWindowStore;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CounterOptions = {}) {
    const defaults = getCounterDefaults();
    const settings = parseCounterSettings({
      limit: options.limit ?? DEFAULT_LIMIT,
      window: options.window ?? DEFAULT_WINDOW_SECONDS,
    });

    this.store = options.store ?? getDefaultStore();
    this.key = `${options.namespace ?? defaults.namespace}:${options.key ?? randomUUID()}`;
    this.limit = settings.limit;
    this.window = settings.window;
    this.clock = options.clock ?? REAL_CLOCK;
    this.logger = (options.logger ?? defaults.logger).child({ component: 'Counter', key: this.key });
  }

  private get windowMicros(): number {
    return this.window * MICROS_PER_SECOND;
  }

  /**
   * Record one event if the window has room.
   *
   * @returns In-window count including this event
   * @throws LimitExceededError when `limit` events are already in the window
   */
  async increment(): Promise<number> {
    const now = this.clock.nowMicros();
    const result = await this.store.tryIncrement(
      this.key,
      now,
      this.windowMicros,
      this.limit,
      `${now}:${randomUUID()}`,
    );

    if (!result.admitted) {
      this.logger.debug({ limit: this.limit, count: result.count }, 'Rate limit reached');
      throw new LimitExceededError(this.limit, result.count);
    }
    return result.count;
  }

  /**
   * Remove the oldest in-window event. A no-op returning 0 on an empty window.
   */
  async decrement(): Promise<number> {
    return this.store.decrement(this.key, this.clock.nowMicros(), this.windowMicros);
  }

  async count(): Promise<number> {
    return this.store.count(this.key, this.clock.nowMicros(), this.windowMicros);
  }

  /** Drop every recorded event for this key */
  async reset(): Promise<void> {
    await this.store.reset(this.key);
  }

  /**
   * Increment, then run `work`.
   *
   * Per call: Idle → Incrementing → Rejected, or
   * Admitted → Running → Completed | FailedRolledBack | FailedKept.
   *
   * - LimitExceededError from the increment propagates; `work` never runs.
   * - When `work` throws and `rollback` is on, one event is decremented before
   *   the original error is rethrown. A failed decrement is logged, never thrown.
   * - On success the event stays counted until it leaves the window.
   *
   * The increment and the compensating decrement are two separate store calls;
   * a crash between them leaves the event counted.
   */
  async transaction<T>(work: () => T | Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const rollback = options.rollback ?? true;

    await this.increment();
    try {
      return await work();
    } catch (error) {
      if (rollback) {
        await this.rollback(error);
      }
      throw error;
    }
  }

  private async rollback(cause: unknown): Promise<void> {
    try {
      await this.decrement();
    } catch (decrementError) {
      this.logger.warn(
        { err: decrementError, cause },
        'Rollback decrement failed, event left counted',
      );
    }
  }
}
