/**
 * Process-wide Counter Defaults
 *
 * Single initialization point for the store, namespace and logger that
 * counters use when none is passed. Set once at bootstrap with
 * configureCounters(); counters read it at construction and never write it.
 */

import type { Logger } from 'pino';
import type { SlidingWindowStore } from '../../core/ports/index.js';
import { DEFAULT_NAMESPACE } from './config.js';
import { StoreNotConfiguredError } from './errors.js';
import { createLogger } from './logger.js';

export interface CounterDefaults {
  store: SlidingWindowStore | null;
  namespace: string;
  logger: Logger;
}

function initialDefaults(): CounterDefaults {
  return {
    store: null,
    namespace: DEFAULT_NAMESPACE,
    logger: createLogger('info'),
  };
}

let defaults: CounterDefaults = initialDefaults();

/**
 * Set the process-wide defaults. Fields left out keep their current value.
 */
export function configureCounters(options: Partial<CounterDefaults>): void {
  defaults = {
    store: options.store !== undefined ? options.store : defaults.store,
    namespace: options.namespace ?? defaults.namespace,
    logger: options.logger ?? defaults.logger,
  };
}

/** Snapshot of the current defaults */
export function getCounterDefaults(): Readonly<CounterDefaults> {
  return defaults;
}

/**
 * The default store, or StoreNotConfiguredError when bootstrap never set one.
 */
export function getDefaultStore(): SlidingWindowStore {
  if (!defaults.store) {
    throw new StoreNotConfiguredError();
  }
  return defaults.store;
}

/** Restore the initial (unconfigured) defaults. Intended for tests. */
export function resetCounterDefaults(): void {
  defaults = initialDefaults();
}
