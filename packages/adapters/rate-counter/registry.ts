/**
 * Counter Registry — Declarative Binding
 *
 * A consuming type declares its named counters once, at module load:
 *
 *   const jobCounters = defineCounters<SyncJob>('SyncJob')
 *     .namespace('my_app')
 *     .counter('fastCalls', { limit: 10, window: 30 })
 *     .counter('slowCalls', { limit: 3, window: 300, key: (job) => job.accountId })
 *     .build();
 *
 *   class SyncJob {
 *     private readonly counters = jobCounters.bind(this);
 *     counter(name: 'fastCalls' | 'slowCalls') { return this.counters.counter(name); }
 *   }
 *
 * Each instance owns one CounterBinding, which builds at most one Counter per
 * name and keeps it for the instance's lifetime.
 *
 * @module packages/adapters/rate-counter/registry
 */

import type { Logger } from 'pino';
import type { SlidingWindowStore } from '../../core/ports/index.js';
import type { Clock } from './clock.js';
import { DEFAULT_LIMIT, DEFAULT_WINDOW_SECONDS, parseCounterSettings } from './config.js';
import { Counter } from './counter.js';
import { getCounterDefaults, getDefaultStore } from './defaults.js';
import { UnknownCounterError } from './errors.js';

// --------------------------------------------------------------------------
// Key Sources
// --------------------------------------------------------------------------

export interface LiteralKeySource {
  readonly kind: 'literal';
  readonly value: string;
}

export interface DeferredKeySource<TOwner> {
  readonly kind: 'deferred';
  readonly compute: (owner: TOwner) => string | number;
}

/** Where a counter's key identifier comes from */
export type KeySource<TOwner> = LiteralKeySource | DeferredKeySource<TOwner>;

export function literalKey(value: string | number): LiteralKeySource {
  return { kind: 'literal', value: String(value) };
}

/** Key computed from the owning instance on first access */
export function deferredKey<TOwner>(compute: (owner: TOwner) => string | number): DeferredKeySource<TOwner> {
  return { kind: 'deferred', compute };
}

// --------------------------------------------------------------------------
// Declarations
// --------------------------------------------------------------------------

export interface CounterDeclaration<TOwner> {
  limit?: number;
  /** Window in whole seconds */
  window?: number;
  /** Literal identifier, a function of the owner, or an explicit KeySource */
  key?: string | number | ((owner: TOwner) => string | number) | KeySource<TOwner>;
  namespace?: string;
  store?: SlidingWindowStore;
}

/** Normalized, frozen declaration */
export interface CounterEntry<TOwner> {
  readonly name: string;
  readonly limit?: number;
  readonly window?: number;
  readonly key?: KeySource<TOwner>;
  readonly namespace?: string;
  readonly store?: SlidingWindowStore;
}

/** Type-level settings shared by every counter of a registry */
interface RegistrySettings {
  readonly ownerName?: string;
  readonly namespace?: string;
  readonly store?: SlidingWindowStore;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

function toKeySource<TOwner>(key: CounterDeclaration<TOwner>['key']): KeySource<TOwner> | undefined {
  if (key === undefined) return undefined;
  if (typeof key === 'function') return deferredKey(key);
  if (typeof key === 'object') return key;
  return literalKey(key);
}

function toEntry<TOwner>(name: string, declaration: CounterDeclaration<TOwner>): CounterEntry<TOwner> {
  // Fail at declaration time rather than on first access
  parseCounterSettings({
    limit: declaration.limit ?? DEFAULT_LIMIT,
    window: declaration.window ?? DEFAULT_WINDOW_SECONDS,
  });

  return Object.freeze({
    name,
    limit: declaration.limit,
    window: declaration.window,
    key: toKeySource(declaration.key),
    namespace: declaration.namespace,
    store: declaration.store,
  });
}

// --------------------------------------------------------------------------
// Builder
// --------------------------------------------------------------------------

/**
 * Immutable builder; every call returns a new builder.
 * Declaring a name twice keeps the last declaration.
 */
export class CounterRegistryBuilder<TOwner, TName extends string = never> {
  constructor(
    private readonly settings: RegistrySettings = {},
    private readonly entries: ReadonlyMap<string, CounterEntry<TOwner>> = new Map(),
  ) {}

  namespace(namespace: string): CounterRegistryBuilder<TOwner, TName> {
    return new CounterRegistryBuilder({ ...this.settings, namespace }, this.entries);
  }

  store(store: SlidingWindowStore): CounterRegistryBuilder<TOwner, TName> {
    return new CounterRegistryBuilder({ ...this.settings, store }, this.entries);
  }

  clock(clock: Clock): CounterRegistryBuilder<TOwner, TName> {
    return new CounterRegistryBuilder({ ...this.settings, clock }, this.entries);
  }

  logger(logger: Logger): CounterRegistryBuilder<TOwner, TName> {
    return new CounterRegistryBuilder({ ...this.settings, logger }, this.entries);
  }

  counter<N extends string>(
    name: N,
    declaration: CounterDeclaration<TOwner> = {},
  ): CounterRegistryBuilder<TOwner, TName | N> {
    const entries = new Map(this.entries);
    entries.set(name, toEntry(name, declaration));
    return new CounterRegistryBuilder<TOwner, TName | N>(this.settings, entries);
  }

  build(): CounterRegistry<TOwner, TName> {
    return new CounterRegistry<TOwner, TName>(this.settings, new Map(this.entries));
  }
}

/**
 * Start declaring counters for `TOwner`.
 *
 * @param ownerName - Used in UnknownCounterError messages
 */
export function defineCounters<TOwner>(ownerName?: string): CounterRegistryBuilder<TOwner> {
  return new CounterRegistryBuilder<TOwner>({ ownerName });
}

// --------------------------------------------------------------------------
// Registry
// --------------------------------------------------------------------------

export class CounterRegistry<TOwner, TName extends string> {
  private readonly bindings = new WeakMap<object, CounterBinding<TOwner, TName>>();

  constructor(
    private readonly settings: RegistrySettings,
    private readonly entries: ReadonlyMap<string, CounterEntry<TOwner>>,
  ) {}

  get ownerName(): string | undefined {
    return this.settings.ownerName;
  }

  /** Type-level namespace default */
  get namespace(): string | undefined {
    return this.settings.namespace;
  }

  /** Type-level store default */
  get store(): SlidingWindowStore | undefined {
    return this.settings.store;
  }

  names(): TName[] {
    return [...this.entries.keys()].filter((name): name is TName => this.has(name));
  }

  has(name: string): name is TName {
    return this.entries.has(name);
  }

  config(name: string): CounterEntry<TOwner> | undefined {
    return this.entries.get(name);
  }

  /**
   * Per-instance accessor. Object owners get the same binding on every call;
   * primitive owners cannot be held weakly and get a fresh one.
   */
  bind(owner: TOwner): CounterBinding<TOwner, TName> {
    if (!isWeakKey(owner)) return new CounterBinding(this, owner);

    const existing = this.bindings.get(owner);
    if (existing) return existing;

    const binding = new CounterBinding(this, owner);
    this.bindings.set(owner, binding);
    return binding;
  }

  /**
   * Build a Counter for `entry` on behalf of `owner`.
   * Precedence for namespace and store: counter → registry → process default.
   */
  materialize(entry: CounterEntry<TOwner>, owner: TOwner): Counter {
    const defaults = getCounterDefaults();
    return new Counter({
      namespace: entry.namespace ?? this.settings.namespace ?? defaults.namespace,
      key: resolveKey(entry, owner),
      limit: entry.limit ?? DEFAULT_LIMIT,
      window: entry.window ?? DEFAULT_WINDOW_SECONDS,
      store: entry.store ?? this.settings.store ?? getDefaultStore(),
      clock: this.settings.clock,
      logger: this.settings.logger,
    });
  }
}

function isWeakKey(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function resolveKey<TOwner>(entry: CounterEntry<TOwner>, owner: TOwner): string {
  if (!entry.key) return entry.name;
  if (entry.key.kind === 'literal') return entry.key.value;
  return String(entry.key.compute(owner));
}

// --------------------------------------------------------------------------
// Binding
// --------------------------------------------------------------------------

/**
 * Counters materialized for one owner. Owned by that instance and dropped
 * with it.
 */
export class CounterBinding<TOwner, TName extends string> {
  private readonly cache = new Map<string, Counter>();

  constructor(
    private readonly registry: CounterRegistry<TOwner, TName>,
    private readonly owner: TOwner,
  ) {}

  /**
   * The owner's Counter for `name`, built on first access.
   *
   * @throws UnknownCounterError when `name` was never declared
   */
  counter(name: TName): Counter {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const entry = this.registry.config(name);
    if (!entry) {
      throw new UnknownCounterError(name, this.registry.ownerName);
    }

    const counter = this.registry.materialize(entry, this.owner);
    this.cache.set(name, counter);
    return counter;
  }
}
