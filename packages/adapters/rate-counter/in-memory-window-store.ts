/**
 * In-Memory Sliding Window Store
 *
 * Map-based sorted sets for test/prototype mode, with the same eviction,
 * admission and TTL rules as the Redis scripts.
 * Each call is atomic within a single Node.js event loop (no awaits between
 * the read and the write).
 *
 * @module packages/adapters/rate-counter/in-memory-window-store
 */

import type { IncrementResult, SlidingWindowStore } from '../../core/ports/index.js';
import { MICROS_PER_SECOND } from './clock.js';

interface WindowEntry {
  score: number;
  member: string;
}

interface WindowSet {
  /** Ascending by score, then member */
  entries: WindowEntry[];
  /** Key expiry in microseconds, null when no TTL was set */
  expiresAtMicros: number | null;
}

export class InMemoryWindowStore implements SlidingWindowStore {
  private sets: Map<string, WindowSet> = new Map();

  async tryIncrement(
    key: string,
    nowMicros: number,
    windowMicros: number,
    limit: number,
    member: string,
  ): Promise<IncrementResult> {
    const set = this.evict(key, nowMicros, windowMicros);
    const count = set.entries.length;

    if (count >= limit) {
      return { admitted: false, count };
    }

    insert(set.entries, { score: nowMicros, member });
    set.expiresAtMicros = nowMicros + Math.floor(windowMicros / MICROS_PER_SECOND) * MICROS_PER_SECOND;
    this.sets.set(key, set);
    return { admitted: true, count: count + 1 };
  }

  async decrement(key: string, nowMicros: number, windowMicros: number): Promise<number> {
    const set = this.evict(key, nowMicros, windowMicros);
    if (set.entries.length === 0) return 0;

    set.entries.shift();
    if (set.entries.length === 0) this.sets.delete(key);
    return set.entries.length;
  }

  async count(key: string, nowMicros: number, windowMicros: number): Promise<number> {
    return this.evict(key, nowMicros, windowMicros).entries.length;
  }

  async reset(key: string): Promise<void> {
    this.sets.delete(key);
  }

  /** Scores currently stored for `key`, oldest first (no eviction) */
  scores(key: string): number[] {
    return (this.sets.get(key)?.entries ?? []).map((e) => e.score);
  }

  /** Whether `key` exists (neither reset nor expired as of its last access) */
  has(key: string): boolean {
    return this.sets.has(key);
  }

  /**
   * Drop the key if its TTL elapsed, then remove entries scored at or
   * below now - window. Empty sets are deleted, like Redis does.
   */
  private evict(key: string, nowMicros: number, windowMicros: number): WindowSet {
    let set = this.sets.get(key);
    if (set && set.expiresAtMicros !== null && nowMicros >= set.expiresAtMicros) {
      this.sets.delete(key);
      set = undefined;
    }
    if (!set) {
      return { entries: [], expiresAtMicros: null };
    }

    const cutoff = nowMicros - windowMicros;
    const firstLive = set.entries.findIndex((e) => e.score > cutoff);
    if (firstLive === -1) {
      set.entries = [];
    } else if (firstLive > 0) {
      set.entries.splice(0, firstLive);
    }

    if (set.entries.length === 0) {
      this.sets.delete(key);
    }
    return set;
  }
}

function insert(entries: WindowEntry[], entry: WindowEntry): void {
  const existing = entries.findIndex((e) => e.member === entry.member);
  if (existing !== -1) entries.splice(existing, 1);

  const at = entries.findIndex(
    (e) => e.score > entry.score || (e.score === entry.score && e.member > entry.member),
  );
  if (at === -1) {
    entries.push(entry);
  } else {
    entries.splice(at, 0, entry);
  }
}
