/**
 * Sliding Window Store Port
 *
 * Contract for a shared, score-ordered store that records timestamped events
 * per key and answers admission questions atomically. Each operation is one
 * indivisible unit as observed by every other caller; there is no atomicity
 * across two operations.
 *
 * Times are integer microseconds since the epoch. `windowMicros` is the
 * window length in seconds multiplied by 1_000_000.
 *
 * @module packages/core/ports/sliding-window
 */

// =============================================================================
// Results
// =============================================================================

/** Outcome of an admission attempt */
export interface IncrementResult {
  /** Whether a new entry was recorded */
  admitted: boolean;
  /** In-window count after the call (unchanged count when rejected) */
  count: number;
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Atomic sliding-window operations.
 * Implementations: Redis (server-side Lua), InMemory (test/prototype).
 */
export interface SlidingWindowStore {
  /**
   * Evict expired entries, then record `member` at score `nowMicros` if fewer
   * than `limit` entries remain in the window.
   */
  tryIncrement(
    key: string,
    nowMicros: number,
    windowMicros: number,
    limit: number,
    member: string,
  ): Promise<IncrementResult>;

  /**
   * Evict expired entries, then remove the oldest in-window entry.
   * Returns the resulting count; 0 and no-op when the window is empty.
   */
  decrement(key: string, nowMicros: number, windowMicros: number): Promise<number>;

  /** Evict expired entries and return the in-window count */
  count(key: string, nowMicros: number, windowMicros: number): Promise<number>;

  /** Drop every entry for `key` */
  reset(key: string): Promise<void>;
}
