/**
 * Clock Interface
 *
 * Injectable microsecond clock for the counter and its tests.
 * Read once per store call, never cached across calls.
 */

// --------------------------------------------------------------------------
// Clock Interface
// --------------------------------------------------------------------------

/** Injectable clock for testability */
export interface Clock {
  /** Returns current wall-clock time in integer microseconds since epoch */
  nowMicros(): number;
}

/** Microseconds per second */
export const MICROS_PER_SECOND = 1_000_000;

/**
 * Default clock: system wall time, read on every call so NTP steps are
 * followed. Millisecond resolution; members stay unique through their nonce.
 */
export const REAL_CLOCK: Clock = {
  nowMicros: () => Date.now() * 1000,
};
