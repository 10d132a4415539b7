/**
 * Manual Clock Stub
 *
 * Deterministic microsecond clock for sliding-window tests. Time only moves
 * when a test advances it.
 */

import type { Clock } from '../../packages/adapters/rate-counter/clock.js';

/** 2023-11-14T22:13:20Z in microseconds */
export const EPOCH_MICROS = 1_700_000_000_000_000;

export class ManualClock implements Clock {
  constructor(private micros: number = EPOCH_MICROS) {}

  nowMicros(): number {
    return this.micros;
  }

  advanceMicros(micros: number): void {
    this.micros += micros;
  }

  advanceSeconds(seconds: number): void {
    this.micros += Math.round(seconds * 1_000_000);
  }
}
