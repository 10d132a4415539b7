/**
 * Clock Unit Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { REAL_CLOCK } from '../../packages/adapters/rate-counter/clock.js';

describe('REAL_CLOCK', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reads the system wall clock in microseconds', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2030-01-01T00:00:00.250Z'));

    expect(REAL_CLOCK.nowMicros()).toBe(Date.UTC(2030, 0, 1, 0, 0, 0, 250) * 1000);
  });

  it('follows a step in system time', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2030-01-01T00:00:00Z'));
    const before = REAL_CLOCK.nowMicros();

    vi.setSystemTime(new Date('2030-01-01T00:00:05Z'));

    expect(REAL_CLOCK.nowMicros() - before).toBe(5_000_000);
    expect(Number.isInteger(REAL_CLOCK.nowMicros())).toBe(true);
  });
});
