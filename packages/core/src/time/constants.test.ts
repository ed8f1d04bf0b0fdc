import { describe, it, expect } from 'vitest';
import {
  MS_PER_SECOND,
  SECONDS_PER_MINUTE,
  SECONDS_PER_HOUR,
  HOURS_PER_HALF_DAY,
  HOUR_RANGE,
  MINUTE_RANGE,
  SECOND_RANGE,
  TICK_INTERVAL_MS,
} from './constants.js';

describe('time constants', () => {
  it('SECONDS_PER_HOUR should be 3600', () => {
    expect(SECONDS_PER_HOUR).toBe(3600);
    // Verify: 60 minutes × 60 seconds = 3600
    expect(SECONDS_PER_MINUTE * 60).toBe(SECONDS_PER_HOUR);
  });

  it('field ranges should cover a 24-hour day', () => {
    expect(HOUR_RANGE).toEqual({ min: 0, max: 23 });
    expect(MINUTE_RANGE).toEqual({ min: 0, max: 59 });
    expect(SECOND_RANGE).toEqual({ min: 0, max: 59 });
    expect((HOUR_RANGE.max + 1) / HOURS_PER_HALF_DAY).toBe(2);
  });

  it('TICK_INTERVAL_MS should be one second', () => {
    expect(TICK_INTERVAL_MS).toBe(MS_PER_SECOND);
  });
});
