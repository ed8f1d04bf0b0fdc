import { describe, it, expect } from 'vitest';
import { ParseError, TICK_INTERVAL_MS, resolve, runCountdown } from './index.js';

describe('core package', () => {
  it('exports the resolver and the countdown driver', () => {
    expect(typeof resolve).toBe('function');
    expect(typeof runCountdown).toBe('function');
    expect(TICK_INTERVAL_MS).toBe(1000);
  });

  it('exports the error types', () => {
    expect(() => resolve('abc', new Date(2024, 0, 15, 8))).toThrow(ParseError);
  });
});
