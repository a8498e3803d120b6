import { describe, it, expect } from '@jest/globals';
import { DeterministicClock, formatCompactTimestamp } from '../clock/clock.js';

describe('DeterministicClock', () => {
  it('starts at the epoch and advances by the tick after each read', () => {
    const clock = new DeterministicClock(1_000, 250);
    expect(clock.now().getTime()).toBe(1_000);
    expect(clock.now().getTime()).toBe(1_250);
    clock.advance(10_000);
    expect(clock.now().getTime()).toBe(11_500);
  });
});

describe('formatCompactTimestamp', () => {
  it('renders UTC down to the millisecond', () => {
    expect(formatCompactTimestamp(new Date(Date.UTC(2024, 2, 5, 14, 30, 15, 42)))).toBe('20240305143015042');
  });

  it('pads single-digit fields', () => {
    expect(formatCompactTimestamp(new Date(Date.UTC(2025, 0, 1, 0, 0, 0, 7)))).toBe('20250101000000007');
  });
});
