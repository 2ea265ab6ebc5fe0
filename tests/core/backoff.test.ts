import { describe, it, expect } from 'vitest';
import { backoffDelayMs, jitter, randomWaitMs } from '@hltvsync/core';

const policy = { baseMs: 2000, maxMs: 30000, jitterMs: 1000 };

describe('backoffDelayMs', () => {
  it('doubles per failed attempt', () => {
    const zero = () => 0;
    expect([1, 2, 3, 4].map((n) => backoffDelayMs(n, policy, zero))).toEqual([
      2000, 4000, 8000, 16000,
    ]);
  });

  it('never exceeds the cap before jitter', () => {
    expect(backoffDelayMs(10, policy, () => 0)).toBe(30000);
  });

  it('adds up to jitterMs of random spread', () => {
    expect(backoffDelayMs(1, policy, () => 0.999)).toBe(2999);
    expect(backoffDelayMs(1, policy, () => 0.5)).toBe(2500);
  });
});

describe('jitter / randomWaitMs', () => {
  it('stays within its range', () => {
    expect(jitter(100, 50, () => 0.5)).toBe(125);
    expect(randomWaitMs(3, 7, () => 0)).toBe(3);
    expect(randomWaitMs(3, 7, () => 0.9999)).toBe(7);
  });
});
