import { describe, it, expect } from 'vitest';
import { mulberry32, createRng, gaussian } from '../rng.js';

describe('mulberry32', () => {
  it('is deterministic for a seed', () => {
    const a = mulberry32(3);
    const b = mulberry32(3);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it('stays in [0, 1)', () => {
    const rng = mulberry32(99);
    for (let i = 0; i < 1000; i++) {
      const x = rng();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });
});

describe('createRng', () => {
  it('uses Math.random without a seed', () => {
    expect(createRng()).toBe(Math.random);
  });
  it('seeds when given a seed', () => {
    expect(createRng(5)()).toBe(mulberry32(5)());
  });
});

describe('gaussian', () => {
  it('produces finite samples', () => {
    const rng = mulberry32(11);
    for (let i = 0; i < 100; i++) {
      expect(Number.isFinite(gaussian(rng))).toBe(true);
    }
  });
});
