import { describe, expect, it } from 'vitest';

import { summarizeSamples } from '../src/bench/aggregate.js';
import { EmptyInputError } from '../src/bench/errors.js';

function pseudoRandomSamples(seed: number, count: number): number[] {
  let state = seed;
  const out: number[] = [];
  for (let i = 0; i < count; i += 1) {
    state = (state * 1_103_515_245 + 12_345) % 2_147_483_648;
    out.push(state % 5_000_000);
  }
  return out;
}

describe('sample statistics', () => {
  it('computes mean, extrema and population standard deviation', () => {
    const stats = summarizeSamples([2, 4, 4, 4, 5, 5, 7, 9]);

    expect(stats).toEqual({ mean: 5, min: 2, max: 9, std: 2 });
  });

  it('keeps fractional means and deviations', () => {
    const stats = summarizeSamples([1, 2, 3, 4]);

    expect(stats.mean).toBe(2.5);
    expect(stats.std).toBeCloseTo(Math.sqrt(1.25), 12);
  });

  it('reports zero deviation for identical samples', () => {
    expect(summarizeSamples([1_000_000, 1_000_000, 1_000_000])).toEqual({
      mean: 1_000_000,
      min: 1_000_000,
      max: 1_000_000,
      std: 0
    });
  });

  it('keeps min <= mean <= max and std >= 0', () => {
    for (const seed of [1, 7, 42, 1_234]) {
      for (const count of [1, 2, 17, 250]) {
        const stats = summarizeSamples(pseudoRandomSamples(seed, count));
        expect(stats.min).toBeLessThanOrEqual(stats.mean);
        expect(stats.mean).toBeLessThanOrEqual(stats.max);
        expect(stats.std).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('refuses an empty sample set', () => {
    expect(() => summarizeSamples([])).toThrow(EmptyInputError);
  });
});
