import { EmptyInputError } from './errors.js';
import type { BenchStatistics, SampleSet } from './types.js';

/**
 * Reduces samples to mean, extrema and population standard deviation (divisor N).
 * Values stay fractional; truncation happens when they are formatted.
 */
export function summarizeSamples(samples: SampleSet): BenchStatistics {
  if (samples.length === 0) {
    throw new EmptyInputError();
  }

  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const sample of samples) {
    sum += sample;
    if (sample < min) min = sample;
    if (sample > max) max = sample;
  }

  const mean = sum / samples.length;
  const squaredDeviation = samples.reduce((acc, sample) => acc + (sample - mean) ** 2, 0);

  return {
    mean,
    min,
    max,
    std: Math.sqrt(squaredDeviation / samples.length)
  };
}
