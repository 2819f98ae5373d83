import { summarizeSamples } from './aggregate.js';
import { resolveBenchOptions } from './config.js';
import { buildReport } from './report.js';
import { createProgressWriter, runRounds } from './runner.js';
import type { BenchOptionsInput, BenchReport, Clock, ProgressSink, Workload } from './types.js';

export interface BenchmarkDeps {
  clock?: Clock;
  /** Receives progress when `verbose` is set; defaults to stdout. */
  progress?: ProgressSink;
}

export async function benchmark(
  workload: Workload,
  input: BenchOptionsInput = {},
  deps: BenchmarkDeps = {}
): Promise<BenchReport> {
  const options = resolveBenchOptions(input);
  const progress = options.verbose ? deps.progress ?? createProgressWriter() : undefined;

  const samples = await runRounds(workload, options.rounds, { clock: deps.clock, progress });
  return buildReport(summarizeSamples(samples), samples, options);
}
