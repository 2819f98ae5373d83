import { readRounds } from './config.js';
import type { Clock, ProgressSink, SampleSet, Workload } from './types.js';

export interface RunRoundsOptions {
  clock?: Clock;
  progress?: ProgressSink;
}

export interface TextSink {
  write(chunk: string): unknown;
}

export const hrtimeClock: Clock = () => process.hrtime.bigint();

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Writes `i / rounds` in place after every round and a final `rounds / rounds` line.
 */
export function createProgressWriter(sink: TextSink = process.stdout): ProgressSink {
  return {
    round(index, rounds) {
      sink.write(`${index} / ${rounds}\r`);
    },
    done(rounds) {
      sink.write(`${rounds} / ${rounds}\n`);
    }
  };
}

/**
 * Invokes `workload` once per round, strictly one after another, and returns the
 * elapsed nanoseconds of each invocation in execution order. A promise returned by
 * the workload is awaited inside the timed region. Errors thrown by the workload
 * propagate as-is and discard the samples taken so far.
 */
export async function runRounds(
  workload: Workload,
  rounds: number,
  options: RunRoundsOptions = {}
): Promise<SampleSet> {
  const total = readRounds(rounds);
  const clock = options.clock ?? hrtimeClock;

  const samples: number[] = [];
  for (let round = 1; round <= total; round += 1) {
    const startNs = clock();
    const result = workload();
    if (isPromiseLike(result)) {
      await result;
    }
    samples.push(Number(clock() - startNs));
    options.progress?.round(round, total);
  }

  options.progress?.done(total);
  return samples;
}
