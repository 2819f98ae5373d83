export const BENCH_CONFIG_SCHEMA_V1 = 'roundbench.config.v1' as const;

export const DEFAULT_ROUNDS = 50;
export const DEFAULT_SIGN_DIGITS = 4;

/** Units accepted by fixed-unit formatting. `us` is an alias of `µs`. */
export const DURATION_UNITS = ['ns', 'µs', 'ms', 'sec', 'min'] as const;
export type DurationUnit = (typeof DURATION_UNITS)[number];

/** One integer nanosecond measurement per round. */
export type RawSample = number;

/** Samples in execution order; length equals the round count. */
export type SampleSet = readonly RawSample[];

export interface BenchStatistics {
  mean: number;
  min: number;
  max: number;
  std: number;
}

export interface BenchRecord {
  mean: string;
  min: string;
  max: string;
  std: string;
  times?: string[];
}

export type BenchReport =
  | { kind: 'pretty'; text: string }
  | { kind: 'record'; record: BenchRecord };

export type BenchOutputFormat = 'json' | 'table';

export interface BenchOptions {
  rounds: number;
  units?: DurationUnit;
  sign_digits: number;
  pretty: boolean;
  list_timings: boolean;
  verbose: boolean;
}

/** Unvalidated options as they arrive from flags or a config file. */
export interface BenchOptionsInput {
  rounds?: unknown;
  units?: unknown;
  sign_digits?: unknown;
  pretty?: unknown;
  list_timings?: unknown;
  verbose?: unknown;
}

export interface BenchConfigV1 extends BenchOptionsInput {
  schema: typeof BENCH_CONFIG_SCHEMA_V1;
}

export interface LoadedBenchConfig {
  config_path: string;
  config: BenchConfigV1;
}

export type Workload = () => unknown;

/** Monotonic clock reading in nanoseconds. */
export type Clock = () => bigint;

export interface ProgressSink {
  round(index: number, rounds: number): void;
  done(rounds: number): void;
}
