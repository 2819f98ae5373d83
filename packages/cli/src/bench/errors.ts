export type BenchConfigErrorReason =
  | 'BENCH_CONFIG_PARSE_ERROR'
  | 'BENCH_CONFIG_INVALID'
  | 'BENCH_ROUNDS_INVALID'
  | 'BENCH_UNITS_INVALID'
  | 'BENCH_SIGN_DIGITS_INVALID'
  | 'BENCH_WORKLOAD_INVALID';

/** Raised for bad configuration, always before the first round runs. */
export class BenchConfigError extends Error {
  readonly reason: BenchConfigErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: BenchConfigErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BenchConfigError';
    this.reason = reason;
    this.details = details;
  }
}

export class EmptyInputError extends Error {
  constructor(message = 'cannot summarize an empty sample set') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class DurationParseError extends Error {
  readonly input: string;

  constructor(input: string, message: string) {
    super(message);
    this.name = 'DurationParseError';
    this.input = input;
  }
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(command: string, exitCode: number | null, signal: string | null) {
    super(
      signal
        ? `command terminated by ${signal}: ${command}`
        : `command exited with code ${String(exitCode)}: ${command}`
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}
