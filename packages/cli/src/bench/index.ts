export { BenchConfigError, CommandFailedError, DurationParseError, EmptyInputError } from './errors.js';
export { loadBenchConfig, mergeBenchOptions, parseBenchConfig, resolveBenchOptions } from './config.js';
export { formatDuration, parseDuration, parseUnits, roundSignificant } from './format.js';
export { summarizeSamples } from './aggregate.js';
export { createProgressWriter, hrtimeClock, runRounds } from './runner.js';
export { buildReport, renderReport } from './report.js';
export { benchmark } from './benchmark.js';
export * from './types.js';
