import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';

import { BenchConfigError, type BenchConfigErrorReason } from './errors.js';
import { parseUnits } from './format.js';
import {
  BENCH_CONFIG_SCHEMA_V1,
  DEFAULT_ROUNDS,
  DEFAULT_SIGN_DIGITS,
  type BenchConfigV1,
  type BenchOptions,
  type BenchOptionsInput,
  type LoadedBenchConfig
} from './types.js';

const OPTION_KEYS: Array<keyof BenchOptionsInput> = [
  'rounds',
  'units',
  'sign_digits',
  'pretty',
  'list_timings',
  'verbose'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

function readInteger(
  value: unknown,
  field: string,
  reason: BenchConfigErrorReason,
  options: { min?: number } = {}
): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || !Number.isInteger(value)) {
    throw new BenchConfigError(reason, `${field} must be an integer (got ${describeValue(value)})`, { field, value });
  }

  if (options.min !== undefined && value < options.min) {
    throw new BenchConfigError(reason, `${field} must be >= ${options.min} (got ${value})`, { field, value });
  }

  return value;
}

function readBoolean(value: unknown, field: string): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value !== 'boolean') {
    throw new BenchConfigError('BENCH_CONFIG_INVALID', `${field} must be boolean`, { field, value });
  }
  return value;
}

export function readRounds(value: unknown): number {
  return readInteger(value, 'rounds', 'BENCH_ROUNDS_INVALID', { min: 1 });
}

export function readSignDigits(value: unknown): number {
  return readInteger(value, 'sign_digits', 'BENCH_SIGN_DIGITS_INVALID', { min: 0 });
}

/**
 * Applies defaults and validates every option. Nothing has run yet when this throws.
 */
export function resolveBenchOptions(input: BenchOptionsInput = {}): BenchOptions {
  return {
    rounds: readRounds(input.rounds ?? DEFAULT_ROUNDS),
    units: parseUnits(input.units),
    sign_digits: readSignDigits(input.sign_digits ?? DEFAULT_SIGN_DIGITS),
    pretty: readBoolean(input.pretty, 'pretty'),
    list_timings: readBoolean(input.list_timings, 'list_timings'),
    verbose: readBoolean(input.verbose, 'verbose')
  };
}

/** Later inputs win; `undefined` values never override. */
export function mergeBenchOptions(...inputs: BenchOptionsInput[]): BenchOptionsInput {
  const merged: BenchOptionsInput = {};
  for (const input of inputs) {
    for (const key of OPTION_KEYS) {
      if (input[key] !== undefined) {
        merged[key] = input[key];
      }
    }
  }
  return merged;
}

export function parseBenchConfig(rawConfig: string): BenchConfigV1 {
  let parsed: unknown;
  try {
    parsed = YAML.parse(rawConfig);
  } catch (err) {
    throw new BenchConfigError('BENCH_CONFIG_PARSE_ERROR', 'Failed to parse benchmark config', {
      error: err instanceof Error ? err.message : String(err)
    });
  }

  if (parsed === null || parsed === undefined) {
    return { schema: BENCH_CONFIG_SCHEMA_V1 };
  }

  if (!isRecord(parsed)) {
    throw new BenchConfigError('BENCH_CONFIG_INVALID', 'benchmark config must be an object', { field: 'root' });
  }

  if (parsed.schema !== undefined && parsed.schema !== BENCH_CONFIG_SCHEMA_V1) {
    throw new BenchConfigError('BENCH_CONFIG_INVALID', `schema must be ${BENCH_CONFIG_SCHEMA_V1}`, {
      field: 'schema',
      value: parsed.schema
    });
  }

  const unknownKeys = Object.keys(parsed).filter(
    (key) => key !== 'schema' && !OPTION_KEYS.some((option) => option === key)
  );
  if (unknownKeys.length > 0) {
    throw new BenchConfigError('BENCH_CONFIG_INVALID', `unknown config keys: ${unknownKeys.join(', ')}`, {
      field: 'root',
      keys: unknownKeys
    });
  }

  const config: BenchConfigV1 = { schema: BENCH_CONFIG_SCHEMA_V1 };
  for (const key of OPTION_KEYS) {
    if (parsed[key] !== undefined) {
      config[key] = parsed[key];
    }
  }

  // Bad values fail at load time.
  resolveBenchOptions(config);
  return config;
}

export async function loadBenchConfig(configPath: string): Promise<LoadedBenchConfig> {
  const absoluteConfigPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absoluteConfigPath, 'utf8');
  } catch (err) {
    throw new BenchConfigError('BENCH_CONFIG_PARSE_ERROR', `Failed to read benchmark config: ${absoluteConfigPath}`, {
      path: absoluteConfigPath,
      error: err instanceof Error ? err.message : String(err)
    });
  }

  return {
    config_path: absoluteConfigPath,
    config: parseBenchConfig(raw)
  };
}
