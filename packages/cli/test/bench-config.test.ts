import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { loadBenchConfig, mergeBenchOptions, parseBenchConfig, resolveBenchOptions } from '../src/bench/config.js';
import { BenchConfigError } from '../src/bench/errors.js';

const EXAMPLE_CONFIG = fileURLToPath(new URL('../examples/roundbench.yaml', import.meta.url));

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('benchmark options', () => {
  it('applies defaults', () => {
    expect(resolveBenchOptions({})).toEqual({
      rounds: 50,
      units: undefined,
      sign_digits: 4,
      pretty: false,
      list_timings: false,
      verbose: false
    });
  });

  it('normalizes unit aliases', () => {
    expect(resolveBenchOptions({ units: 'us' }).units).toBe('µs');
  });

  it('rejects invalid round counts with the offending value', () => {
    expect(() => resolveBenchOptions({ rounds: 0 })).toThrow('rounds must be >= 1 (got 0)');
    expect(() => resolveBenchOptions({ rounds: 2.5 })).toThrow('rounds must be an integer (got 2.5)');
    expect(() => resolveBenchOptions({ rounds: Number.NaN })).toThrow(BenchConfigError);
  });

  it('rejects negative significant digits', () => {
    expect(thrownBy(() => resolveBenchOptions({ sign_digits: -1 }))).toMatchObject({ reason: 'BENCH_SIGN_DIGITS_INVALID' });
  });

  it('lets later inputs override earlier ones, skipping undefined values', () => {
    expect(mergeBenchOptions({ rounds: 10, units: 'ms' }, { rounds: undefined, units: 'ns', pretty: true })).toEqual({
      rounds: 10,
      units: 'ns',
      pretty: true
    });
  });
});

describe('benchmark config parser', () => {
  it('parses a v1 options file', () => {
    const config = parseBenchConfig(`
schema: roundbench.config.v1
rounds: 10
units: us
sign_digits: 0
list_timings: true
`);

    expect(config).toEqual({
      schema: 'roundbench.config.v1',
      rounds: 10,
      units: 'us',
      sign_digits: 0,
      list_timings: true
    });
  });

  it('treats an empty file as defaults', () => {
    expect(parseBenchConfig('')).toEqual({ schema: 'roundbench.config.v1' });
  });

  it('rejects invalid values in the file', () => {
    expect(thrownBy(() => parseBenchConfig('rounds: 0\n'))).toMatchObject({ reason: 'BENCH_ROUNDS_INVALID' });
    expect(thrownBy(() => parseBenchConfig('units: furlongs\n'))).toMatchObject({ reason: 'BENCH_UNITS_INVALID' });
    expect(() => parseBenchConfig('pretty: sometimes\n')).toThrow('pretty must be boolean');
  });

  it('rejects unknown schemas, unknown keys and malformed YAML', () => {
    expect(() => parseBenchConfig('schema: other.config.v1\n')).toThrow('schema must be roundbench.config.v1');
    expect(() => parseBenchConfig('warmup: 3\n')).toThrow('unknown config keys: warmup');
    expect(thrownBy(() => parseBenchConfig('rounds: [1\n'))).toMatchObject({ reason: 'BENCH_CONFIG_PARSE_ERROR' });
    expect(() => parseBenchConfig('- 1\n- 2\n')).toThrow('benchmark config must be an object');
  });

  it('loads the bundled example config', async () => {
    const loaded = await loadBenchConfig(EXAMPLE_CONFIG);

    expect(resolveBenchOptions(loaded.config)).toEqual({
      rounds: 100,
      units: 'ms',
      sign_digits: 3,
      pretty: false,
      list_timings: false,
      verbose: false
    });
  });

  it('loads options files from disk', async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'roundbench-config-'));
    const configPath = path.join(tmpDir, 'roundbench.yaml');

    try {
      await fs.writeFile(configPath, 'rounds: 7\nunits: ms\n', 'utf8');
      const loaded = await loadBenchConfig(configPath);

      expect(loaded.config_path).toBe(path.resolve(configPath));
      expect(loaded.config).toEqual({ schema: 'roundbench.config.v1', rounds: 7, units: 'ms' });

      await expect(loadBenchConfig(path.join(tmpDir, 'missing.yaml'))).rejects.toMatchObject({
        reason: 'BENCH_CONFIG_PARSE_ERROR'
      });
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });
});
