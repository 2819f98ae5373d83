#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';

import { benchmark } from './bench/benchmark.js';
import { loadBenchConfig, mergeBenchOptions, resolveBenchOptions } from './bench/config.js';
import { BenchConfigError } from './bench/errors.js';
import { ACCEPTED_UNIT_TOKENS } from './bench/format.js';
import { renderReport } from './bench/report.js';
import { DEFAULT_ROUNDS, DEFAULT_SIGN_DIGITS, type BenchOptionsInput } from './bench/types.js';
import { compileWorkload, shellWorkload } from './workload.js';

async function writeOutput(args: { out?: string }, content: string): Promise<void> {
  if (args.out) {
    await fs.writeFile(args.out, content, 'utf8');
    return;
  }
  process.stdout.write(content);
}

async function readConfigFile(configPath: string | undefined): Promise<BenchOptionsInput> {
  if (!configPath) return {};
  const loaded = await loadBenchConfig(configPath);
  return loaded.config;
}

export async function main(argv = process.argv): Promise<number> {
  // `process.exitCode` persists across multiple `main()` calls in the same process (tests).
  process.exitCode = 0;

  const parser = yargs(hideBin(argv))
    .scriptName('roundbench')
    .strict()
    .help()
    .command(
      '$0 <code>',
      'Run a unit of work repeatedly and report timing statistics',
      (cmd) =>
        cmd
          .positional('code', {
            type: 'string',
            describe: 'JavaScript function body to benchmark (a shell command with --shell)',
            demandOption: true
          })
          .option('rounds', {
            alias: 'n',
            type: 'number',
            describe: `Number of sequential rounds (default ${DEFAULT_ROUNDS})`
          })
          .option('verbose', {
            alias: 'v',
            type: 'boolean',
            describe: 'Print round progress to stdout'
          })
          .option('pretty', {
            type: 'boolean',
            describe: 'Emit "<mean> +/- <std>" instead of a record'
          })
          .option('units', {
            type: 'string',
            describe: `Render every duration in one unit (${ACCEPTED_UNIT_TOKENS.join(', ')})`
          })
          .option('list-timings', {
            type: 'boolean',
            describe: 'Include every per-round timing in the record (ignored with --pretty)'
          })
          .option('sign-digits', {
            type: 'number',
            describe: `Significant digits kept in aggregate durations, 0 disables rounding (default ${DEFAULT_SIGN_DIGITS})`
          })
          .option('shell', {
            type: 'boolean',
            default: false,
            describe: 'Treat <code> as a shell command'
          })
          .option('config', {
            type: 'string',
            describe: 'Path to a roundbench YAML options file; flags take precedence'
          })
          .option('format', {
            choices: ['json', 'table'] as const,
            default: 'json' as const,
            describe: 'Output format for the report record'
          })
          .option('out', {
            type: 'string',
            describe: 'Write output to this file (default: stdout)'
          }),
      async (args) => {
        try {
          const fromFile = await readConfigFile(args.config);
          const options = resolveBenchOptions(mergeBenchOptions(fromFile, {
            rounds: args.rounds,
            units: args.units,
            sign_digits: args.signDigits,
            pretty: args.pretty,
            list_timings: args.listTimings,
            verbose: args.verbose
          }));

          const code = String(args.code);
          const workload = args.shell ? shellWorkload(code) : compileWorkload(code);
          const report = await benchmark(workload, options);
          await writeOutput(args, renderReport(report, args.format));
        } catch (err) {
          if (err instanceof BenchConfigError) {
            console.error(err.message);
            process.exitCode = 2;
            return;
          }
          console.error(err instanceof Error ? err.message : String(err));
          process.exitCode = 1;
        }
      }
    );

  await parser.parse();
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
