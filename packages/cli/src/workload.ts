import { spawnSync } from 'node:child_process';
import vm from 'node:vm';

import { BenchConfigError, CommandFailedError } from './bench/errors.js';
import type { Workload } from './bench/types.js';

/**
 * Compiles a JavaScript function body into a zero-argument workload. The body runs
 * in the current global context, so state it keeps on `globalThis` survives
 * between rounds.
 */
export function compileWorkload(code: string): Workload {
  if (code.trim().length === 0) {
    throw new BenchConfigError('BENCH_WORKLOAD_INVALID', 'workload code must not be empty', { field: 'code' });
  }

  let fn: ReturnType<typeof vm.compileFunction>;
  try {
    fn = vm.compileFunction(code, [], { filename: 'roundbench-workload.js' });
  } catch (err) {
    throw new BenchConfigError('BENCH_WORKLOAD_INVALID', `workload code does not compile: ${err instanceof Error ? err.message : String(err)}`, {
      field: 'code',
      error: err instanceof Error ? err.message : String(err)
    });
  }

  return () => fn.call(undefined);
}

/** Runs `command` through the system shell once per invocation, output discarded. */
export function shellWorkload(command: string): Workload {
  if (command.trim().length === 0) {
    throw new BenchConfigError('BENCH_WORKLOAD_INVALID', 'workload command must not be empty', { field: 'code' });
  }

  return () => {
    const result = spawnSync(command, { shell: true, stdio: 'ignore' });
    if (result.error) {
      throw result.error;
    }
    if (result.status !== 0) {
      throw new CommandFailedError(command, result.status, result.signal);
    }
  };
}
