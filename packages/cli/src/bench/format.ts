import { BenchConfigError, DurationParseError } from './errors.js';
import type { DurationUnit } from './types.js';

const NS_PER_UNIT: Record<DurationUnit, number> = {
  ns: 1,
  'µs': 1_000,
  ms: 1_000_000,
  sec: 1_000_000_000,
  min: 60_000_000_000
};

// Largest first; used for the multi-unit rendering.
const DECOMPOSITION: Array<{ label: string; ns: number }> = [
  { label: 'wk', ns: 604_800_000_000_000 },
  { label: 'day', ns: 86_400_000_000_000 },
  { label: 'hr', ns: 3_600_000_000_000 },
  { label: 'min', ns: 60_000_000_000 },
  { label: 'sec', ns: 1_000_000_000 },
  { label: 'ms', ns: 1_000_000 },
  { label: 'µs', ns: 1_000 },
  { label: 'ns', ns: 1 }
];

const UNIT_ALIASES = new Map<string, DurationUnit>([
  ['ns', 'ns'],
  ['µs', 'µs'],
  ['μs', 'µs'],
  ['us', 'µs'],
  ['ms', 'ms'],
  ['sec', 'sec'],
  ['min', 'min']
]);

const PARSE_UNITS = new Map<string, number>([
  ...DECOMPOSITION.map((unit): [string, number] => [unit.label, unit.ns]),
  ['μs', 1_000],
  ['us', 1_000]
]);

// A double carries at most 17 significant decimal digits.
const MAX_SIGNIFICANT_DIGITS = 17;

const FIXED_PATTERN = /^(\d+(?:\.\d+)?) (\S+)$/;
const COMPONENT_PATTERN = /^(\d+)(\D+)$/;

export const ACCEPTED_UNIT_TOKENS = [...UNIT_ALIASES.keys()].filter((token) => token !== 'μs');

/**
 * Normalizes a unit token (`us` becomes `µs`). Absent tokens mean "no fixed unit".
 */
export function parseUnits(token: unknown): DurationUnit | undefined {
  if (token === undefined || token === null) return undefined;
  if (typeof token === 'string') {
    const unit = UNIT_ALIASES.get(token.trim());
    if (unit) return unit;
  }

  throw new BenchConfigError(
    'BENCH_UNITS_INVALID',
    `units must be one of ${ACCEPTED_UNIT_TOKENS.join(', ')} (got ${JSON.stringify(token)})`,
    { field: 'units', value: token }
  );
}

function magnitude(value: number): number {
  if (value >= 1 && value < 1e21) {
    return String(Math.floor(value)).length;
  }
  return Math.floor(Math.log10(value)) + 1;
}

/**
 * Keeps the first `digits` significant digits of `value`, rounding half up.
 * `digits <= 0`, or more digits than a double holds, returns the value untouched.
 */
export function roundSignificant(value: number, digits: number): number {
  if (digits <= 0 || digits >= MAX_SIGNIFICANT_DIGITS || value <= 0 || !Number.isFinite(value)) return value;

  const shift = magnitude(value) - digits;
  if (shift >= 0) {
    const scale = 10 ** shift;
    return Math.round(value / scale) * scale;
  }

  const scale = 10 ** -shift;
  const scaled = value * scale;
  if (!Number.isFinite(scaled)) return value;
  return Math.round(scaled) / scale;
}

function decompose(ns: number): string {
  if (ns === 0) return '0ns';

  const parts: string[] = [];
  let rest = ns;
  for (const unit of DECOMPOSITION) {
    const count = Math.floor(rest / unit.ns);
    if (count > 0) {
      parts.push(`${count}${unit.label}`);
      rest -= count * unit.ns;
    }
  }
  return parts.join(' ');
}

export function formatDuration(ns: number, units: DurationUnit | undefined, signDigits: number): string {
  if (!Number.isFinite(ns) || ns < 0) {
    throw new RangeError(`duration must be a non-negative number of nanoseconds (got ${ns})`);
  }

  // Rounding happens before truncation so the unit boundaries see the rounded magnitude.
  const rounded = signDigits > 0 ? roundSignificant(ns, signDigits) : ns;
  const whole = Math.trunc(rounded);

  if (units) {
    return `${(whole / NS_PER_UNIT[units]).toFixed(2)} ${units}`;
  }
  return decompose(whole);
}

/**
 * Reads back either rendering produced by {@link formatDuration}. Fixed-unit
 * values are rounded to the nearest nanosecond.
 */
export function parseDuration(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new DurationParseError(text, 'duration string is empty');
  }

  const fixed = FIXED_PATTERN.exec(trimmed);
  if (fixed) {
    const unit = UNIT_ALIASES.get(fixed[2] ?? '');
    if (!unit) {
      throw new DurationParseError(text, `unknown duration unit: ${fixed[2]}`);
    }
    return Math.round(Number(fixed[1]) * NS_PER_UNIT[unit]);
  }

  let total = 0;
  for (const component of trimmed.split(/\s+/)) {
    const match = COMPONENT_PATTERN.exec(component);
    const size = match ? PARSE_UNITS.get(match[2] ?? '') : undefined;
    if (!match || size === undefined) {
      throw new DurationParseError(text, `invalid duration component: ${component}`);
    }
    total += Number(match[1]) * size;
  }
  return total;
}
