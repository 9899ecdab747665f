import { InvalidArgumentError } from '../errors.js';

export type TimeUnit = 'fs' | 'ps' | 'ns' | 'us' | 'ms' | 's';

export interface SimulationTime {
  value: number;
  unit: TimeUnit;
}

const UNIT_EXPONENT: Record<TimeUnit, number> = {
  fs: 0,
  ps: 3,
  ns: 6,
  us: 9,
  ms: 12,
  s: 15,
};

const TIME_PATTERN = /(\d+(?:\.\d+)?)\s*(fs|ps|ns|us|ms|s)\b/;

export const ZERO_TIME: SimulationTime = { value: 0, unit: 'ns' };

function isTimeUnit(value: string): value is TimeUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_EXPONENT, value);
}

/**
 * Find the first time value in simulator output
 *
 * @example
 * parseSimulationTime('1000 ns')  // → { value: 1000, unit: 'ns' }
 */
export function parseSimulationTime(text: string): SimulationTime | undefined {
  const match = TIME_PATTERN.exec(text.toLowerCase());
  const value = match?.[1];
  const unit = match?.[2];
  if (value === undefined || unit === undefined || !isTimeUnit(unit)) {
    return undefined;
  }
  return { value: Number(value), unit };
}

export function formatTime(time: SimulationTime): string {
  return `${time.value} ${time.unit}`;
}

/**
 * Time in femtoseconds, for comparing values printed in different units
 */
export function toFemtoseconds(time: SimulationTime): number {
  return time.value * 10 ** UNIT_EXPONENT[time.unit];
}

/**
 * Validate a run length and render it the way `run` takes it
 * A bare number is taken as nanoseconds.
 */
export function normalizeDuration(duration: string): string {
  const trimmed = duration.trim().toLowerCase();
  const match = /^(\d+(?:\.\d+)?)\s*(fs|ps|ns|us|ms|s)?$/.exec(trimmed);
  const value = match?.[1];
  if (value === undefined || Number(value) <= 0) {
    throw new InvalidArgumentError(`Invalid run duration '${duration}': expected e.g. "100ns", "1.5 us" or "forever"`);
  }
  return `${value}${match?.[2] ?? 'ns'}`;
}
