import { ConfigError } from './errors.js';

/** Sentinel for a lease that never expires ("*" in the schedule file). */
export const INDEFINITE = Symbol('indefinite');

export type Indefinite = typeof INDEFINITE;

/** Lease lifetime in minutes, or INDEFINITE. */
export type LeaseInterval = number | Indefinite;

/** Minutes per unit suffix. */
const UNIT_MINUTES: Readonly<Record<string, number>> = {
  m: 1,
  h: 60,
  d: 1440,
  w: 10080,
  y: 525600,
};

const INTERVAL_PATTERN = /^(\d+)(.)$/;

/**
 * Parses `<positive-integer><unit>` (unit one of m/h/d/w/y) into minutes.
 *
 * Pure. Throws ConfigError and never logs.
 */
export function parseInterval(text: string, path = ''): number {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw new ConfigError('Interval must not be empty', path);
  }

  const match = INTERVAL_PATTERN.exec(trimmed);
  if (match === null) {
    throw new ConfigError(`Interval "${text}" has no leading integer`, path);
  }

  const amount = Number(match[1]);
  const unit = match[2] ?? '';
  const factor = UNIT_MINUTES[unit];
  if (factor === undefined) {
    throw new ConfigError(`Interval "${text}" has unknown unit "${unit}"`, path);
  }
  if (amount <= 0) {
    throw new ConfigError(`Interval "${text}" must be positive`, path);
  }

  return amount * factor;
}

/** Same as parseInterval, but also accepts "*" (never expires). */
export function parseLeaseInterval(text: string, path = ''): LeaseInterval {
  if (text.trim() === '*') return INDEFINITE;
  return parseInterval(text, path);
}

export function isIndefinite(interval: LeaseInterval): interval is Indefinite {
  return interval === INDEFINITE;
}
