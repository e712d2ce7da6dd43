/**
 * Duration Parser
 *
 * Lock timings are short, so a bare number means milliseconds.
 */

import { ValidationError } from '../errors/index.js';

export type DurationUnit = 'ms' | 's' | 'm' | 'h';

export type DurationMsParseOptions = {
  defaultUnit?: DurationUnit;
};

const MULTIPLIERS: Record<DurationUnit, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration string to milliseconds.
 * Accepts: "10ms", "2.5s", "1m", "1h", "250"
 */
export function parseDurationMs(raw: string, opts?: DurationMsParseOptions): number {
  const trimmed = String(raw ?? '')
    .trim()
    .toLowerCase();
  if (!trimmed) {
    throw new ValidationError('invalid duration (empty)');
  }

  const m = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(trimmed);
  if (!m) {
    throw new ValidationError(`invalid duration: ${raw}`);
  }

  const value = Number(m[1]);
  const unit = parseUnit(m[2]) ?? opts?.defaultUnit ?? 'ms';
  const ms = Math.round(value * MULTIPLIERS[unit]);
  if (!Number.isFinite(ms)) {
    throw new ValidationError(`invalid duration: ${raw}`);
  }
  return ms;
}

function parseUnit(raw: string | undefined): DurationUnit | undefined {
  switch (raw) {
    case 'ms':
    case 's':
    case 'm':
    case 'h':
      return raw;
    default:
      return undefined;
  }
}

/**
 * Format milliseconds to a compact human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 0) {
    throw new ValidationError('Cannot format negative duration');
  }

  const units: { unit: DurationUnit; divisor: number }[] = [
    { unit: 'h', divisor: 3_600_000 },
    { unit: 'm', divisor: 60_000 },
    { unit: 's', divisor: 1000 },
  ];

  for (const { unit, divisor } of units) {
    if (ms >= divisor && ms % divisor === 0) {
      return `${ms / divisor}${unit}`;
    }
  }

  return `${Math.round(ms * 1000) / 1000}ms`;
}

/**
 * Validate if a string is a valid duration format.
 */
export function isValidDuration(duration: string): boolean {
  try {
    parseDurationMs(duration);
    return true;
  } catch {
    return false;
  }
}
