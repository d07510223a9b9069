import { ValidationError } from './errors.js';

export const MICROS_PER_HOUR = 60 * 60 * 1_000_000;

export interface TimeWindow {
  startMicros: number;
  endMicros: number;
  /** Which input decided the window. */
  source: 'explicit' | 'hours' | 'default';
}

export interface TimeWindowInput {
  hours?: number;
  startMicros?: number;
  endMicros?: number;
}

export function nowMicros(): number {
  return Date.now() * 1000;
}

function checkMicros(value: number | undefined, name: string): void {
  if (value === undefined) return;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer (microseconds since epoch), got ${value}`);
  }
}

/**
 * Resolves the query window. An explicit start or end takes precedence over
 * `hours`; a missing explicit bound falls back to the `defaultHours` window
 * edge. Explicit bounds are not mixed with `hours`.
 */
export function resolveTimeWindow(input: TimeWindowInput, defaultHours: number, now = nowMicros()): TimeWindow {
  const { hours, startMicros, endMicros } = input;
  checkMicros(startMicros, 'start_micros');
  checkMicros(endMicros, 'end_micros');
  if (hours !== undefined && (!Number.isFinite(hours) || hours <= 0)) {
    throw new ValidationError(`hours must be positive, got ${hours}`);
  }

  if (startMicros !== undefined || endMicros !== undefined) {
    const start = startMicros ?? now - defaultHours * MICROS_PER_HOUR;
    const end = endMicros ?? now;
    if (start >= end) {
      throw new ValidationError(`start_micros (${start}) must be earlier than end_micros (${end})`);
    }
    return { startMicros: start, endMicros: end, source: 'explicit' };
  }

  if (hours !== undefined) {
    return { startMicros: now - Math.round(hours * MICROS_PER_HOUR), endMicros: now, source: 'hours' };
  }

  return { startMicros: now - defaultHours * MICROS_PER_HOUR, endMicros: now, source: 'default' };
}
