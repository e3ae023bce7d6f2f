/**
 * CLI helpers: argument parsing and error handling.
 */

import type { TimeOfDay } from '@study-planner/core';
import { ValidationError, errorMessage, parseDate, parseReminderTime } from '@study-planner/core';
import * as out from './output.js';

const MONTH_RE = /^(\d{4})-(\d{1,2})$/;

/** Parse a --due style argument; throws ValidationError when unreadable */
export function parseDueArg(input: string, now: Date): Date {
  const date = parseDate(input, now);
  if (!date) throw new ValidationError(`Could not parse date: ${input}`);
  return date;
}

/** Parse a reminder time (H:M or HH:MM) */
export function parseTimeArg(input: string): TimeOfDay {
  const time = parseReminderTime(input);
  if (!time) throw new ValidationError(`Could not parse time: ${input} (expected H:M, e.g. 9:00)`);
  return time;
}

/** Parse yyyy-MM into a year and a 1-12 month */
export function parseMonthArg(input: string): { year: number; month: number } {
  const m = MONTH_RE.exec(input.trim());
  const month = Number(m?.[2]);
  if (!m?.[1] || month < 1 || month > 12) {
    throw new ValidationError(`Could not parse month: ${input} (expected yyyy-MM)`);
  }
  return { year: Number(m[1]), month };
}

/**
 * Parse an on/off argument. Returns null for anything unrecognized.
 */
export function parseToggle(value: string): boolean | null {
  switch (value.toLowerCase()) {
    case 'on': case 'true': case 'enable': case 'enabled': case 'yes': return true;
    case 'off': case 'false': case 'disable': case 'disabled': case 'no': return false;
    default: return null;
  }
}

/** Parse a positive number of seconds */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ValidationError(`Interval must be a positive number of seconds, got ${value}`);
  }
  return seconds;
}

function fail(err: unknown): void {
  out.error(errorMessage(err));
  process.exitCode = 1;
}

/**
 * Wrap a command action with error handling. The action runs immediately;
 * errors (thrown or rejected) are printed and set a failing exit code.
 */
export function $try(fn: () => void | Promise<void>): Promise<void> | undefined {
  try {
    const result = fn();
    if (result instanceof Promise) return result.catch(fail);
  } catch (err: unknown) {
    fail(err);
  }
  return undefined;
}
