/**
 * Reminder times. The persisted form is unpadded `H:M` ("9:5" for 09:05);
 * input also accepts the padded `HH:MM`.
 */

import type { TimeOfDay } from '../types/task.js';

const TIME_RE = /^(\d{1,2}):(\d{1,2})$/;

/** Build a TimeOfDay, or null when out of range */
export function makeTime(hour: number, minute: number): TimeOfDay | null {
  if (!Number.isInteger(hour) || !Number.isInteger(minute)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null;
  return { hour, minute };
}

/** Parse `H:M` or `HH:MM`. Returns null if the input can't be parsed. */
export function parseReminderTime(input: string | null | undefined): TimeOfDay | null {
  if (!input) return null;
  const m = TIME_RE.exec(input.trim());
  if (!m?.[1] || !m[2]) return null;
  return makeTime(parseInt(m[1], 10), parseInt(m[2], 10));
}

/** Persisted form: unpadded `H:M` */
export function formatReminderTime(time: TimeOfDay): string {
  return `${time.hour}:${time.minute}`;
}

/** Display form: `HH:MM` */
export function formatClock(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}
