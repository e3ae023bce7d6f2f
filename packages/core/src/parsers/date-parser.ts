/**
 * Calendar date helpers and a parser for human-friendly due dates.
 * Supports: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday), month+day (jan15) and ISO format.
 * All dates are local; time of day is zeroed.
 */

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Years that format as four digits and parse back */
export const MIN_YEAR = 0;
export const MAX_YEAR = 9999;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** A real date whose year is within MIN_YEAR..MAX_YEAR */
export function isValidDate(d: Date): boolean {
  if (isNaN(d.getTime())) return false;
  const year = d.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): string {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Format a Date as a local ISO-8601 date-time without offset (yyyy-MM-ddTHH:mm:ss.SSS) */
export function formatDateTime(d: Date): string {
  return `${formatDate(d)}T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

/** Midnight of the same local day (returns new Date) */
export function startOfDay(d: Date): Date {
  const r = new Date(d);
  r.setHours(0, 0, 0, 0);
  return r;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/** Add months to a date (returns new Date) */
function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** Civil-date equality: same year, month and day, whatever the time of day */
export function isSameDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear()
    && a.getMonth() === b.getMonth()
    && a.getDate() === b.getDate();
}

/** Build a local date, or null when the parts do not name a real day (e.g. feb30) */
export function makeDate(year: number, month: number, day: number): Date | null {
  // setFullYear, unlike the constructor, does not map years 0-99 to 1900-1999
  const d = new Date(2000, 0, 1);
  d.setFullYear(year, month - 1, day);
  if (!isValidDate(d) || d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return d;
}

function tryParseRelative(input: string, today: Date): Date | null {
  const m = RELATIVE_RE.exec(input);
  if (!m?.[1]) return null;

  const count = parseInt(m[1], 10);
  switch (m[2]) {
    case 'd': return addDays(today, count);
    case 'w': return addDays(today, count * 7);
    case 'm': return addMonths(today, count);
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): Date | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return addDays(today, daysUntil);
}

function tryParseMonthDay(input: string, today: Date): Date | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m?.[1] || !m[2]) return null;

  const month = MONTH_MAP[m[1]];
  if (month === undefined) return null;
  const candidate = makeDate(today.getFullYear(), month + 1, parseInt(m[2], 10));
  if (!candidate) return null;

  // If the date is in the past, use next year
  if (candidate.getTime() < today.getTime()) {
    candidate.setFullYear(candidate.getFullYear() + 1);
  }
  return candidate;
}

function tryParseStandard(input: string): Date | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m?.[1] || !m[2] || !m[3]) return null;
  return makeDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

/**
 * Parse a human-friendly date string into a local Date at midnight.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "today", "+3d", "friday", "jan15", "2026-03-01")
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): Date | null {
  if (!input?.trim()) return null;

  const today = startOfDay(now ?? new Date());
  const normalized = input.trim().toLowerCase();

  let result: Date | null;
  switch (normalized) {
    case 'today': result = today; break;
    case 'tomorrow': result = addDays(today, 1); break;
    case 'yesterday': result = addDays(today, -1); break;
    default:
      result = tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? tryParseStandard(input.trim());
  }
  return result && isValidDate(result) ? result : null;
}

/**
 * Parse an ISO-8601 date or date-time. Strings without an offset are local
 * time; strings with `Z` or `+hh:mm` name an absolute instant.
 */
export function parseDateTime(input: string): Date | null {
  const m = DATE_TIME_RE.exec(input.trim());
  if (!m?.[1] || !m[2] || !m[3]) return null;

  if (m[8]) {
    const d = new Date(input.trim());
    return isValidDate(d) ? d : null;
  }

  const date = makeDate(Number(m[1]), Number(m[2]), Number(m[3]));
  if (!date) return null;

  const hours = Number(m[4] ?? 0);
  const minutes = Number(m[5] ?? 0);
  const seconds = Number(m[6] ?? 0);
  const millis = Number((m[7] ?? '0').padEnd(3, '0'));
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  date.setHours(hours, minutes, seconds, millis);
  return date;
}
