/** A week row: day numbers, with null for cells outside the month */
export type Week = ReadonlyArray<number | null>;

export const WEEKDAY_LABELS = ['Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa', 'Su'] as const;

/** @param month - 1-12 */
export function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

/**
 * Lay a month out in Monday-first weeks. Leading cells before the 1st and
 * trailing cells after the last day are null.
 *
 * @param month - 1-12
 */
export function buildMonthGrid(year: number, month: number): Week[] {
  const leading = (new Date(year, month - 1, 1).getDay() + 6) % 7;
  const cells: Array<number | null> = Array.from({ length: leading }, () => null);
  const total = daysInMonth(year, month);
  for (let day = 1; day <= total; day++) cells.push(day);
  while (cells.length % 7 !== 0) cells.push(null);

  const weeks: Week[] = [];
  for (let i = 0; i < cells.length; i += 7) {
    weeks.push(cells.slice(i, i + 7));
  }
  return weeks;
}

/** Step a (year, month) pair by `delta` months */
export function shiftMonth(year: number, month: number, delta: number): { year: number; month: number } {
  const d = new Date(year, month - 1 + delta, 1);
  return { year: d.getFullYear(), month: d.getMonth() + 1 };
}
