export { buildMonthGrid, daysInMonth, shiftMonth, WEEKDAY_LABELS } from './month-grid.js';
export type { Week } from './month-grid.js';
