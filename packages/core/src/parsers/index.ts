export {
  parseDate, parseDateTime, formatDate, formatDateTime,
  startOfDay, addDays, isSameDay, makeDate, isValidDate, MIN_YEAR, MAX_YEAR,
} from './date-parser.js';
export { parseReminderTime, formatReminderTime, formatClock, makeTime } from './time-parser.js';
