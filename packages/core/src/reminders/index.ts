export { dueReminders, isReminderDue, reminderInstant, REMINDER_WINDOW_MS } from './evaluator.js';
export { ReminderScheduler, DEFAULT_POLL_INTERVAL_MS } from './reminder-scheduler.js';
export type { ReminderSchedulerOptions } from './reminder-scheduler.js';
