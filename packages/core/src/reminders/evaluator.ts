import type { Task } from '../types/task.js';
import type { TaskSource } from '../store/task-store.js';

/** How long after its scheduled instant a reminder still counts as due */
export const REMINDER_WINDOW_MS = 5 * 60_000;

/** The due date at the reminder's time of day, or null when the task has no reminder */
export function reminderInstant(task: Task): Date | null {
  if (task.reminder.kind !== 'at') return null;
  const { hour, minute } = task.reminder.time;
  const instant = new Date(task.dueDate);
  instant.setHours(hour, minute, 0, 0);
  return instant;
}

/** Whether `now` falls in the half-open window [instant, instant + 5 min) */
export function isReminderDue(task: Task, now: Date): boolean {
  const instant = reminderInstant(task);
  if (!instant) return false;
  const start = instant.getTime();
  const t = now.getTime();
  return start <= t && t < start + REMINDER_WINDOW_MS;
}

/**
 * Tasks whose reminder is due at `now`, in store order.
 *
 * Stateless: calling twice inside the window returns the same tasks again,
 * and a task is missed if no call lands inside its window. The global
 * reminders flag is not consulted here; see ReminderScheduler.
 */
export function dueReminders(store: TaskSource, now: Date): Task[] {
  return store.list().filter(t => isReminderDue(t, now));
}
