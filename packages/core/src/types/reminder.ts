import type { Reminder, Task, TimeOfDay } from './task.js';

export const NO_REMINDER: Reminder = { kind: 'none' };

export function reminderAt(time: TimeOfDay): Reminder {
  return { kind: 'at', time };
}

/** Build a reminder from an optional time; `null` means no reminder */
export function reminderFrom(time: TimeOfDay | null | undefined): Reminder {
  return time ? reminderAt(time) : NO_REMINDER;
}

export function reminderEnabled(task: Task): boolean {
  return task.reminder.kind === 'at';
}

export function reminderTime(task: Task): TimeOfDay | null {
  return task.reminder.kind === 'at' ? task.reminder.time : null;
}
