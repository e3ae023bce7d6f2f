/**
 * Date-based reads over a TaskStore. Linear scans in store order; nothing is
 * cached, so results always reflect the latest mutation.
 */

import type { Task } from '../types/task.js';
import type { TaskSource } from '../store/task-store.js';
import { isSameDay } from '../parsers/date-parser.js';

/** Tasks whose due date falls on the same calendar day as `date` */
export function tasksOn(store: TaskSource, date: Date): Task[] {
  return store.list().filter(t => isSameDay(t.dueDate, date));
}

/** Tasks due on the day of `now` */
export function tasksToday(store: TaskSource, now: Date): Task[] {
  return tasksOn(store, now);
}

/** Whether any task is due on `date` (calendar-cell highlighting) */
export function hasTaskOn(store: TaskSource, date: Date): boolean {
  return store.list().some(t => isSameDay(t.dueDate, date));
}

/**
 * Day numbers of a month that have at least one task.
 * @param month - 1-12
 */
export function taskDaysInMonth(store: TaskSource, year: number, month: number): Set<number> {
  const days = new Set<number>();
  for (const task of store.list()) {
    const due = task.dueDate;
    if (due.getFullYear() === year && due.getMonth() === month - 1) {
      days.add(due.getDate());
    }
  }
  return days;
}
