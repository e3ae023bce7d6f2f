/**
 * The persisted/API form of a Task:
 *
 *   { id, title, description: string|null, dueDate: ISO-8601 date-time,
 *     reminderTime: "H:M"|null, reminderEnabled: boolean }
 */

import { z } from 'zod';
import type { Task } from '../types/task.js';
import { NO_REMINDER, reminderAt, reminderEnabled, reminderTime } from '../types/reminder.js';
import { formatDateTime, parseDateTime } from '../parsers/date-parser.js';
import { formatReminderTime, parseReminderTime } from '../parsers/time-parser.js';
import { ValidationError } from '../errors.js';

export interface PersistedTask {
  id: string;
  title: string;
  description: string | null;
  dueDate: string;
  reminderTime: string | null;
  reminderEnabled: boolean;
}

export const persistedTaskSchema = z.object({
  id: z.string().min(1, 'id is required'),
  title: z.string().refine(s => s.trim().length > 0, 'Title is required'),
  description: z.string().nullish().transform(v => v ?? null),
  dueDate: z.string().transform((value, ctx) => {
    const date = parseDateTime(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid due date: ${value}` });
      return z.NEVER;
    }
    return date;
  }),
  reminderTime: z.string().nullish().transform((value, ctx) => {
    if (value == null) return null;
    const time = parseReminderTime(value);
    if (!time) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid reminder time: ${value}` });
      return z.NEVER;
    }
    return time;
  }),
  reminderEnabled: z.boolean().nullish().transform(v => v ?? false),
});

export function toPersisted(task: Task): PersistedTask {
  const time = reminderTime(task);
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    dueDate: formatDateTime(task.dueDate),
    reminderTime: time ? formatReminderTime(time) : null,
    reminderEnabled: reminderEnabled(task),
  };
}

/**
 * Validate and rebuild a Task. A time without the flag, or the flag without a
 * time, both read as "no reminder".
 */
export function fromPersisted(value: unknown): Task {
  const result = persistedTaskSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(`Invalid task record: ${issues}`);
  }

  const data = result.data;
  return {
    id: data.id,
    title: data.title,
    description: data.description,
    dueDate: data.dueDate,
    reminder: data.reminderEnabled && data.reminderTime ? reminderAt(data.reminderTime) : NO_REMINDER,
  };
}

export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toPersisted), null, 2);
}

/** Parse a JSON array of persisted tasks */
export function parseTasks(json: string): Task[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ValidationError('Task file is not valid JSON', { cause: err });
  }
  if (!Array.isArray(raw)) throw new ValidationError('Task file must contain a JSON array');
  return raw.map(item => fromPersisted(item));
}
