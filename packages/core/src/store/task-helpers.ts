import type { Task, TaskDraft, TaskId } from '../types/task.js';
import { reminderFrom } from '../types/reminder.js';
import { startOfDay } from '../parsers/date-parser.js';
import { ValidationError } from '../errors.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 6;

/** Generate a random 6-character task ID */
export function generateId(): TaskId {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
  }
  return id;
}

/** Generate an ID not already in `taken` */
export function generateUniqueId(taken: ReadonlySet<TaskId>): TaskId {
  let id = generateId();
  while (taken.has(id)) id = generateId();
  return id;
}

export function isBlankTitle(title: string): boolean {
  return title.trim().length === 0;
}

/**
 * Create a new Task from a draft. The due date defaults to today and an
 * empty description becomes null.
 */
export function createTask(draft: TaskDraft, now?: Date, id?: TaskId): Task {
  const title = draft.title.trim();
  if (isBlankTitle(title)) throw new ValidationError('Title is required');

  const description = draft.description?.trim() ?? '';

  return {
    id: id ?? generateId(),
    title,
    description: description === '' ? null : description,
    dueDate: draft.dueDate ?? startOfDay(now ?? new Date()),
    reminder: reminderFrom(draft.reminderTime),
  };
}

/** Return a copy of the task with the draft's fields applied */
export function withChanges(task: Task, changes: Partial<TaskDraft>): Task {
  const title = changes.title !== undefined ? changes.title.trim() : task.title;
  let description = task.description;
  if (changes.description !== undefined) {
    const trimmed = changes.description?.trim() ?? '';
    description = trimmed === '' ? null : trimmed;
  }

  return {
    ...task,
    title,
    description,
    dueDate: changes.dueDate ?? task.dueDate,
    reminder: changes.reminderTime !== undefined ? reminderFrom(changes.reminderTime) : task.reminder,
  };
}
