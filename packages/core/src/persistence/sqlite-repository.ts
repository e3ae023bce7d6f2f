/**
 * TaskRepository over SQLite via Drizzle. `save` rewrites the tasks table in
 * one transaction, keeping list order in the `position` column.
 */

import { asc, eq } from 'drizzle-orm';
import type { PlannerDb } from '../db.js';
import type { Task } from '../types/task.js';
import type { TaskRepository } from './repository.js';
import { tasks, config } from '../schema/index.js';
import { fromPersisted, toPersisted } from '../serialization/task-serializer.js';
import { StorageError, errorMessage } from '../errors.js';

const REMINDERS_ENABLED_KEY = 'reminders_enabled';

/** Run a storage operation, translating any failure into StorageError */
function guard<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    throw new StorageError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
  }
}

export class SqliteTaskRepository implements TaskRepository {
  private readonly db: PlannerDb;

  constructor(db: PlannerDb) {
    this.db = db;
  }

  load(): Task[] {
    return guard('load tasks', () => {
      const rows = this.db.select().from(tasks).orderBy(asc(tasks.position)).all();
      return rows.map(row => fromPersisted({
        id: row.id,
        title: row.title,
        description: row.description,
        dueDate: row.dueDate,
        reminderTime: row.reminderTime,
        reminderEnabled: row.reminderEnabled,
      }));
    });
  }

  save(taskList: readonly Task[]): void {
    guard('save tasks', () => {
      const rows = taskList.map((task, position) => ({ ...toPersisted(task), position }));
      this.db.transaction((tx) => {
        tx.delete(tasks).run();
        if (rows.length > 0) tx.insert(tasks).values(rows).run();
      });
    });
  }

  loadRemindersEnabled(): boolean | null {
    return guard('load settings', () => {
      const value = this.getConfig(REMINDERS_ENABLED_KEY);
      if (value === null) return null;
      return value === 'true';
    });
  }

  saveRemindersEnabled(enabled: boolean): void {
    guard('save settings', () => this.setConfig(REMINDERS_ENABLED_KEY, String(enabled)));
  }

  private getConfig(key: string): string | null {
    const row = this.db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
    return row?.value ?? null;
  }

  private setConfig(key: string, value: string): void {
    this.db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
  }
}
