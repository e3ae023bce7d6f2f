import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description'),
  /** Local ISO-8601 date-time without offset */
  dueDate: text('due_date').notNull(),
  /** Unpadded H:M */
  reminderTime: text('reminder_time'),
  reminderEnabled: integer('reminder_enabled', { mode: 'boolean' }).notNull().default(false),
  /** Insertion order; list() returns ORDER BY position */
  position: integer('position').notNull(),
}, (table) => [
  index('idx_tasks_due_date').on(table.dueDate),
  index('idx_tasks_position').on(table.position),
]);
