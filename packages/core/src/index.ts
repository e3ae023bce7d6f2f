// Types
export type { TaskId, TimeOfDay, Reminder, Task, TaskDraft } from './types/index.js';
export { NO_REMINDER, reminderAt, reminderFrom, reminderEnabled, reminderTime } from './types/index.js';

// Errors and logging
export { PlannerError, ValidationError, NotFoundError, StorageError, errorMessage } from './errors.js';
export { createLogger, DEBUG_ENV } from './logger.js';
export type { Logger } from './logger.js';

// Database
export {
  createDb, createTestDb, closeDb, getRawDb, getDefaultDbPath, resolveDbPath,
  CREATE_SCHEMA_SQL, DB_PATH_ENV,
} from './db.js';
export type { PlannerDb } from './db.js';
export * from './schema/index.js';

// Parsers
export * from './parsers/index.js';

// Store
export { TaskStore } from './store/task-store.js';
export type { TaskStoreOptions, TaskSource } from './store/task-store.js';
export { createTask, withChanges, generateId, generateUniqueId } from './store/task-helpers.js';

// Queries
export * from './queries/index.js';
export * from './calendar/index.js';

// Reminders
export * from './reminders/index.js';

// Serialization and persistence
export * from './serialization/index.js';
export * from './persistence/index.js';
