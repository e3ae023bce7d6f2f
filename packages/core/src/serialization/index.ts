export {
  toPersisted, fromPersisted, serializeTasks, parseTasks, persistedTaskSchema,
} from './task-serializer.js';
export type { PersistedTask } from './task-serializer.js';
