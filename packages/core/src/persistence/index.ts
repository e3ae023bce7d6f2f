export type { TaskRepository } from './repository.js';
export { liveSource } from './repository.js';
export { MemoryTaskRepository } from './memory-repository.js';
export { SqliteTaskRepository } from './sqlite-repository.js';
