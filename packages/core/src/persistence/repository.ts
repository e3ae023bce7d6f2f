import type { Task } from '../types/task.js';
import type { TaskSource } from '../store/task-store.js';

/**
 * Storage collaborator for a TaskStore. Implementations translate their own
 * failures into StorageError.
 */
export interface TaskRepository {
  load(): Task[];
  save(tasks: readonly Task[]): void;
  /** null when the flag has never been saved */
  loadRemindersEnabled(): boolean | null;
  saveRemindersEnabled(enabled: boolean): void;
}

/**
 * A read-only view that goes back to the repository on every call, so a
 * long-running reader sees writes made by other processes.
 */
export function liveSource(repository: TaskRepository): TaskSource {
  return {
    list: () => repository.load(),
    getRemindersEnabled: () => repository.loadRemindersEnabled() ?? true,
  };
}
