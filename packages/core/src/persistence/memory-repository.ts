import type { Task } from '../types/task.js';
import type { TaskRepository } from './repository.js';

/** Keeps tasks for the lifetime of the process only */
export class MemoryTaskRepository implements TaskRepository {
  private tasks: readonly Task[] = [];
  private remindersEnabled: boolean | null = null;

  load(): Task[] {
    return [...this.tasks];
  }

  save(tasks: readonly Task[]): void {
    this.tasks = [...tasks];
  }

  loadRemindersEnabled(): boolean | null {
    return this.remindersEnabled;
  }

  saveRemindersEnabled(enabled: boolean): void {
    this.remindersEnabled = enabled;
  }
}
