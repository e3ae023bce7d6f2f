/**
 * The owning collection of tasks and the global reminders flag.
 *
 * Construct one per application and pass it to callers; there is no shared
 * instance. Every mutation is synchronous. When a repository is attached, the
 * new state is saved before it replaces the in-memory state, so a failed save
 * leaves the store as it was.
 */

import type { Task, TaskId } from '../types/task.js';
import type { TaskRepository } from '../persistence/repository.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import { isValidDate, MIN_YEAR, MAX_YEAR } from '../parsers/date-parser.js';
import { isBlankTitle } from './task-helpers.js';

const log = createLogger('store');

/** A frozen copy with its own Date, so callers cannot reach store state */
function detach(task: Task): Task {
  return Object.freeze({ ...task, dueDate: new Date(task.dueDate.getTime()) });
}

/** Read side of a store: what queries and the reminder scheduler need */
export interface TaskSource {
  list(): readonly Task[];
  getRemindersEnabled(): boolean;
}

export interface TaskStoreOptions {
  tasks?: readonly Task[];
  /** Defaults to true */
  remindersEnabled?: boolean;
  repository?: TaskRepository;
}

export class TaskStore implements TaskSource {
  private tasks: readonly Task[] = [];
  private remindersEnabled: boolean;
  private readonly repository: TaskRepository | null;

  constructor(opts: TaskStoreOptions = {}) {
    this.remindersEnabled = opts.remindersEnabled ?? true;
    this.repository = opts.repository ?? null;

    const initial: Task[] = [];
    for (const task of opts.tasks ?? []) {
      TaskStore.validateNew(initial, task);
      initial.push(detach(task));
    }
    this.tasks = Object.freeze(initial);
  }

  /** Create a store from the repository's saved state */
  static open(repository: TaskRepository): TaskStore {
    const tasks = repository.load();
    const remindersEnabled = repository.loadRemindersEnabled() ?? true;
    log.debug(`loaded ${tasks.length} task(s)`);
    return new TaskStore({ tasks, remindersEnabled, repository });
  }

  private static validate(task: Task): void {
    if (isBlankTitle(task.title)) {
      throw new ValidationError('Title is required');
    }
    if (!isValidDate(task.dueDate)) {
      throw new ValidationError(`Due date must be a real date between years ${MIN_YEAR} and ${MAX_YEAR}`);
    }
  }

  private static validateNew(existing: readonly Task[], task: Task): void {
    TaskStore.validate(task);
    if (existing.some(t => t.id === task.id)) {
      throw new ValidationError(`A task with id ${task.id} already exists`);
    }
  }

  /** Append a task */
  add(task: Task): void {
    TaskStore.validateNew(this.tasks, task);
    this.commit([...this.tasks, detach(task)]);
  }

  /** Replace the task that has the same id */
  update(task: Task): void {
    const index = this.tasks.findIndex(t => t.id === task.id);
    if (index === -1) throw new NotFoundError(task.id);
    TaskStore.validate(task);

    const next = [...this.tasks];
    next[index] = detach(task);
    this.commit(next);
  }

  /** Remove a task. Returns false (and changes nothing) if the id is unknown. */
  delete(id: TaskId): boolean {
    if (!this.tasks.some(t => t.id === id)) return false;
    this.commit(this.tasks.filter(t => t.id !== id));
    return true;
  }

  get(id: TaskId): Task | null {
    const task = this.tasks.find(t => t.id === id);
    return task ? detach(task) : null;
  }

  /** All tasks in insertion order, as a frozen snapshot of copies */
  list(): readonly Task[] {
    return Object.freeze(this.tasks.map(detach));
  }

  getRemindersEnabled(): boolean {
    return this.remindersEnabled;
  }

  setRemindersEnabled(enabled: boolean): void {
    if (enabled === this.remindersEnabled) return;
    this.repository?.saveRemindersEnabled(enabled);
    this.remindersEnabled = enabled;
  }

  private commit(next: Task[]): void {
    const frozen = Object.freeze(next);
    this.repository?.save(frozen);
    this.tasks = frozen;
  }
}
