/**
 * Error taxonomy for the planner core. Every error here is recoverable: the
 * caller reports it and carries on.
 */

import type { TaskId } from './types/task.js';

export class PlannerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected input: empty title, duplicate id, malformed date, time or record */
export class ValidationError extends PlannerError {}

/** Update of a task id the store does not hold */
export class NotFoundError extends PlannerError {
  readonly taskId: TaskId;

  constructor(taskId: TaskId) {
    super(`Could not find task with id ${taskId}`);
    this.taskId = taskId;
  }
}

/** A persistence collaborator failed to read or write */
export class StorageError extends PlannerError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
