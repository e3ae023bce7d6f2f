/** Simple type aliases for documentation */
export type TaskId = string;

/** A wall-clock time of day, hour 0-23 and minute 0-59 */
export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

/**
 * Whether a task reminds, and when. A reminder without a time cannot be
 * expressed.
 */
export type Reminder =
  | { readonly kind: 'none' }
  | { readonly kind: 'at'; readonly time: TimeOfDay };

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  /** Local calendar date; only year, month and day take part in matching */
  readonly dueDate: Date;
  readonly reminder: Reminder;
}

/** Fields a caller provides when creating a task */
export interface TaskDraft {
  readonly title: string;
  readonly description?: string | null;
  readonly dueDate?: Date;
  readonly reminderTime?: TimeOfDay | null;
}
