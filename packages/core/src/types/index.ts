export type { TaskId, TimeOfDay, Reminder, Task, TaskDraft } from './task.js';
export { NO_REMINDER, reminderAt, reminderFrom, reminderEnabled, reminderTime } from './reminder.js';
