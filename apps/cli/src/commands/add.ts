import { Command } from 'commander';
import { createTask, generateUniqueId, formatDate, startOfDay } from '@study-planner/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseDueArg, parseTimeArg, $try } from '../helpers.js';

interface AddOptions {
  description?: string;
  due?: string;
  remind?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Optional description')
    .option('--due <date>', 'Due date (today, tomorrow, friday, may1, +3d, yyyy-MM-dd)')
    .option('-r, --remind <time>', 'Reminder time on the due date (H:M)')
    .action((title: string, opts: AddOptions) => $try(() => {
      const store = ctx.store();
      const now = ctx.now();
      const dueDate = opts.due ? parseDueArg(opts.due, now) : startOfDay(now);
      const reminderTime = opts.remind ? parseTimeArg(opts.remind) : null;

      const id = generateUniqueId(new Set(store.list().map(t => t.id)));
      const task = createTask({ title, description: opts.description, dueDate, reminderTime }, now, id);
      store.add(task);

      out.success(`Task ${task.id} saved for ${formatDate(task.dueDate)}`);
      if (reminderTime && !store.getRemindersEnabled()) {
        out.warning('Reminders are turned off. Use "reminders on" to enable them');
      }
    }));
}
