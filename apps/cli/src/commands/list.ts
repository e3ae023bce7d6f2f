import { Command } from 'commander';
import { tasksOn, tasksToday } from '@study-planner/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseDueArg, $try } from '../helpers.js';

export function createTodayCommand(ctx: CliContext): Command {
  return new Command('today')
    .description('Show tasks due today')
    .action(() => $try(() => {
      const now = ctx.now();
      out.heading(`Today, ${out.formatLongDate(now)}`);
      out.printTasks(tasksToday(ctx.store(), now), now, 'No tasks due today');
    }));
}

export function createOnCommand(ctx: CliContext): Command {
  return new Command('on')
    .description('Show tasks due on a date')
    .argument('<date>', 'Date (tomorrow, friday, may1, yyyy-MM-dd, ...)')
    .action((dateStr: string) => $try(() => {
      const now = ctx.now();
      const date = parseDueArg(dateStr, now);
      out.heading(out.formatLongDate(date));
      out.printTasks(tasksOn(ctx.store(), date), now, 'No tasks due on this day');
    }));
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List all tasks in the order they were added')
    .action(() => $try(() => {
      out.printTasks(ctx.store().list(), ctx.now(), 'No tasks saved yet... use the add command to create one');
    }));
}
