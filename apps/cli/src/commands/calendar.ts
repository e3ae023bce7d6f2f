import { Command } from 'commander';
import { buildMonthGrid, taskDaysInMonth, tasksOn } from '@study-planner/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseDueArg, parseMonthArg, $try } from '../helpers.js';

interface CalendarOptions {
  select?: string;
}

export function createCalendarCommand(ctx: CliContext): Command {
  return new Command('calendar')
    .description('Show a month with the days that have tasks highlighted')
    .argument('[month]', 'Month as yyyy-MM (default: the selected day\'s month)')
    .option('-s, --select <date>', 'Day to list tasks for (default: today)')
    .action((monthStr: string | undefined, opts: CalendarOptions) => $try(() => {
      const store = ctx.store();
      const now = ctx.now();
      const selected = opts.select ? parseDueArg(opts.select, now) : now;
      const { year, month } = monthStr
        ? parseMonthArg(monthStr)
        : { year: selected.getFullYear(), month: selected.getMonth() + 1 };

      const inMonth = selected.getFullYear() === year && selected.getMonth() + 1 === month;
      const lines = out.renderCalendar(
        year, month, buildMonthGrid(year, month),
        taskDaysInMonth(store, year, month),
        inMonth ? selected.getDate() : null,
      );
      for (const line of lines) out.info(line);

      if (inMonth) {
        out.info('');
        out.heading(`Tasks for ${out.formatLongDate(selected)}`);
        out.printTasks(tasksOn(store, selected), now, 'No tasks for this day');
      }
    }));
}
