import { Command } from 'commander';
import type { TaskDraft } from '@study-planner/core';
import { NotFoundError, withChanges } from '@study-planner/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseDueArg, parseTimeArg, $try } from '../helpers.js';

interface EditOptions {
  title?: string;
  description?: string;
  due?: string;
  /** false when --no-remind is given */
  remind?: string | false;
}

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description('Change a task')
    .argument('<taskId>', 'The task ID')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description ("" to clear)')
    .option('--due <date>', 'New due date')
    .option('-r, --remind <time>', 'New reminder time (H:M)')
    .option('--no-remind', 'Remove the reminder')
    .action((taskId: string, opts: EditOptions) => $try(() => {
      const store = ctx.store();
      const task = store.get(taskId);
      if (!task) throw new NotFoundError(taskId);

      const changes: { -readonly [K in keyof TaskDraft]?: TaskDraft[K] } = {};
      if (opts.title !== undefined) changes.title = opts.title;
      if (opts.description !== undefined) changes.description = opts.description;
      if (opts.due !== undefined) changes.dueDate = parseDueArg(opts.due, ctx.now());
      if (opts.remind === false) changes.reminderTime = null;
      else if (opts.remind !== undefined) changes.reminderTime = parseTimeArg(opts.remind);

      if (Object.keys(changes).length === 0) {
        out.info('Nothing to change');
        return;
      }

      store.update(withChanges(task, changes));
      out.success(`Task ${taskId} updated`);
    }));
}
