import { Command } from 'commander';
import { ValidationError } from '@study-planner/core';
import type { CliContext } from './context.js';
import { $try } from './helpers.js';

import { createAddCommand } from './commands/add.js';
import { createEditCommand } from './commands/edit.js';
import { createDeleteCommand } from './commands/delete.js';
import { createTodayCommand, createOnCommand, createListCommand } from './commands/list.js';
import { createCalendarCommand } from './commands/calendar.js';
import { createRemindersCommand, createRemindCommand, createWatchCommand } from './commands/reminders.js';
import { createExportCommand, createImportCommand } from './commands/transfer.js';

/** Build the CLI program */
export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('planner')
    .description('Study planner: tasks, due dates and reminders')
    .version('1.0.0')
    .option('--db <path>', 'Database file (default: $STUDY_PLANNER_DB or the platform data directory)');

  // Register commands
  program.addCommand(createTodayCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createOnCommand(ctx));
  program.addCommand(createCalendarCommand(ctx));
  program.addCommand(createAddCommand(ctx));
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createRemindersCommand(ctx));
  program.addCommand(createRemindCommand(ctx));
  program.addCommand(createWatchCommand(ctx));
  program.addCommand(createExportCommand(ctx));
  program.addCommand(createImportCommand(ctx));

  // Default action (no command): show today's tasks
  program.action((_opts: unknown, cmd: Command) => $try(async () => {
    const [name] = cmd.args;
    if (name !== undefined) {
      throw new ValidationError(`Unknown command: ${name} (see --help)`);
    }
    await cmd.commands.find(c => c.name() === 'today')?.parseAsync([], { from: 'user' });
  }));

  return program;
}
