import { Command } from 'commander';
import { ReminderScheduler, ValidationError, dueReminders, DEFAULT_POLL_INTERVAL_MS } from '@study-planner/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseToggle, parseSeconds, $try } from '../helpers.js';

const DISABLED_MESSAGE = 'Reminders are turned off. Use "reminders on" to enable them';

export function createRemindersCommand(ctx: CliContext): Command {
  return new Command('reminders')
    .description('Show or set whether reminders are enabled')
    .argument('[state]', 'on or off')
    .action((state: string | undefined) => $try(() => {
      const store = ctx.store();
      if (state === undefined) {
        out.info(`Reminders are ${store.getRemindersEnabled() ? 'on' : 'off'}`);
        return;
      }

      const enabled = parseToggle(state);
      if (enabled === null) throw new ValidationError(`Expected "on" or "off", got ${state}`);
      store.setRemindersEnabled(enabled);
      out.success(`Reminders turned ${enabled ? 'on' : 'off'}`);
    }));
}

export function createRemindCommand(ctx: CliContext): Command {
  return new Command('remind')
    .description('Print reminders that are due right now')
    .action(() => $try(() => {
      const store = ctx.store();
      if (!store.getRemindersEnabled()) {
        out.info(DISABLED_MESSAGE);
        return;
      }
      const due = dueReminders(store, ctx.now());
      if (due.length === 0) {
        out.info('No reminders due');
        return;
      }
      for (const task of due) out.reminder(task);
    }));
}

interface WatchOptions {
  interval: string;
}

export function createWatchCommand(ctx: CliContext): Command {
  return new Command('watch')
    .description('Keep running and print each reminder when it comes due')
    .option('-i, --interval <seconds>', 'Seconds between checks', String(DEFAULT_POLL_INTERVAL_MS / 1000))
    .action((opts: WatchOptions) => $try(async () => {
      const intervalMs = parseSeconds(opts.interval) * 1000;
      const source = ctx.source();
      if (!source.getRemindersEnabled()) out.warning(DISABLED_MESSAGE);

      const scheduler = new ReminderScheduler(source, {
        intervalMs,
        now: () => ctx.now(),
        onReminder: task => out.reminder(task),
      });

      out.info(`Watching for reminders every ${intervalMs / 1000}s. Press Ctrl+C to stop.`);
      scheduler.start();
      try {
        await ctx.untilStopped();
      } finally {
        scheduler.stop();
      }
    }));
}
