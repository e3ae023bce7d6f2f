import { readFileSync, writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { ValidationError, parseTasks, serializeTasks } from '@study-planner/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

interface ExportOptions {
  output?: string;
}

export function createExportCommand(ctx: CliContext): Command {
  return new Command('export')
    .description('Write all tasks as JSON')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .action((opts: ExportOptions) => $try(() => {
      const tasks = ctx.store().list();
      const json = serializeTasks(tasks);
      if (opts.output) {
        writeFileSync(opts.output, json + '\n');
        out.success(`Exported ${tasks.length} task(s) to ${opts.output}`);
      } else {
        out.info(json);
      }
    }));
}

export function createImportCommand(ctx: CliContext): Command {
  return new Command('import')
    .description('Add tasks from a JSON file written by export')
    .argument('<file>', 'Path to the JSON file')
    .action((file: string) => $try(() => {
      const store = ctx.store();
      const tasks = parseTasks(readFileSync(file, 'utf8'));

      let imported = 0;
      for (const task of tasks) {
        try {
          store.add(task);
          imported++;
        } catch (err: unknown) {
          if (!(err instanceof ValidationError)) throw err;
          out.warning(`Skipped ${task.id}: ${err.message}`);
        }
      }
      out.success(`Imported ${imported} of ${tasks.length} task(s)`);
    }));
}
