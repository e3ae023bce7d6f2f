import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete tasks')
    .argument('<taskIds...>', 'One or more task IDs')
    .action((taskIds: string[]) => $try(() => {
      const store = ctx.store();
      for (const id of taskIds) {
        if (store.delete(id)) out.success(`Deleted task ${id}`);
        else out.info(`No task with id ${id}`);
      }
    }));
}
