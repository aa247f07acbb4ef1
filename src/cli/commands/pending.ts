import { Command } from 'commander';
import { runPending } from '../../workflows/pending.js';
import { runTask } from '../utils/runtime.js';

export function createPendingCommand(): Command {
  return new Command('pending')
    .description('Diff the production snapshot against the models folder and write the script to a file')
    .addHelpText('after', `
Reads PRODUCTION_SNAPSHOT (default migrations/production.dump.sql)
and writes PENDING_OUTPUT (default migrations/pending.sql).

Examples:
  $ pg-reconcile pending
  $ PENDING_OUTPUT=out/next.sql pg-reconcile pending
`)
    .action(async (_options: Record<string, never>, command: Command) => {
      await runTask('pending', command, async (ctx) => {
        await runPending(ctx);
      });
    });
}
