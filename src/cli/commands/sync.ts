import { Command } from 'commander';
import { runSync } from '../../workflows/sync.js';
import { runTask } from '../utils/runtime.js';

export function createSyncCommand(): Command {
  return new Command('sync')
    .description('Diff the live database against the models folder and apply the changes')
    .argument('[mode]', "pass 'noprompt' to apply without asking")
    .option('-y, --yes', "Apply without asking (same as 'noprompt')")
    .addHelpText('after', `
Examples:
  $ pg-reconcile sync
  $ pg-reconcile sync noprompt
  $ DB_HOST=db pg-reconcile sync --yes
`)
    .action(async (mode: string | undefined, options: { yes?: boolean }, command: Command) => {
      await runTask('sync', command, async (ctx) => {
        await runSync(ctx, { noPrompt: mode === 'noprompt' || options.yes === true });
      });
    });
}
