import { Command, InvalidArgumentError } from 'commander';
import { createSyncCommand, createPendingCommand } from './commands/index.js';
import { initOutputContext, log } from './utils/output.js';
import type { GlobalOptions } from './utils/runtime.js';

/**
 * Exit code for a missing or unknown task
 */
export const USAGE_EXIT_CODE = 2;

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * Build the command-line program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('pg-reconcile')
    .description('Reconcile a PostgreSQL database with a schema kept as .sql files')
    .version('0.1.0')
    .argument('[task]', 'sync or pending')
    .option('--host <host>', 'Database host (DB_HOST)')
    .option('--port <port>', 'Database port (DB_PORT)', parsePort)
    .option('--user <user>', 'Database user (DB_USER)')
    .option('--password <password>', 'Database password (DB_PASS)')
    .option('--database <name>', 'Live database, also used to create scratch databases (DB_NAME)')
    .option('--models <folder>', 'Folder holding the schema .sql files (MODELS_FOLDER)')
    .option('-v, --verbose', 'Show verbose output')
    .option('-q, --quiet', 'Only show errors')
    .option('--no-color', 'Disable colored output');

  program.addHelpText('after', `
Examples:
  $ pg-reconcile sync
  $ pg-reconcile sync noprompt
  $ pg-reconcile pending
  $ pg-reconcile sync --host db --port 5433 -v
`);

  program.addCommand(createSyncCommand());
  program.addCommand(createPendingCommand());

  // Reached when the first argument is not a known task
  program.action((task: string | undefined, options: GlobalOptions) => {
    initOutputContext({
      verbose: options.verbose,
      quiet: options.quiet,
      noColor: options.color === false ? true : undefined,
    });

    if (task === undefined) {
      log('No task given');
    } else {
      log(`task: ${task}`);
      log('No such task');
    }
    process.exitCode = USAGE_EXIT_CODE;
  });

  return program;
}
