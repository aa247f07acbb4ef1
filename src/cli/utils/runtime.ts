import { input } from '@inquirer/prompts';
import type { Command } from 'commander';
import { loadConfigFromEnv } from '../../config.js';
import { ALWAYS_LOGGED_EVENTS, DebugLogger } from '../../debug.js';
import { createWorkflowContext } from '../../workflows/context.js';
import type { Prompt, WorkflowContext } from '../../workflows/types.js';
import { debug, initOutputContext, log } from './output.js';
import { createConsoleReporter } from './reporter.js';
import { trackEphemeralManager } from './signals.js';
import { handleError } from './errors.js';

/**
 * Options every task accepts
 */
export interface GlobalOptions {
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  models?: string;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
}

/**
 * Ask on the terminal; the answer is returned as typed
 */
export const terminalPrompt: Prompt = (question) => input({ message: question });

/**
 * Build the workflow context for a command from its options and the environment
 */
export function createCommandContext(options: GlobalOptions): WorkflowContext {
  const config = loadConfigFromEnv(process.env, process.cwd(), {
    host: options.host,
    port: options.port,
    user: options.user,
    password: options.password,
    database: options.database,
    modelsFolder: options.models,
  });

  const reporter = createConsoleReporter();
  const logger = new DebugLogger({
    enabled: options.verbose ?? false,
    logger: (message, context) => {
      if (context !== undefined && ALWAYS_LOGGED_EVENTS.has(context.type)) {
        reporter.warn(message);
      } else {
        debug(message);
      }
    },
  });

  const ctx = createWorkflowContext(config, {
    prompt: terminalPrompt,
    reporter,
    logger,
  });
  trackEphemeralManager(ctx.ephemeral);
  return ctx;
}

/**
 * Run a task: announce it, build its context and map failures to exit codes
 */
export async function runTask(
  name: string,
  command: Command,
  task: (ctx: WorkflowContext) => Promise<void>
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  initOutputContext({
    verbose: options.verbose,
    quiet: options.quiet,
    noColor: options.color === false ? true : undefined,
  });

  log(`task: ${name}`);

  try {
    await task(createCommandContext(options));
  } catch (err) {
    handleError(err);
  }
}
