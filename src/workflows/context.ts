import type { ReconcileConfig } from '../types.js';
import type { Connector } from '../connection/connector.js';
import { createConnector } from '../connection/connector.js';
import { createEphemeralDatabaseManager } from '../ephemeral/ephemeral-database.js';
import { createSchemaLoader } from '../loader/schema-loader.js';
import type { DiffEngine } from '../diff/diff-engine.js';
import { createDiffEngine } from '../diff/diff-engine.js';
import { DebugLogger } from '../debug.js';
import type { Prompt, Reporter, WorkflowContext } from './types.js';

/**
 * Collaborators that can be swapped out when building a context
 */
export interface WorkflowContextOptions {
  prompt: Prompt;
  reporter: Reporter;
  logger?: DebugLogger;
  connector?: Connector;
  engine?: DiffEngine;
}

/**
 * Wire the components for one run from the configuration
 *
 * @example
 * ```typescript
 * const ctx = createWorkflowContext(loadConfigFromEnv(process.env), {
 *   prompt: (question) => input({ message: question }),
 *   reporter: { info: console.log, sql: console.log },
 * });
 * await runSync(ctx, { noPrompt: true });
 * ```
 */
export function createWorkflowContext(
  config: ReconcileConfig,
  options: WorkflowContextOptions
): WorkflowContext {
  const logger = options.logger ?? new DebugLogger();
  const connector =
    options.connector ?? createConnector({ retry: config.retry, logger });

  return {
    config,
    connector,
    ephemeral: createEphemeralDatabaseManager({
      connector,
      adminTarget: config.database,
      prefix: config.ephemeral.prefix,
      logger,
    }),
    loader: createSchemaLoader({ connector, logger }),
    engine: options.engine ?? createDiffEngine(),
    prompt: options.prompt,
    reporter: options.reporter,
    logger,
  };
}
