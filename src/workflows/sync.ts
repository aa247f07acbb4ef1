/**
 * Sync Workflow
 *
 * Brings the live database in line with the application models: loads the
 * models into a scratch database, diffs live against it and applies the
 * difference to the live database.
 *
 * @module workflows/sync
 */

import { describeTarget } from '../connection/connection-target.js';
import { withSchemaSession } from '../session/schema-session.js';
import { Migration } from '../diff/migration.js';
import { WorkflowLifecycle } from './lifecycle.js';
import type { SyncOptions, SyncResult, WorkflowContext } from './types.js';

/**
 * Whether an answer to the confirmation prompt means yes
 */
export function isConfirmed(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

/**
 * Diff the live database against the application models and apply the
 * difference, asking first unless `noPrompt` is set.
 *
 * The live database is only touched by `apply()`, and only after the operator
 * confirmed (or `noPrompt` is set).
 *
 * @example
 * ```typescript
 * const result = await runSync(ctx, { noPrompt: false });
 * if (result.outcome === 'declined') {
 *   console.log('left untouched');
 * }
 * ```
 */
export async function runSync(ctx: WorkflowContext, options: SyncOptions = {}): Promise<SyncResult> {
  const { config, connector, reporter } = ctx;
  const lifecycle = new WorkflowLifecycle(reporter);

  return lifecycle.run(() =>
    ctx.ephemeral.withEphemeralDatabase((tempTarget) => {
      lifecycle.enter('EPHEMERAL_ACQUIRED');
      reporter.info(`db url: ${describeTarget(config.database)}`);
      reporter.info(`temp url: ${describeTarget(tempTarget)}`);

      return withSchemaSession(
        connector,
        config.database,
        (live) =>
          withSchemaSession(
            connector,
            tempTarget,
            async (temp): Promise<SyncResult> => {
              await ctx.loader.loadFromFolder(temp, config.paths.modelsFolder);
              lifecycle.enter('SCHEMAS_LOADED');

              const migration = await Migration.create(live, temp, {
                engine: ctx.engine,
                safety: false,
                transactional: config.apply.transactional,
                logger: ctx.logger,
              });
              lifecycle.enter('DIFF_COMPUTED');

              if (migration.statements.length === 0) {
                reporter.info('Already synced.');
                lifecycle.enter('SKIPPED');
                return { outcome: 'synced', statements: [] };
              }

              reporter.info('THE FOLLOWING CHANGES ARE PENDING:');
              reporter.sql(migration.sql);

              if (!options.noPrompt && !isConfirmed(await ctx.prompt('Apply these changes?'))) {
                reporter.info('Not applying.');
                lifecycle.enter('SKIPPED');
                return { outcome: 'declined', statements: migration.statements };
              }

              reporter.info('Applying...');
              await migration.apply();
              reporter.info('Changes applied.');
              lifecycle.enter('APPLIED');
              return { outcome: 'applied', statements: migration.statements };
            },
            ctx.logger
          ),
        ctx.logger
      );
    })
  );
}
