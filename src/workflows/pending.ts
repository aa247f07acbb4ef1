/**
 * Pending Workflow
 *
 * Produces the script that upgrades production: loads the production schema
 * dump and the application models into two scratch databases, diffs them and
 * writes the result to the pending output file. Never touches a live database.
 *
 * @module workflows/pending
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { describeTarget } from '../connection/connection-target.js';
import { withSchemaSession } from '../session/schema-session.js';
import { Migration } from '../diff/migration.js';
import { WorkflowLifecycle } from './lifecycle.js';
import type { PendingResult, WorkflowContext } from './types.js';

/**
 * Diff the production snapshot against the application models and write the
 * script to `config.paths.pendingOutput`, replacing its contents. The file is
 * written empty when there is nothing to do.
 */
export async function runPending(ctx: WorkflowContext): Promise<PendingResult> {
  const { config, connector, reporter, loader } = ctx;
  const outputPath = config.paths.pendingOutput;
  const lifecycle = new WorkflowLifecycle(reporter);

  return lifecycle.run(() =>
    ctx.ephemeral.withEphemeralDatabase((productionTarget) => {
      lifecycle.enter('EPHEMERAL_ACQUIRED');

      return ctx.ephemeral.withEphemeralDatabase((desiredTarget) => {
        reporter.info(`prod temp url: ${describeTarget(productionTarget)}`);
        reporter.info(`target temp url: ${describeTarget(desiredTarget)}`);

        return withSchemaSession(
          connector,
          productionTarget,
          (production) =>
            withSchemaSession(
              connector,
              desiredTarget,
              async (desired): Promise<PendingResult> => {
                await loader.loadFromFile(productionTarget, config.paths.productionSnapshot);
                await loader.loadFromFolder(desired, config.paths.modelsFolder);
                lifecycle.enter('SCHEMAS_LOADED');

                const migration = await Migration.create(production, desired, {
                  engine: ctx.engine,
                  safety: false,
                  logger: ctx.logger,
                });
                lifecycle.enter('DIFF_COMPUTED');

                if (migration.statements.length > 0) {
                  reporter.info('THE FOLLOWING CHANGES ARE PENDING:');
                  reporter.sql(migration.sql);
                } else {
                  reporter.info('No changes needed, setting pending.sql to empty.');
                }

                await mkdir(dirname(outputPath), { recursive: true });
                await writeFile(outputPath, migration.sql, 'utf8');
                reporter.info(`Changes written to ${outputPath}.`);
                lifecycle.enter('WRITTEN');

                return { statements: migration.statements, outputPath };
              },
              ctx.logger
            ),
          ctx.logger
        );
      });
    })
  );
}
