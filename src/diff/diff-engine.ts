/**
 * Diff Engine
 *
 * The seam between migrations and the code that reads schemas and plans
 * statements. Migrations only depend on the `DiffEngine` interface.
 *
 * @module diff/diff-engine
 */

import type { Queryable } from '../session/schema-session.js';
import type { PlannedStatement, SchemaSnapshot } from './types.js';
import { introspect } from './introspection.js';
import { planMigration } from './planner.js';

/**
 * Reads schemas and plans the statements between two of them
 */
export interface DiffEngine {
  /** Read the schema of a connected database */
  introspect(db: Queryable): Promise<SchemaSnapshot>;
  /** Plan the statements that transform `from` into `to` */
  plan(from: SchemaSnapshot, to: SchemaSnapshot): PlannedStatement[];
}

/**
 * Engine backed by catalog introspection and the built-in planner
 */
export class PostgresDiffEngine implements DiffEngine {
  introspect(db: Queryable): Promise<SchemaSnapshot> {
    return introspect(db);
  }

  plan(from: SchemaSnapshot, to: SchemaSnapshot): PlannedStatement[] {
    return planMigration(from, to);
  }
}

/**
 * Create the default diff engine
 */
export function createDiffEngine(): DiffEngine {
  return new PostgresDiffEngine();
}
