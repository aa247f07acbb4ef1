/**
 * Constraint Analyzer
 *
 * Compares constraints of two versions of a table and renders the
 * statements that drop and add them. A constraint whose type or definition
 * changed is dropped and added again under the same name.
 *
 * @module diff/constraint-analyzer
 */

import type { ConstraintInfo, PlannedStatement, TableSchema } from './types.js';
import { qualify, quoteIdentifier } from './sql.js';

/**
 * Constraints to drop and to add for one table
 */
export interface ConstraintChanges {
  dropped: ConstraintInfo[];
  added: ConstraintInfo[];
}

function sameConstraint(a: ConstraintInfo, b: ConstraintInfo): boolean {
  return a.type === b.type && a.definition === b.definition;
}

/**
 * Compare the constraints of a table.
 *
 * Pass `undefined` for a side where the table does not exist: every
 * constraint of the other side is then dropped or added.
 *
 * @example
 * ```typescript
 * const { dropped, added } = compareConstraints(liveTable, desiredTable);
 * console.log(`${dropped.length} to drop, ${added.length} to add`);
 * ```
 */
export function compareConstraints(
  from: TableSchema | undefined,
  to: TableSchema | undefined
): ConstraintChanges {
  const fromConstraints = from?.constraints ?? [];
  const toConstraints = to?.constraints ?? [];
  const fromMap = new Map(fromConstraints.map((c) => [c.name, c]));
  const toMap = new Map(toConstraints.map((c) => [c.name, c]));

  const dropped = fromConstraints.filter((constraint) => {
    const target = toMap.get(constraint.name);
    return !target || !sameConstraint(constraint, target);
  });

  const added = toConstraints.filter((constraint) => {
    const current = fromMap.get(constraint.name);
    return !current || !sameConstraint(current, constraint);
  });

  return { dropped, added };
}

/**
 * `ALTER TABLE ... DROP CONSTRAINT`
 */
export function dropConstraintStatement(
  table: TableSchema,
  constraint: ConstraintInfo
): PlannedStatement {
  return {
    sql: `ALTER TABLE ${qualify(table.schema, table.name)} DROP CONSTRAINT ${quoteIdentifier(constraint.name)}`,
    destructive: true,
  };
}

/**
 * `ALTER TABLE ... ADD CONSTRAINT` with the definition as PostgreSQL renders it
 */
export function addConstraintStatement(
  table: TableSchema,
  constraint: ConstraintInfo
): PlannedStatement {
  return {
    sql: `ALTER TABLE ${qualify(table.schema, table.name)} ADD CONSTRAINT ${quoteIdentifier(constraint.name)} ${constraint.definition}`,
    destructive: false,
  };
}
