/**
 * Index Analyzer
 *
 * Compares the standalone indexes of two versions of a table. Indexes
 * backing primary key, unique and exclusion constraints are handled as
 * constraints and never show up here.
 *
 * @module diff/index-analyzer
 */

import type { IndexInfo, PlannedStatement, TableSchema } from './types.js';
import { qualify } from './sql.js';

/**
 * Indexes to drop and to create for one table
 */
export interface IndexChanges {
  dropped: IndexInfo[];
  added: IndexInfo[];
}

/**
 * Compare the indexes of a table by name and definition.
 *
 * Pass `undefined` for a side where the table does not exist.
 */
export function compareIndexes(
  from: TableSchema | undefined,
  to: TableSchema | undefined
): IndexChanges {
  const fromIndexes = from?.indexes ?? [];
  const toIndexes = to?.indexes ?? [];
  const fromMap = new Map(fromIndexes.map((i) => [i.name, i.definition]));
  const toMap = new Map(toIndexes.map((i) => [i.name, i.definition]));

  return {
    dropped: fromIndexes.filter((index) => toMap.get(index.name) !== index.definition),
    added: toIndexes.filter((index) => fromMap.get(index.name) !== index.definition),
  };
}

/**
 * `DROP INDEX` for an index of the given table
 */
export function dropIndexStatement(table: TableSchema, index: IndexInfo): PlannedStatement {
  return { sql: `DROP INDEX ${qualify(table.schema, index.name)}`, destructive: true };
}

/**
 * The `CREATE INDEX` statement PostgreSQL reported for the index
 */
export function createIndexStatement(index: IndexInfo): PlannedStatement {
  return { sql: index.definition, destructive: false };
}
