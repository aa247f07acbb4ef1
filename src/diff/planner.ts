/**
 * Migration Planner
 *
 * Turns two schema snapshots into the ordered statements that transform the
 * first into the second. Objects are dropped before anything is created, and
 * every object is created after the objects it can depend on.
 *
 * @module diff/planner
 */

import type {
  ColumnInfo,
  EnumInfo,
  FunctionInfo,
  PlannedStatement,
  SchemaSnapshot,
  TableSchema,
} from './types.js';
import { compareColumns, createTableStatement } from './column-analyzer.js';
import {
  addConstraintStatement,
  compareConstraints,
  dropConstraintStatement,
} from './constraint-analyzer.js';
import { compareIndexes, createIndexStatement, dropIndexStatement } from './index-analyzer.js';
import { qualify, quoteIdentifier, quoteLiteral } from './sql.js';

/**
 * Suffix given to an enum type while it is being recreated
 */
export const OLD_ENUM_SUFFIX = '__old_version_to_be_dropped';

interface TablePair {
  from: TableSchema | undefined;
  to: TableSchema | undefined;
}

function qualifiedKey(schema: string, name: string): string {
  return `${schema}.${name}`;
}

function functionKey(fn: FunctionInfo): string {
  return `${fn.schema}.${fn.name}(${fn.identityArguments})`;
}

/**
 * Pair up tables by qualified name: tables of `to` first in their order,
 * then tables only present in `from`
 */
function pairTables(from: SchemaSnapshot, to: SchemaSnapshot): TablePair[] {
  const fromMap = new Map(from.tables.map((t) => [qualifiedKey(t.schema, t.name), t]));
  const toKeys = new Set(to.tables.map((t) => qualifiedKey(t.schema, t.name)));

  const pairs: TablePair[] = to.tables.map((table) => ({
    from: fromMap.get(qualifiedKey(table.schema, table.name)),
    to: table,
  }));

  for (const table of from.tables) {
    if (!toKeys.has(qualifiedKey(table.schema, table.name))) {
      pairs.push({ from: table, to: undefined });
    }
  }

  return pairs;
}

/**
 * Whether every value of `before` appears in `after` in the same relative order
 */
function keepsOrder(before: readonly string[], after: readonly string[]): boolean {
  let position = 0;
  for (const value of after) {
    if (position < before.length && before[position] === value) {
      position++;
    }
  }
  return position === before.length;
}

/**
 * How a column refers to an enum type, if it does
 */
function enumUsage(column: ColumnInfo, type: EnumInfo): 'scalar' | 'array' | null {
  const names = new Set([
    type.name,
    quoteIdentifier(type.name),
    `${type.schema}.${type.name}`,
    qualify(type.schema, type.name),
    `${quoteIdentifier(type.schema)}.${type.name}`,
    `${type.schema}.${quoteIdentifier(type.name)}`,
  ]);

  if (names.has(column.type)) {
    return 'scalar';
  }
  if (column.type.endsWith('[]') && names.has(column.type.slice(0, -2))) {
    return 'array';
  }
  return null;
}

function createEnumStatement(type: EnumInfo): PlannedStatement {
  const labels = type.values.map(quoteLiteral).join(', ');
  return { sql: `CREATE TYPE ${qualify(type.schema, type.name)} AS ENUM (${labels})`, destructive: false };
}

/**
 * `ALTER TYPE ... ADD VALUE` for every label the enum gained, placed
 * relative to its neighbour
 */
function addEnumValues(from: EnumInfo, to: EnumInfo): PlannedStatement[] {
  const existing = new Set(from.values);
  const qualified = qualify(to.schema, to.name);
  const statements: PlannedStatement[] = [];

  to.values.forEach((value, index) => {
    if (existing.has(value)) return;

    const previous = to.values[index - 1];
    const first = from.values[0];
    let position = '';
    if (previous !== undefined) {
      position = ` AFTER ${quoteLiteral(previous)}`;
    } else if (first !== undefined) {
      position = ` BEFORE ${quoteLiteral(first)}`;
    }

    statements.push({
      sql: `ALTER TYPE ${qualified} ADD VALUE ${quoteLiteral(value)}${position}`,
      destructive: false,
    });
  });

  return statements;
}

/**
 * Replace an enum whose labels were removed or reordered: rename the old
 * type, create the new one, move dependent columns over through text, then
 * drop the old type
 */
function recreateEnum(type: EnumInfo, tables: TablePair[]): PlannedStatement[] {
  const qualified = qualify(type.schema, type.name);
  const oldName = `${type.name}${OLD_ENUM_SUFFIX}`;
  const statements: PlannedStatement[] = [
    { sql: `ALTER TYPE ${qualified} RENAME TO ${quoteIdentifier(oldName)}`, destructive: false },
    createEnumStatement(type),
  ];

  for (const { from, to } of tables) {
    if (!from || !to) continue;

    for (const column of from.columns) {
      const usage = enumUsage(column, type);
      if (usage === null) continue;

      const name = quoteIdentifier(column.name);
      const alter = `ALTER TABLE ${qualify(from.schema, from.name)} ALTER COLUMN ${name}`;
      const cast = usage === 'array' ? `${name}::text[]::${qualified}[]` : `${name}::text::${qualified}`;
      const newType = usage === 'array' ? `${qualified}[]` : qualified;

      // A default typed with the old enum cannot be cast along with the column.
      if (column.defaultValue !== null && !column.generated) {
        statements.push({ sql: `${alter} DROP DEFAULT`, destructive: false });
      }
      statements.push({ sql: `${alter} TYPE ${newType} USING ${cast}`, destructive: true });

      const target = to.columns.find((c) => c.name === column.name);
      if (column.defaultValue !== null && target !== undefined && target.defaultValue !== null && !target.generated) {
        statements.push({ sql: `${alter} SET DEFAULT ${target.defaultValue}`, destructive: false });
      }
    }
  }

  statements.push({ sql: `DROP TYPE ${qualify(type.schema, oldName)}`, destructive: true });
  return statements;
}

function dropFunctionStatement(fn: FunctionInfo): PlannedStatement {
  const keyword = fn.kind === 'procedure' ? 'PROCEDURE' : 'FUNCTION';
  return {
    sql: `DROP ${keyword} ${qualify(fn.schema, fn.name)}(${fn.identityArguments})`,
    destructive: true,
  };
}

/**
 * A function that cannot be updated with `CREATE OR REPLACE`
 */
function needsRecreate(from: FunctionInfo, to: FunctionInfo): boolean {
  return from.kind !== to.kind || from.result !== to.result;
}

/**
 * Plan the statements that transform `from` into `to`.
 *
 * Phases, in order:
 * 1. drop foreign keys that are removed or changed
 * 2. drop indexes that are removed or changed
 * 3. drop other constraints that are removed or changed
 * 4. drop removed tables
 * 5. drop removed functions, and functions whose kind or result changed
 * 6. create schemas
 * 7. create enums, add enum values, recreate reordered enums
 * 8. create tables (columns only)
 * 9. alter columns of existing tables
 * 10. create or replace functions
 * 11. add primary key, unique, check and exclusion constraints
 * 12. create indexes
 * 13. add foreign keys
 * 14. drop removed enums
 * 15. drop removed schemas
 *
 * @example
 * ```typescript
 * const statements = planMigration(await introspect(live), await introspect(desired));
 * for (const statement of statements) {
 *   console.log(`${statement.sql};`);
 * }
 * ```
 */
export function planMigration(from: SchemaSnapshot, to: SchemaSnapshot): PlannedStatement[] {
  const tables = pairTables(from, to);

  const dropForeignKeys: PlannedStatement[] = [];
  const dropIndexes: PlannedStatement[] = [];
  const dropConstraints: PlannedStatement[] = [];
  const dropTables: PlannedStatement[] = [];
  const createTables: PlannedStatement[] = [];
  const alterTables: PlannedStatement[] = [];
  const addConstraints: PlannedStatement[] = [];
  const createIndexes: PlannedStatement[] = [];
  const addForeignKeys: PlannedStatement[] = [];

  for (const pair of tables) {
    const constraints = compareConstraints(pair.from, pair.to);
    const indexes = compareIndexes(pair.from, pair.to);

    if (pair.from) {
      const table = pair.from;
      for (const constraint of constraints.dropped) {
        const statement = dropConstraintStatement(table, constraint);
        if (constraint.type === 'foreign_key') {
          dropForeignKeys.push(statement);
        } else if (pair.to) {
          dropConstraints.push(statement);
        }
      }
      if (pair.to) {
        dropIndexes.push(...indexes.dropped.map((index) => dropIndexStatement(table, index)));
      } else {
        dropTables.push({ sql: `DROP TABLE ${qualify(table.schema, table.name)}`, destructive: true });
      }
    }

    if (pair.to) {
      const table = pair.to;
      if (pair.from) {
        alterTables.push(...compareColumns(pair.from, table));
      } else {
        createTables.push({ sql: createTableStatement(table), destructive: false });
      }
      for (const constraint of constraints.added) {
        const statement = addConstraintStatement(table, constraint);
        if (constraint.type === 'foreign_key') {
          addForeignKeys.push(statement);
        } else {
          addConstraints.push(statement);
        }
      }
      createIndexes.push(...indexes.added.map(createIndexStatement));
    }
  }

  const fromFunctions = new Map(from.functions.map((fn) => [functionKey(fn), fn]));
  const toFunctions = new Map(to.functions.map((fn) => [functionKey(fn), fn]));

  const dropFunctions = from.functions
    .filter((fn) => {
      const target = toFunctions.get(functionKey(fn));
      return !target || needsRecreate(fn, target);
    })
    .map(dropFunctionStatement);

  const createFunctions: PlannedStatement[] = to.functions
    .filter((fn) => fromFunctions.get(functionKey(fn))?.definition !== fn.definition)
    .map((fn) => ({ sql: fn.definition, destructive: false }));

  const fromSchemas = new Set(from.schemas);
  const toSchemas = new Set(to.schemas);
  const createSchemas: PlannedStatement[] = to.schemas
    .filter((schema) => !fromSchemas.has(schema))
    .map((schema) => ({ sql: `CREATE SCHEMA ${quoteIdentifier(schema)}`, destructive: false }));
  const dropSchemas: PlannedStatement[] = from.schemas
    .filter((schema) => !toSchemas.has(schema))
    .map((schema) => ({ sql: `DROP SCHEMA ${quoteIdentifier(schema)}`, destructive: true }));

  const fromEnums = new Map(from.enums.map((e) => [qualifiedKey(e.schema, e.name), e]));
  const toEnumKeys = new Set(to.enums.map((e) => qualifiedKey(e.schema, e.name)));
  const enumChanges: PlannedStatement[] = [];

  for (const type of to.enums) {
    const current = fromEnums.get(qualifiedKey(type.schema, type.name));
    if (!current) {
      enumChanges.push(createEnumStatement(type));
    } else if (keepsOrder(current.values, type.values)) {
      enumChanges.push(...addEnumValues(current, type));
    } else {
      enumChanges.push(...recreateEnum(type, tables));
    }
  }

  const dropEnums: PlannedStatement[] = from.enums
    .filter((type) => !toEnumKeys.has(qualifiedKey(type.schema, type.name)))
    .map((type) => ({ sql: `DROP TYPE ${qualify(type.schema, type.name)}`, destructive: true }));

  return [
    ...dropForeignKeys,
    ...dropIndexes,
    ...dropConstraints,
    ...dropTables,
    ...dropFunctions,
    ...createSchemas,
    ...enumChanges,
    ...createTables,
    ...alterTables,
    ...createFunctions,
    ...addConstraints,
    ...createIndexes,
    ...addForeignKeys,
    ...dropEnums,
    ...dropSchemas,
  ];
}
