/**
 * Column Analyzer
 *
 * Renders column definitions and the ALTER TABLE statements that turn one
 * table's columns into another's: added and dropped columns, type changes,
 * default changes, nullability changes and identity changes.
 *
 * @module diff/column-analyzer
 */

import type { ColumnInfo, PlannedStatement, TableSchema } from './types.js';
import { qualify, quoteIdentifier, quoteLiteral } from './sql.js';

const SERIAL_TYPES: Record<string, string> = {
  smallint: 'smallserial',
  integer: 'serial',
  bigint: 'bigserial',
};

/**
 * Detect a column whose default comes from the sequence a serial column owns.
 *
 * `CREATE TABLE t (id serial)` is stored as `integer` with a
 * `nextval('t_id_seq'::regclass)` default; rendering it back as `serial`
 * recreates the sequence too.
 *
 * @example
 * ```typescript
 * serialType('t', { name: 'id', type: 'integer', defaultValue: "nextval('t_id_seq'::regclass)", ... });
 * // 'serial'
 * ```
 */
export function serialType(table: string, column: ColumnInfo): string | null {
  const serial = SERIAL_TYPES[column.type];
  if (!serial || column.identity !== null || column.defaultValue === null) {
    return null;
  }

  const match = /^nextval\('(.+)'::regclass\)$/.exec(column.defaultValue);
  if (!match?.[1]) {
    return null;
  }

  const sequence = match[1].replace(/"/g, '');
  const owned = `${table}_${column.name}_seq`;
  if (sequence === owned || sequence.endsWith(`.${owned}`)) {
    return serial;
  }
  return null;
}

function identityClause(identity: ColumnInfo['identity']): string {
  return identity === 'always' ? 'GENERATED ALWAYS AS IDENTITY' : 'GENERATED BY DEFAULT AS IDENTITY';
}

/**
 * Render a column for CREATE TABLE or ADD COLUMN
 *
 * @example
 * ```typescript
 * renderColumn('transaction', { name: 'amount', type: 'numeric(11,2)', isNullable: false, defaultValue: null, identity: null, generated: false });
 * // '"amount" numeric(11,2) NOT NULL'
 * ```
 */
export function renderColumn(table: string, column: ColumnInfo): string {
  const serial = serialType(table, column);
  let definition = `${quoteIdentifier(column.name)} ${serial ?? column.type}`;

  if (column.generated && column.defaultValue !== null) {
    definition += ` GENERATED ALWAYS AS (${column.defaultValue}) STORED`;
  } else if (column.identity !== null) {
    definition += ` ${identityClause(column.identity)}`;
  } else if (column.defaultValue !== null && serial === null) {
    definition += ` DEFAULT ${column.defaultValue}`;
  }

  if (!column.isNullable) {
    definition += ' NOT NULL';
  }

  return definition;
}

/**
 * CREATE TABLE statement with columns only; constraints and indexes are
 * added by later phases so that every referenced table exists first
 */
export function createTableStatement(table: TableSchema): string {
  const qualified = qualify(table.schema, table.name);
  if (table.columns.length === 0) {
    return `CREATE TABLE ${qualified} ()`;
  }
  const columns = table.columns.map((column) => `  ${renderColumn(table.name, column)}`);
  return `CREATE TABLE ${qualified} (\n${columns.join(',\n')}\n)`;
}

/**
 * A generated column cannot take a new expression, a new type or become
 * generated in place; it is dropped and added again
 */
function needsRecreate(current: ColumnInfo, target: ColumnInfo): boolean {
  if (!target.generated) {
    return false;
  }
  return !current.generated || current.defaultValue !== target.defaultValue || current.type !== target.type;
}

/**
 * Statements that create the sequence a serial column owns and move it past
 * the values already in the column
 */
function createOwnedSequence(to: TableSchema, target: ColumnInfo, serial: string): PlannedStatement[] {
  const table = qualify(to.schema, to.name);
  const column = quoteIdentifier(target.name);
  const sequence = qualify(to.schema, `${to.name}_${target.name}_seq`);
  const type = serial === 'bigserial' ? 'bigint' : serial === 'smallserial' ? 'smallint' : 'integer';

  return [
    { sql: `CREATE SEQUENCE ${sequence} AS ${type} OWNED BY ${table}.${column}`, destructive: false },
    {
      sql: `SELECT setval(${quoteLiteral(sequence)}, COALESCE(MAX(${column}), 0) + 1, false) FROM ${table}`,
      destructive: false,
    },
  ];
}

/**
 * ALTER TABLE statements for one column present on both sides.
 *
 * Identity is dropped before defaults change and added after them, since a
 * column cannot carry both.
 */
function alterColumn(to: TableSchema, current: ColumnInfo, target: ColumnInfo): PlannedStatement[] {
  const table = qualify(to.schema, to.name);
  const column = quoteIdentifier(target.name);
  const alter = `ALTER TABLE ${table} ALTER COLUMN ${column}`;

  if (needsRecreate(current, target)) {
    return [
      { sql: `ALTER TABLE ${table} DROP COLUMN ${column}`, destructive: true },
      { sql: `ALTER TABLE ${table} ADD COLUMN ${renderColumn(to.name, target)}`, destructive: false },
    ];
  }

  const statements: PlannedStatement[] = [];

  // The generation expression is not a default once the column is plain.
  let currentDefault = current.defaultValue;
  if (current.generated && !target.generated) {
    statements.push({ sql: `${alter} DROP EXPRESSION`, destructive: false });
    currentDefault = null;
  }

  if (current.identity !== null && current.identity !== target.identity) {
    if (target.identity === null) {
      statements.push({ sql: `${alter} DROP IDENTITY`, destructive: false });
    } else {
      const kind = target.identity === 'always' ? 'ALWAYS' : 'BY DEFAULT';
      statements.push({ sql: `${alter} SET GENERATED ${kind}`, destructive: false });
    }
  }

  const typeChanged = current.type !== target.type;
  const defaultChanged = currentDefault !== target.defaultValue;

  // A default of the old type can block the type change, so drop it first.
  if (typeChanged && defaultChanged && currentDefault !== null) {
    statements.push({ sql: `${alter} DROP DEFAULT`, destructive: false });
  }

  if (typeChanged) {
    statements.push({
      sql: `${alter} TYPE ${target.type} USING ${column}::${target.type}`,
      destructive: true,
    });
  }

  const currentSerial = current.generated ? null : serialType(to.name, current);
  const targetSerial = serialType(to.name, target);

  if (defaultChanged) {
    if (target.defaultValue !== null) {
      if (targetSerial !== null && currentSerial === null) {
        statements.push(...createOwnedSequence(to, target, targetSerial));
      }
      statements.push({ sql: `${alter} SET DEFAULT ${target.defaultValue}`, destructive: false });
    } else if (!typeChanged || currentDefault === null) {
      statements.push({ sql: `${alter} DROP DEFAULT`, destructive: false });
    }

    if (currentSerial !== null && targetSerial === null) {
      const sequence = qualify(to.schema, `${to.name}_${current.name}_seq`);
      statements.push({ sql: `DROP SEQUENCE ${sequence}`, destructive: true });
    }
  }

  if (current.isNullable !== target.isNullable) {
    statements.push({
      sql: `${alter} ${target.isNullable ? 'DROP NOT NULL' : 'SET NOT NULL'}`,
      destructive: false,
    });
  }

  if (current.identity === null && target.identity !== null) {
    statements.push({ sql: `${alter} ADD ${identityClause(target.identity)}`, destructive: false });
  }

  return statements;
}

/**
 * Compare the columns of a table present on both sides.
 *
 * Additions come first, then changes in column order of the target, then
 * drops. Type changes cast through `USING`.
 *
 * @param from - The table as it exists now
 * @param to - The table as it should be
 * @returns Statements in the order they must run
 */
export function compareColumns(from: TableSchema, to: TableSchema): PlannedStatement[] {
  const table = qualify(to.schema, to.name);
  const fromColumns = new Map(from.columns.map((c) => [c.name, c]));
  const toColumns = new Map(to.columns.map((c) => [c.name, c]));

  const additions: PlannedStatement[] = [];
  const changes: PlannedStatement[] = [];
  const drops: PlannedStatement[] = [];

  for (const target of to.columns) {
    const current = fromColumns.get(target.name);

    if (!current) {
      additions.push({
        sql: `ALTER TABLE ${table} ADD COLUMN ${renderColumn(to.name, target)}`,
        destructive: false,
      });
      continue;
    }

    changes.push(...alterColumn(to, current, target));
  }

  for (const current of from.columns) {
    if (!toColumns.has(current.name)) {
      drops.push({
        sql: `ALTER TABLE ${table} DROP COLUMN ${quoteIdentifier(current.name)}`,
        destructive: true,
      });
    }
  }

  return [...additions, ...changes, ...drops];
}
