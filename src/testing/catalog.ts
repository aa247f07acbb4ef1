/**
 * Answers catalog introspection queries from an in-memory snapshot, so the
 * built-in diff engine can run against FakeClient connections.
 */

import type { QueryResultRow } from 'pg';
import type { ConstraintType, SchemaSnapshot } from '../diff/types.js';
import type { QueryHandler } from './fakes.js';

const CONSTRAINT_CODES: Record<ConstraintType, string> = {
  primary_key: 'p',
  unique: 'u',
  check: 'c',
  foreign_key: 'f',
  exclusion: 'x',
};

/**
 * The empty database every fresh PostgreSQL database starts as
 */
export function emptySnapshot(): SchemaSnapshot {
  return { schemas: ['public'], enums: [], tables: [], functions: [] };
}

/**
 * Rows for one catalog query, or undefined when the query is not a catalog query
 */
export function catalogRows(text: string, snapshot: SchemaSnapshot): QueryResultRow[] | undefined {
  if (text.includes('FROM pg_indexes i')) {
    return snapshot.tables.flatMap((table) =>
      table.indexes.map((index) => ({
        schema_name: table.schema,
        table_name: table.name,
        index_name: index.name,
        definition: index.definition,
      }))
    );
  }

  if (text.includes('FROM pg_attribute a')) {
    return snapshot.tables.flatMap((table) =>
      table.columns.map((column) => ({
        schema_name: table.schema,
        table_name: table.name,
        column_name: column.name,
        data_type: column.type,
        is_nullable: column.isNullable,
        column_default: column.defaultValue,
        identity: column.identity === 'always' ? 'a' : column.identity === 'by_default' ? 'd' : '',
        generated: column.generated ? 's' : '',
      }))
    );
  }

  if (text.includes('FROM pg_constraint con')) {
    return snapshot.tables.flatMap((table) =>
      table.constraints.map((constraint) => ({
        schema_name: table.schema,
        table_name: table.name,
        constraint_name: constraint.name,
        constraint_type: CONSTRAINT_CODES[constraint.type],
        definition: constraint.definition,
      }))
    );
  }

  if (text.includes('FROM pg_proc p')) {
    return snapshot.functions.map((fn) => ({
      schema_name: fn.schema,
      function_name: fn.name,
      kind: fn.kind === 'procedure' ? 'p' : 'f',
      identity_arguments: fn.identityArguments,
      result: fn.result,
      definition: fn.definition,
    }));
  }

  if (text.includes('FROM pg_type t')) {
    return snapshot.enums.map((type) => ({
      schema_name: type.schema,
      type_name: type.name,
      labels: type.values,
    }));
  }

  if (text.includes('FROM pg_class c')) {
    return snapshot.tables.map((table) => ({ schema_name: table.schema, table_name: table.name }));
  }

  if (text.includes('FROM pg_namespace n')) {
    return snapshot.schemas.map((schema) => ({ schema_name: schema }));
  }

  return undefined;
}

/**
 * Query handler serving catalog queries from whatever `current()` returns
 * at the time of the query; other statements go to `onStatement`
 */
export function catalogHandler(
  current: () => SchemaSnapshot,
  onStatement?: (text: string) => void
): QueryHandler {
  return (text) => {
    const rows = catalogRows(text, current());
    if (rows) {
      return rows;
    }
    onStatement?.(text);
    return undefined;
  };
}
