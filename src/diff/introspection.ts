/**
 * Schema Introspection
 *
 * Reads the SQL-visible objects of a database into a `SchemaSnapshot`.
 * System schemas and objects owned by extensions are left out.
 *
 * @module diff/introspection
 */

import type { Queryable } from '../session/schema-session.js';
import type {
  ColumnInfo,
  ConstraintInfo,
  ConstraintType,
  EnumInfo,
  FunctionInfo,
  IndexInfo,
  SchemaSnapshot,
  TableSchema,
} from './types.js';

/**
 * Filter excluding system schemas for a column reference
 */
function userSchemas(column: string): string {
  return `${column} NOT IN ('pg_catalog', 'information_schema', 'pg_toast')
       AND ${column} NOT LIKE 'pg_temp_%'
       AND ${column} NOT LIKE 'pg_toast_temp_%'`;
}

const CONSTRAINT_TYPES: Record<string, ConstraintType> = {
  p: 'primary_key',
  u: 'unique',
  c: 'check',
  f: 'foreign_key',
  x: 'exclusion',
};

/**
 * Key used to group per-table rows
 */
function tableKey(schema: string, table: string): string {
  return `${schema}.${table}`;
}

/**
 * List user schemas
 */
export async function introspectSchemas(db: Queryable): Promise<string[]> {
  const result = await db.query<{ schema_name: string }>(
    `SELECT n.nspname AS schema_name
     FROM pg_namespace n
     WHERE ${userSchemas('n.nspname')}
       AND NOT EXISTS (
         SELECT 1 FROM pg_depend d
         WHERE d.classid = 'pg_namespace'::regclass AND d.objid = n.oid AND d.deptype = 'e'
       )
     ORDER BY n.nspname`
  );
  return result.rows.map((row) => row.schema_name);
}

/**
 * List enum types with their labels in sort order
 */
export async function introspectEnums(db: Queryable): Promise<EnumInfo[]> {
  const result = await db.query<{ schema_name: string; type_name: string; labels: string[] }>(
    `SELECT n.nspname AS schema_name,
            t.typname AS type_name,
            array_agg(e.enumlabel::text ORDER BY e.enumsortorder) AS labels
     FROM pg_type t
     JOIN pg_enum e ON e.enumtypid = t.oid
     JOIN pg_namespace n ON n.oid = t.typnamespace
     WHERE ${userSchemas('n.nspname')}
     GROUP BY n.nspname, t.typname
     ORDER BY n.nspname, t.typname`
  );
  return result.rows.map((row) => ({
    schema: row.schema_name,
    name: row.type_name,
    values: row.labels,
  }));
}

/**
 * List tables with their columns, constraints and indexes
 */
export async function introspectTables(db: Queryable): Promise<TableSchema[]> {
  const tablesResult = await db.query<{ schema_name: string; table_name: string }>(
    `SELECT n.nspname AS schema_name, c.relname AS table_name
     FROM pg_class c
     JOIN pg_namespace n ON n.oid = c.relnamespace
     WHERE c.relkind IN ('r', 'p')
       AND NOT c.relispartition
       AND ${userSchemas('n.nspname')}
     ORDER BY n.nspname, c.relname`
  );

  const tables = new Map<string, TableSchema>();
  for (const row of tablesResult.rows) {
    tables.set(tableKey(row.schema_name, row.table_name), {
      schema: row.schema_name,
      name: row.table_name,
      columns: [],
      constraints: [],
      indexes: [],
    });
  }

  const columnsResult = await db.query<{
    schema_name: string;
    table_name: string;
    column_name: string;
    data_type: string;
    is_nullable: boolean;
    column_default: string | null;
    identity: string;
    generated: string;
  }>(
    `SELECT n.nspname AS schema_name,
            c.relname AS table_name,
            a.attname AS column_name,
            format_type(a.atttypid, a.atttypmod) AS data_type,
            NOT a.attnotnull AS is_nullable,
            pg_get_expr(d.adbin, d.adrelid) AS column_default,
            a.attidentity::text AS identity,
            a.attgenerated::text AS generated
     FROM pg_attribute a
     JOIN pg_class c ON c.oid = a.attrelid
     JOIN pg_namespace n ON n.oid = c.relnamespace
     LEFT JOIN pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
     WHERE c.relkind IN ('r', 'p')
       AND a.attnum > 0
       AND NOT a.attisdropped
       AND ${userSchemas('n.nspname')}
     ORDER BY n.nspname, c.relname, a.attnum`
  );

  for (const row of columnsResult.rows) {
    const column: ColumnInfo = {
      name: row.column_name,
      type: row.data_type,
      isNullable: row.is_nullable,
      defaultValue: row.column_default,
      identity: row.identity === 'a' ? 'always' : row.identity === 'd' ? 'by_default' : null,
      generated: row.generated === 's',
    };
    tables.get(tableKey(row.schema_name, row.table_name))?.columns.push(column);
  }

  const constraintsResult = await db.query<{
    schema_name: string;
    table_name: string;
    constraint_name: string;
    constraint_type: string;
    definition: string;
  }>(
    `SELECT n.nspname AS schema_name,
            c.relname AS table_name,
            con.conname AS constraint_name,
            con.contype::text AS constraint_type,
            pg_get_constraintdef(con.oid) AS definition
     FROM pg_constraint con
     JOIN pg_class c ON c.oid = con.conrelid
     JOIN pg_namespace n ON n.oid = c.relnamespace
     WHERE con.contype IN ('p', 'u', 'c', 'f', 'x')
       AND ${userSchemas('n.nspname')}
     ORDER BY n.nspname, c.relname, con.conname`
  );

  for (const row of constraintsResult.rows) {
    const type = CONSTRAINT_TYPES[row.constraint_type];
    if (!type) continue;

    const constraint: ConstraintInfo = {
      name: row.constraint_name,
      type,
      definition: row.definition,
    };
    tables.get(tableKey(row.schema_name, row.table_name))?.constraints.push(constraint);
  }

  const indexesResult = await db.query<{
    schema_name: string;
    table_name: string;
    index_name: string;
    definition: string;
  }>(
    `SELECT i.schemaname AS schema_name,
            i.tablename AS table_name,
            i.indexname AS index_name,
            i.indexdef AS definition
     FROM pg_indexes i
     WHERE ${userSchemas('i.schemaname')}
       AND NOT EXISTS (
         SELECT 1
         FROM pg_constraint con
         JOIN pg_class ic ON ic.oid = con.conindid
         JOIN pg_namespace ns ON ns.oid = ic.relnamespace
         WHERE con.contype IN ('p', 'u', 'x')
           AND ic.relname = i.indexname
           AND ns.nspname = i.schemaname
       )
     ORDER BY i.schemaname, i.tablename, i.indexname`
  );

  for (const row of indexesResult.rows) {
    const index: IndexInfo = {
      name: row.index_name,
      definition: row.definition,
    };
    tables.get(tableKey(row.schema_name, row.table_name))?.indexes.push(index);
  }

  return Array.from(tables.values());
}

/**
 * List functions and procedures, skipping those owned by extensions
 */
export async function introspectFunctions(db: Queryable): Promise<FunctionInfo[]> {
  const result = await db.query<{
    schema_name: string;
    function_name: string;
    kind: string;
    identity_arguments: string;
    result: string | null;
    definition: string;
  }>(
    `SELECT n.nspname AS schema_name,
            p.proname AS function_name,
            p.prokind::text AS kind,
            pg_get_function_identity_arguments(p.oid) AS identity_arguments,
            pg_get_function_result(p.oid) AS result,
            pg_get_functiondef(p.oid) AS definition
     FROM pg_proc p
     JOIN pg_namespace n ON n.oid = p.pronamespace
     WHERE p.prokind IN ('f', 'p')
       AND ${userSchemas('n.nspname')}
       AND NOT EXISTS (
         SELECT 1 FROM pg_depend d
         WHERE d.classid = 'pg_proc'::regclass AND d.objid = p.oid AND d.deptype = 'e'
       )
     ORDER BY n.nspname, p.proname, identity_arguments`
  );

  return result.rows.map((row) => ({
    schema: row.schema_name,
    name: row.function_name,
    kind: row.kind === 'p' ? 'procedure' : 'function',
    identityArguments: row.identity_arguments,
    result: row.kind === 'p' ? null : row.result,
    definition: row.definition.trimEnd(),
  }));
}

/**
 * Read a complete snapshot of a database
 *
 * @example
 * ```typescript
 * const snapshot = await introspect(session);
 * console.log(snapshot.tables.map((t) => `${t.schema}.${t.name}`));
 * ```
 */
export async function introspect(db: Queryable): Promise<SchemaSnapshot> {
  const schemas = await introspectSchemas(db);
  const enums = await introspectEnums(db);
  const tables = await introspectTables(db);
  const functions = await introspectFunctions(db);

  return { schemas, enums, tables, functions };
}
