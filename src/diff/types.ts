/**
 * Schema Snapshot Types
 *
 * Structures produced by introspecting a database and consumed by the
 * migration planner.
 *
 * @module diff/types
 */

/**
 * Column metadata from pg_attribute
 */
export interface ColumnInfo {
  name: string;
  /** Type as rendered by `format_type`, e.g. `character varying(255)` */
  type: string;
  isNullable: boolean;
  /** Default expression as rendered by `pg_get_expr`, or null */
  defaultValue: string | null;
  /** Identity kind: 'always', 'by_default' or null for plain columns */
  identity: 'always' | 'by_default' | null;
  /** Stored generated column; `defaultValue` then holds the generation expression */
  generated: boolean;
}

/**
 * Constraint types tracked by the planner
 */
export type ConstraintType = 'primary_key' | 'unique' | 'check' | 'foreign_key' | 'exclusion';

/**
 * Constraint metadata from pg_constraint
 */
export interface ConstraintInfo {
  name: string;
  type: ConstraintType;
  /** Definition as rendered by `pg_get_constraintdef` */
  definition: string;
}

/**
 * Index metadata from pg_indexes, excluding indexes that back constraints
 */
export interface IndexInfo {
  name: string;
  /** Full `CREATE INDEX` statement as rendered by pg_indexes.indexdef */
  definition: string;
}

/**
 * One table with everything attached to it
 */
export interface TableSchema {
  schema: string;
  name: string;
  columns: ColumnInfo[];
  constraints: ConstraintInfo[];
  indexes: IndexInfo[];
}

/**
 * Enum type with its labels in sort order
 */
export interface EnumInfo {
  schema: string;
  name: string;
  values: string[];
}

/**
 * Function or procedure
 */
export interface FunctionInfo {
  schema: string;
  name: string;
  kind: 'function' | 'procedure';
  /** Argument list as rendered by `pg_get_function_identity_arguments` */
  identityArguments: string;
  /** Return type as rendered by `pg_get_function_result`, null for procedures */
  result: string | null;
  /** `CREATE OR REPLACE` statement as rendered by `pg_get_functiondef` */
  definition: string;
}

/**
 * The SQL-visible objects of one database at one point in time
 */
export interface SchemaSnapshot {
  schemas: string[];
  enums: EnumInfo[];
  tables: TableSchema[];
  functions: FunctionInfo[];
}

/**
 * One statement of a migration plan
 */
export interface PlannedStatement {
  sql: string;
  /** Drops objects or data, or rewrites column types */
  destructive: boolean;
}
