/**
 * Error types for pg-reconcile operations.
 *
 * Every failure surfaced by the library extends `ReconcileError` and carries a
 * machine-readable `code` so the CLI can map it to a suggestion.
 *
 * @module errors
 */

export type ReconcileErrorCode =
  | 'CONFIG_INVALID'
  | 'CONNECTION_FAILED'
  | 'SCHEMA_LOAD_FAILED'
  | 'DIFF_FAILED'
  | 'UNSAFE_MIGRATION'
  | 'APPLY_FAILED';

/**
 * Base error class for all pg-reconcile errors
 */
export class ReconcileError extends Error {
  /** Machine-readable error code */
  readonly code: ReconcileErrorCode;

  constructor(code: ReconcileErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ReconcileError';
    this.code = code;
  }
}

/**
 * Thrown when configuration values are missing or malformed
 */
export class ConfigError extends ReconcileError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a database connection cannot be established after all retries
 */
export class ConnectionError extends ReconcileError {
  /** Number of attempts made before giving up */
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
    this.attempts = attempts;
  }
}

/**
 * Thrown when a schema file cannot be read or executed
 */
export class SchemaLoadError extends ReconcileError {
  /** File (or folder) that failed to load */
  readonly file: string;

  constructor(file: string, message: string, cause?: unknown) {
    super('SCHEMA_LOAD_FAILED', message, cause);
    this.name = 'SchemaLoadError';
    this.file = file;
  }
}

/**
 * Thrown when the diff engine fails to compare two schemas
 */
export class DiffComputationError extends ReconcileError {
  constructor(message: string, cause?: unknown, code: ReconcileErrorCode = 'DIFF_FAILED') {
    super(code, message, cause);
    this.name = 'DiffComputationError';
  }
}

/**
 * Thrown when safety checks are on and the planned migration is destructive
 */
export class UnsafeMigrationError extends DiffComputationError {
  /** The destructive statements that tripped the check */
  readonly statements: readonly string[];

  constructor(statements: readonly string[]) {
    super(
      `Migration contains ${statements.length} destructive statement(s); disable safety to generate them`,
      undefined,
      'UNSAFE_MIGRATION'
    );
    this.name = 'UnsafeMigrationError';
    this.statements = statements;
  }
}

/**
 * Thrown when a generated statement fails against the target database
 */
export class ApplyError extends ReconcileError {
  /** The statement that failed */
  readonly statement: string;

  /** Whether earlier statements were rolled back */
  readonly rolledBack: boolean;

  constructor(statement: string, message: string, rolledBack: boolean, cause?: unknown) {
    super('APPLY_FAILED', message, cause);
    this.name = 'ApplyError';
    this.statement = statement;
    this.rolledBack = rolledBack;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
