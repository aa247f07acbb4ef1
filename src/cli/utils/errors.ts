import { error, dim, cyan } from './output.js';
import {
  ApplyError,
  ConfigError,
  ConnectionError,
  DiffComputationError,
  ReconcileError,
  SchemaLoadError,
  UnsafeMigrationError,
  toError,
} from '../../errors.js';

/**
 * CLI Error with actionable suggestions
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly example?: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines: string[] = [error(this.message)];

    if (this.suggestion) {
      lines.push('');
      lines.push(dim('  Suggestion: ') + this.suggestion);
    }

    if (this.example) {
      lines.push('');
      lines.push(dim('  Example:'));
      lines.push(cyan('    ' + this.example));
    }

    return lines.join('\n');
  }
}

/**
 * Common CLI errors with pre-defined suggestions
 */
export const CLIErrors = {
  invalidConfig: (reason: string) =>
    new CLIError(
      reason,
      'Check the DB_* and path environment variables or the matching command-line options',
      'DB_HOST=localhost DB_PORT=5432 pg-reconcile sync'
    ),

  connectionFailed: (reason: string) =>
    new CLIError(
      `Database connection failed: ${reason}`,
      'Check DB_HOST, DB_PORT, DB_USER and DB_PASS and ensure the database is running',
      'pg-reconcile sync --host localhost --port 5432'
    ),

  schemaLoadFailed: (file: string, reason: string) =>
    new CLIError(
      reason,
      `Fix the SQL in ${file} and run the task again`
    ),

  unsafeMigration: (statements: readonly string[]) =>
    new CLIError(
      `Refusing to generate ${statements.length} destructive statement(s)`,
      `First one: ${statements[0] ?? ''}`
    ),

  diffFailed: (reason: string) =>
    new CLIError(
      reason,
      'Check that the database user can read the system catalogs'
    ),

  applyFailed: (statement: string, reason: string, rolledBack: boolean) =>
    new CLIError(
      reason,
      rolledBack
        ? 'No changes were kept. Fix the models and run sync again'
        : 'Statements before the failing one were applied. Inspect the database before running sync again',
      statement
    ),

  /**
   * Create a custom CLI error
   */
  create: (message: string, suggestion?: string, example?: string) =>
    new CLIError(message, suggestion, example),
};

/**
 * Map any thrown value to a CLIError
 */
export function toCLIError(err: unknown): CLIError {
  if (err instanceof CLIError) return err;
  if (err instanceof Error && err.name === 'ExitPromptError') {
    return new CLIError('Prompt cancelled', undefined, undefined, 130);
  }
  if (err instanceof ConfigError) return CLIErrors.invalidConfig(err.message);
  if (err instanceof ConnectionError) return CLIErrors.connectionFailed(err.message);
  if (err instanceof SchemaLoadError) return CLIErrors.schemaLoadFailed(err.file, err.message);
  if (err instanceof UnsafeMigrationError) return CLIErrors.unsafeMigration(err.statements);
  if (err instanceof DiffComputationError) return CLIErrors.diffFailed(err.message);
  if (err instanceof ApplyError) return CLIErrors.applyFailed(err.statement, err.message, err.rolledBack);
  if (err instanceof ReconcileError) return CLIErrors.create(err.message);
  return CLIErrors.create(toError(err).message);
}

/**
 * Handle an error and exit the process
 */
export function handleError(err: unknown): never {
  const cliError = toCLIError(err);
  console.error(cliError.format());
  process.exit(cliError.exitCode);
}
