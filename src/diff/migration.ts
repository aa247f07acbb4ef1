/**
 * Migration
 *
 * Holds the statements that transform one connected database into another
 * and runs them against the first.
 *
 * @module diff/migration
 */

import type { SchemaSession } from '../session/schema-session.js';
import { ApplyError, DiffComputationError, UnsafeMigrationError, toError } from '../errors.js';
import { DebugLogger } from '../debug.js';
import type { DiffEngine } from './diff-engine.js';
import { createDiffEngine } from './diff-engine.js';
import type { PlannedStatement } from './types.js';

/**
 * Options for creating a migration
 */
export interface MigrationOptions {
  /** Engine used to read and compare schemas (default: PostgresDiffEngine) */
  engine?: DiffEngine;
  /** Refuse plans with destructive statements (default: false) */
  safety?: boolean;
  /** Run `apply()` inside one transaction (default: true) */
  transactional?: boolean;
  /** Logger for applied statements */
  logger?: DebugLogger;
}

/**
 * Render statements as a script: each statement followed by `;` and a blank line
 */
export function renderScript(statements: readonly string[]): string {
  return statements.map((statement) => `${statement};\n\n`).join('');
}

/**
 * The statements transforming `from` into `to`, in the order they must run.
 *
 * @example
 * ```typescript
 * const migration = await Migration.create(live, desired);
 * if (migration.statements.length > 0) {
 *   console.log(migration.sql);
 *   await migration.apply();
 * }
 * ```
 */
export class Migration {
  /** Statements in dependency order */
  readonly statements: readonly string[];

  /** Statements rendered as one script; empty when there is nothing to do */
  readonly sql: string;

  private constructor(
    private readonly target: SchemaSession,
    planned: readonly PlannedStatement[],
    private readonly transactional: boolean,
    private readonly logger: DebugLogger
  ) {
    this.statements = Object.freeze(planned.map((statement) => statement.sql));
    this.sql = renderScript(this.statements);
  }

  /**
   * Compare two databases and plan the statements that make `from` match `to`
   *
   * @throws DiffComputationError when either schema cannot be read or compared
   * @throws UnsafeMigrationError when `safety` is on and the plan is destructive
   */
  static async create(
    from: SchemaSession,
    to: SchemaSession,
    options: MigrationOptions = {}
  ): Promise<Migration> {
    const engine = options.engine ?? createDiffEngine();

    let planned: PlannedStatement[];
    try {
      const current = await engine.introspect(from);
      const desired = await engine.introspect(to);
      planned = engine.plan(current, desired);
    } catch (err) {
      throw new DiffComputationError(
        `Failed to compute schema diff: ${toError(err).message}`,
        err
      );
    }

    if (options.safety) {
      const destructive = planned.filter((statement) => statement.destructive);
      if (destructive.length > 0) {
        throw new UnsafeMigrationError(destructive.map((statement) => statement.sql));
      }
    }

    return new Migration(
      from,
      planned,
      options.transactional ?? true,
      options.logger ?? new DebugLogger()
    );
  }

  /**
   * Run every statement against the `from` database, in order.
   *
   * In transactional mode a failure rolls back everything applied so far.
   * Otherwise statements before the failing one stay applied.
   *
   * @throws ApplyError naming the statement that failed
   */
  async apply(): Promise<void> {
    if (this.statements.length === 0) {
      return;
    }

    if (!this.transactional) {
      for (const statement of this.statements) {
        await this.run(statement, false);
      }
      return;
    }

    try {
      await this.target.execute('BEGIN');
    } catch (err) {
      throw new ApplyError('BEGIN', `Failed to start migration transaction: ${toError(err).message}`, true, err);
    }
    for (const statement of this.statements) {
      await this.run(statement, true);
    }
    try {
      await this.target.execute('COMMIT');
    } catch (err) {
      throw new ApplyError('COMMIT', `Failed to commit migration: ${toError(err).message}`, true, err);
    }
  }

  private async run(statement: string, inTransaction: boolean): Promise<void> {
    const startTime = Date.now();
    try {
      await this.target.execute(statement);
    } catch (err) {
      const rolledBack = inTransaction && (await this.rollback());
      throw new ApplyError(
        statement,
        `Failed to apply statement: ${toError(err).message}`,
        rolledBack,
        err
      );
    }
    this.logger.logStatementApplied(statement, Date.now() - startTime);
  }

  /**
   * @returns Whether the rollback went through
   */
  private async rollback(): Promise<boolean> {
    try {
      await this.target.execute('ROLLBACK');
      return true;
    } catch {
      return false;
    }
  }
}
