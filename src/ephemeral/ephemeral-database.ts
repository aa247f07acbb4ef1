/**
 * Ephemeral Database Manager
 *
 * Creates uniquely named scratch databases and guarantees their removal.
 *
 * @module ephemeral/ephemeral-database
 */

import { randomInt } from 'node:crypto';
import type { ConnectionTarget } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';
import type { Connector } from '../connection/connector.js';
import type { DatabaseClient } from '../connection/client.js';
import { describeTarget, withDatabase } from '../connection/connection-target.js';
import { DebugLogger } from '../debug.js';
import { toError } from '../errors.js';

const LETTERS = 'abcdefghijklmnopqrstuvwxyz';
const SUFFIX_LENGTH = 10;

/**
 * Generate a scratch database name: the prefix followed by 10 random
 * lowercase letters
 *
 * @param prefix - Name prefix
 * @param pick - Returns an integer in `[0, max)`
 *
 * @example
 * ```typescript
 * generateTempName('temp_db'); // 'temp_dbqwhzkeuyto'
 * ```
 */
export function generateTempName(
  prefix: string = DEFAULT_CONFIG.ephemeral.prefix,
  pick: (max: number) => number = randomInt
): string {
  let suffix = '';
  for (let i = 0; i < SUFFIX_LENGTH; i++) {
    suffix += LETTERS.charAt(pick(LETTERS.length));
  }
  return prefix + suffix;
}

/**
 * Options for the ephemeral database manager
 */
export interface EphemeralDatabaseManagerOptions {
  /** Connector used for the administrative connection */
  connector: Connector;
  /** Administrative database on the server that hosts scratch databases */
  adminTarget: ConnectionTarget;
  /** Name prefix (default: 'temp_db') */
  prefix?: string;
  /** Logger for lifecycle events */
  logger?: DebugLogger;
  /** Random source, replaceable in tests */
  pick?: (max: number) => number;
}

/**
 * One scratch database and the admin connection that created it
 */
class Acquisition {
  private teardown: Promise<void> | null = null;

  constructor(
    readonly name: string,
    readonly target: ConnectionTarget,
    private readonly admin: DatabaseClient,
    private readonly logger: DebugLogger
  ) {}

  get released(): boolean {
    return this.teardown !== null;
  }

  /**
   * Drop the database. Every call after the first returns the first call's promise.
   */
  release(): Promise<void> {
    this.teardown ??= this.drop();
    return this.teardown;
  }

  private async drop(): Promise<void> {
    const startTime = Date.now();
    const identifier = this.admin.escapeIdentifier(this.name);

    await this.admin.query(`REVOKE CONNECT ON DATABASE ${identifier} FROM PUBLIC`);
    await this.admin.query(
      `SELECT pg_terminate_backend(pg_stat_activity.pid)
       FROM pg_stat_activity
       WHERE pg_stat_activity.datname = ${this.admin.escapeLiteral(this.name)}
         AND pid <> pg_backend_pid()`
    );
    await this.admin.query(`DROP DATABASE ${identifier}`);

    this.logger.logEphemeralDropped(this.name, Date.now() - startTime);
  }
}

/**
 * Manages scratch databases used to host schemas for diffing.
 *
 * Each call to `withEphemeralDatabase` creates its own database and its own
 * administrative connection; nothing is shared between calls. The database is
 * dropped when the callback settles, whether it resolved or threw.
 *
 * @example
 * ```typescript
 * const manager = new EphemeralDatabaseManager({
 *   connector,
 *   adminTarget: config.database,
 * });
 *
 * await manager.withEphemeralDatabase(async (target) => {
 *   await withSchemaSession(connector, target, async (session) => {
 *     await session.execute('CREATE TABLE t (id int)');
 *   });
 * });
 * ```
 */
export class EphemeralDatabaseManager {
  private readonly connector: Connector;
  private readonly adminTarget: ConnectionTarget;
  private readonly prefix: string;
  private readonly logger: DebugLogger;
  private readonly pick: (max: number) => number;
  private readonly live = new Set<Acquisition>();

  constructor(options: EphemeralDatabaseManagerOptions) {
    this.connector = options.connector;
    this.adminTarget = options.adminTarget;
    this.prefix = options.prefix ?? DEFAULT_CONFIG.ephemeral.prefix;
    this.logger = options.logger ?? new DebugLogger();
    this.pick = options.pick ?? randomInt;
  }

  /**
   * Create a scratch database, run `fn` against it, then drop it.
   *
   * If creation fails nothing is passed to `fn` and nothing is torn down.
   * If `fn` throws, the database is still dropped and `fn`'s error is
   * rethrown; a teardown failure in that case is logged rather than raised.
   *
   * @returns Whatever `fn` resolves to
   */
  async withEphemeralDatabase<T>(fn: (target: ConnectionTarget) => Promise<T>): Promise<T> {
    const admin = await this.connector.connect(this.adminTarget);

    let result: T;
    try {
      result = await this.runWithDatabase(admin, fn);
    } catch (err) {
      await admin.end().catch((closeError: unknown) => {
        this.logger.logCloseFailed(describeTarget(this.adminTarget), toError(closeError));
      });
      throw err;
    }

    await admin.end();
    return result;
  }

  /**
   * Drop every scratch database that is still in use.
   *
   * Intended for signal handlers: the callbacks holding these databases are
   * left to fail on their own.
   */
  async releaseAll(): Promise<void> {
    const pending = Array.from(this.live, (acquisition) => acquisition.release());
    const results = await Promise.allSettled(pending);
    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );

    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => toError(failure.reason)),
        `Failed to drop ${failures.length} scratch database(s)`
      );
    }
  }

  /**
   * Names of scratch databases not yet released
   */
  get activeDatabases(): string[] {
    return Array.from(this.live)
      .filter((acquisition) => !acquisition.released)
      .map((acquisition) => acquisition.name);
  }

  private async runWithDatabase<T>(
    admin: DatabaseClient,
    fn: (target: ConnectionTarget) => Promise<T>
  ): Promise<T> {
    const acquisition = await this.create(admin);
    this.live.add(acquisition);

    try {
      let result: T;
      try {
        result = await fn(acquisition.target);
      } catch (err) {
        await acquisition.release().catch((teardownError: unknown) => {
          this.logger.logEphemeralTeardownFailed(acquisition.name, toError(teardownError));
        });
        throw err;
      }

      await acquisition.release();
      return result;
    } finally {
      this.live.delete(acquisition);
    }
  }

  private async create(admin: DatabaseClient): Promise<Acquisition> {
    const name = generateTempName(this.prefix, this.pick);

    await admin.query(`CREATE DATABASE ${admin.escapeIdentifier(name)}`);
    this.logger.logEphemeralCreated(name);

    return new Acquisition(name, withDatabase(this.adminTarget, name), admin, this.logger);
  }
}

/**
 * Create an ephemeral database manager
 */
export function createEphemeralDatabaseManager(
  options: EphemeralDatabaseManagerOptions
): EphemeralDatabaseManager {
  return new EphemeralDatabaseManager(options);
}
