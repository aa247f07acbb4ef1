/**
 * Schema Session
 *
 * An open connection bound to one database, used as the "from" or "to" side
 * of a schema comparison and as the target of schema loads.
 *
 * @module session/schema-session
 */

import type { QueryResult, QueryResultRow } from 'pg';
import type { ConnectionTarget } from '../types.js';
import type { Connector } from '../connection/connector.js';
import type { DatabaseClient } from '../connection/client.js';
import { describeTarget } from '../connection/connection-target.js';
import { DebugLogger } from '../debug.js';
import { toError } from '../errors.js';

/**
 * Anything that runs SQL and returns rows
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

/**
 * A live handle on one database
 *
 * @example
 * ```typescript
 * const session = await SchemaSession.open(connector, target);
 * try {
 *   await session.execute('CREATE TABLE t (id int)');
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export class SchemaSession implements Queryable {
  private closed = false;

  constructor(
    readonly target: ConnectionTarget,
    private readonly client: DatabaseClient
  ) {}

  /**
   * Connect to a target and wrap the connection in a session
   */
  static async open(connector: Connector, target: ConnectionTarget): Promise<SchemaSession> {
    const client = await connector.connect(target);
    return new SchemaSession(target, client);
  }

  /**
   * Display form of the bound target (password masked)
   */
  get description(): string {
    return describeTarget(this.target);
  }

  /**
   * Whether `close()` has been called
   */
  get isClosed(): boolean {
    return this.closed;
  }

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>> {
    if (this.closed) {
      return Promise.reject(new Error(`Session for ${this.description} is closed`));
    }
    return this.client.query<R>(text, values);
  }

  /**
   * Run SQL text, discarding any rows. Multi-statement text runs as one batch.
   */
  async execute(sql: string): Promise<void> {
    await this.query(sql);
  }

  /**
   * Close the underlying connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.end();
  }
}

/**
 * Open a session for the duration of `fn`, closing it on every exit path.
 *
 * When `fn` throws, its error is rethrown and a failure to close is only
 * logged.
 */
export async function withSchemaSession<T>(
  connector: Connector,
  target: ConnectionTarget,
  fn: (session: SchemaSession) => Promise<T>,
  logger: DebugLogger = new DebugLogger()
): Promise<T> {
  const session = await SchemaSession.open(connector, target);

  let result: T;
  try {
    result = await fn(session);
  } catch (err) {
    await session.close().catch((closeError: unknown) => {
      logger.logCloseFailed(session.description, toError(closeError));
    });
    throw err;
  }

  await session.close();
  return result;
}
