import type { Client, QueryResult, QueryResultRow } from 'pg';

/**
 * The subset of a PostgreSQL client the orchestrator relies on.
 *
 * Kept narrow so tests can hand in an in-process fake.
 */
export interface DatabaseClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
  escapeIdentifier(value: string): string;
  escapeLiteral(value: string): string;
  end(): Promise<void>;
}

/**
 * DatabaseClient backed by a connected pg Client.
 *
 * A backend terminated while the client sits idle is reported through
 * `onError`; queries issued afterwards reject.
 */
export class PgDatabaseClient implements DatabaseClient {
  private lostWith: Error | null = null;

  constructor(
    private readonly client: Client,
    onError?: (error: Error) => void
  ) {
    client.on('error', (error) => {
      this.lostWith = error;
      onError?.(error);
    });
  }

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>> {
    if (this.lostWith) {
      return Promise.reject(new Error(`Connection lost: ${this.lostWith.message}`, { cause: this.lostWith }));
    }
    return this.client.query<R>(text, values);
  }

  escapeIdentifier(value: string): string {
    return this.client.escapeIdentifier(value);
  }

  escapeLiteral(value: string): string {
    return this.client.escapeLiteral(value);
  }

  end(): Promise<void> {
    // The socket is already gone; pg would wait for an 'end' that never comes.
    if (this.lostWith) {
      return Promise.resolve();
    }
    return this.client.end();
  }
}
