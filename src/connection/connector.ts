/**
 * Resilient Connector
 *
 * Opens PostgreSQL connections, retrying while the server is unreachable.
 *
 * @module connection/connector
 */

import pg from 'pg';
import type { Client, ClientConfig } from 'pg';
import type { ConnectionTarget, RetryConfig } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';
import { ConnectionError } from '../errors.js';
import { DebugLogger } from '../debug.js';
import { RetryExhaustedError, RetryHandler } from './retry-handler.js';
import { PgDatabaseClient } from './client.js';
import type { DatabaseClient } from './client.js';
import { describeTarget, toClientConfig } from './connection-target.js';

/**
 * Anything able to open a connection to a target
 */
export interface Connector {
  connect(target: ConnectionTarget): Promise<DatabaseClient>;
}

/**
 * Options for the resilient connector
 */
export interface ConnectorOptions {
  /** Retry budget and delay */
  retry?: Partial<RetryConfig>;
  /** Logger receiving attempt and failure events */
  logger?: DebugLogger;
  /** Builds the pg client for a target */
  clientFactory?: (config: ClientConfig) => Client;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Connects to PostgreSQL, retrying failed attempts with a fixed delay.
 *
 * With the defaults a connection is attempted 13 times (1 initial attempt and
 * 12 retries, 5 seconds apart) before `ConnectionError` is thrown. The
 * connector keeps no per-call state, so concurrent calls for independent
 * targets do not interfere.
 *
 * @example
 * ```typescript
 * const connector = new ResilientConnector({ retry: config.retry, logger });
 * const client = await connector.connect(config.database);
 * try {
 *   await client.query('SELECT 1');
 * } finally {
 *   await client.end();
 * }
 * ```
 */
export class ResilientConnector implements Connector {
  private readonly retry: RetryConfig;
  private readonly logger: DebugLogger;
  private readonly clientFactory: (config: ClientConfig) => Client;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: ConnectorOptions = {}) {
    this.retry = {
      maxAttempts: options.retry?.maxAttempts ?? DEFAULT_CONFIG.retry.maxAttempts,
      delayMs: options.retry?.delayMs ?? DEFAULT_CONFIG.retry.delayMs,
      transientOnly: options.retry?.transientOnly ?? DEFAULT_CONFIG.retry.transientOnly,
    };
    this.logger = options.logger ?? new DebugLogger();
    this.clientFactory = options.clientFactory ?? ((config) => new pg.Client(config));
    this.sleep = options.sleep;
  }

  /**
   * Open a connection to the target
   *
   * @throws ConnectionError once every attempt has failed
   */
  async connect(target: ConnectionTarget): Promise<DatabaseClient> {
    const display = describeTarget(target);
    const handler = new RetryHandler({
      ...this.retry,
      sleep: this.sleep,
      onAttempt: (attempt, maxAttempts) => {
        this.logger.logConnectAttempt(display, attempt, maxAttempts);
      },
      onFailure: (attempt, error, delayMs) => {
        this.logger.logConnectFailed(display, attempt, this.retry.maxAttempts, error, delayMs);
      },
    });

    try {
      const { result, attempts, totalTimeMs } = await handler.withRetry(async () => {
        const client = this.clientFactory(toClientConfig(target));
        await client.connect();
        return client;
      });

      this.logger.logConnected(display, attempts, totalTimeMs);
      return new PgDatabaseClient(result, (error) => this.logger.logConnectionLost(display, error));
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new ConnectionError(
          err.exhausted
            ? `Max number of connection attempts has been reached (${this.retry.maxAttempts - 1})`
            : `Could not connect to ${display}: ${err.lastError.message}`,
          err.attempts,
          err.lastError
        );
      }
      throw err;
    }
  }
}

/**
 * Create a resilient connector
 */
export function createConnector(options?: ConnectorOptions): ResilientConnector {
  return new ResilientConnector(options);
}
