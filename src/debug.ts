import type { DebugConfig, DebugContext, DebugEventType } from './types.js';

const PREFIX = '[pg-reconcile]';
const MAX_STATEMENT_LENGTH = 200;

/**
 * Events logged whether or not debug logging is enabled
 */
export const ALWAYS_LOGGED_EVENTS: ReadonlySet<DebugEventType> = new Set<DebugEventType>([
  'connect_failed',
  'connection_lost',
  'connection_close_failed',
  'ephemeral_teardown_failed',
]);

/**
 * Debug logger for pg-reconcile
 * Provides structured logging for connection attempts, scratch database
 * lifecycle and migration progress. Logging never changes control flow.
 */
export class DebugLogger {
  private readonly enabled: boolean;
  private readonly logStatements: boolean;
  private readonly logger: (message: string, context?: DebugContext) => void;

  constructor(config?: DebugConfig) {
    this.enabled = config?.enabled ?? false;
    this.logStatements = config?.logStatements ?? true;
    this.logger = config?.logger ?? this.defaultLogger;
  }

  /**
   * Check if debug mode is enabled
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log a connection attempt
   */
  logConnectAttempt(target: string, attempt: number, maxAttempts: number): void {
    if (!this.enabled) return;

    this.emit(`${PREFIX} CONNECT target=${target} attempt=${attempt}/${maxAttempts}`, {
      type: 'connect_attempt',
      target,
      attempt,
      maxAttempts,
    });
  }

  /**
   * Log a failed connection attempt.
   * Emitted even when debug logging is disabled.
   */
  logConnectFailed(
    target: string,
    attempt: number,
    maxAttempts: number,
    error: Error,
    retryInMs: number | null
  ): void {
    const retry = retryInMs === null ? 'giving up' : `retrying in ${retryInMs}ms`;
    this.emit(
      `${PREFIX} CONNECT_FAILED target=${target} attempt=${attempt}/${maxAttempts} error="${error.message}" ${retry}`,
      {
        type: 'connect_failed',
        target,
        attempt,
        maxAttempts,
        error: error.message,
      }
    );
  }

  /**
   * Log a successful connection
   */
  logConnected(target: string, attempt: number, durationMs: number): void {
    if (!this.enabled) return;

    this.emit(`${PREFIX} CONNECTED target=${target} attempt=${attempt} duration=${durationMs}ms`, {
      type: 'connect_succeeded',
      target,
      attempt,
      durationMs,
    });
  }

  /**
   * Log an open connection whose backend went away.
   * Emitted even when debug logging is disabled.
   */
  logConnectionLost(target: string, error: Error): void {
    this.emit(`${PREFIX} CONNECTION_LOST target=${target} error="${error.message}"`, {
      type: 'connection_lost',
      target,
      error: error.message,
    });
  }

  /**
   * Log a connection that failed to close after an earlier error.
   * Emitted even when debug logging is disabled.
   */
  logCloseFailed(target: string, error: Error): void {
    this.emit(`${PREFIX} CONNECTION_CLOSE_FAILED target=${target} error="${error.message}"`, {
      type: 'connection_close_failed',
      target,
      error: error.message,
    });
  }

  /**
   * Log scratch database creation
   */
  logEphemeralCreated(database: string): void {
    if (!this.enabled) return;

    this.emit(`${PREFIX} EPHEMERAL_CREATED database=${database}`, {
      type: 'ephemeral_created',
      database,
    });
  }

  /**
   * Log scratch database removal
   */
  logEphemeralDropped(database: string, durationMs: number): void {
    if (!this.enabled) return;

    this.emit(`${PREFIX} EPHEMERAL_DROPPED database=${database} duration=${durationMs}ms`, {
      type: 'ephemeral_dropped',
      database,
      durationMs,
    });
  }

  /**
   * Log a teardown failure that could not be rethrown.
   * Emitted even when debug logging is disabled.
   */
  logEphemeralTeardownFailed(database: string, error: Error): void {
    this.emit(`${PREFIX} EPHEMERAL_TEARDOWN_FAILED database=${database} error="${error.message}"`, {
      type: 'ephemeral_teardown_failed',
      database,
      error: error.message,
    });
  }

  /**
   * Log a schema file applied to a database
   */
  logSchemaFileLoaded(file: string, durationMs: number): void {
    if (!this.enabled) return;

    this.emit(`${PREFIX} SCHEMA_FILE_LOADED file=${file} duration=${durationMs}ms`, {
      type: 'schema_file_loaded',
      file,
      durationMs,
    });
  }

  /**
   * Log a migration statement applied to the target database
   */
  logStatementApplied(statement: string, durationMs: number): void {
    if (!this.enabled || !this.logStatements) return;

    const truncated = this.truncateStatement(statement);
    this.emit(`${PREFIX} STATEMENT_APPLIED statement="${truncated}" duration=${durationMs}ms`, {
      type: 'statement_applied',
      statement: truncated,
      durationMs,
    });
  }

  private emit(message: string, context: DebugContext): void {
    this.logger(message, context);
  }

  /**
   * Collapse whitespace and cut long statements
   */
  private truncateStatement(statement: string): string {
    const normalized = statement.replace(/\s+/g, ' ').trim();
    if (normalized.length <= MAX_STATEMENT_LENGTH) {
      return normalized;
    }
    return normalized.substring(0, MAX_STATEMENT_LENGTH - 3) + '...';
  }

  private defaultLogger(message: string, _context?: DebugContext): void {
    console.log(message);
  }
}

/**
 * Create a debug logger instance
 */
export function createDebugLogger(config?: DebugConfig): DebugLogger {
  return new DebugLogger(config);
}
