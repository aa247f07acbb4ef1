/**
 * Connection settings for one PostgreSQL database.
 *
 * Values of this shape are frozen once created, see `createConnectionTarget`.
 */
export interface ConnectionTarget {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
}

/**
 * Retry configuration for connection attempts
 */
export interface RetryConfig {
  /** Total number of attempts, the first one included (default: 13) */
  maxAttempts: number;
  /** Delay between attempts in milliseconds (default: 5000) */
  delayMs: number;
  /**
   * Only retry errors classified as transient by `isRetryableError`.
   * When false every connection failure is retried (default: false)
   */
  transientOnly: boolean;
}

/**
 * File system locations used by the workflows
 */
export interface PathsConfig {
  /** Folder holding the application schema as .sql files */
  modelsFolder: string;
  /** SQL dump of the production schema */
  productionSnapshot: string;
  /** Output file for the pending migration */
  pendingOutput: string;
}

/**
 * Options applied when a migration is run against a database
 */
export interface ApplyConfig {
  /** Wrap all statements in one transaction (default: true) */
  transactional: boolean;
}

/**
 * Options for scratch databases
 */
export interface EphemeralConfig {
  /** Name prefix for scratch databases (default: 'temp_db') */
  prefix: string;
}

/**
 * Complete configuration for a pg-reconcile run.
 *
 * Built once at process start and passed explicitly to every workflow.
 */
export interface ReconcileConfig {
  readonly database: ConnectionTarget;
  readonly paths: Readonly<PathsConfig>;
  readonly retry: Readonly<RetryConfig>;
  readonly apply: Readonly<ApplyConfig>;
  readonly ephemeral: Readonly<EphemeralConfig>;
}

/**
 * Debug configuration
 */
export interface DebugConfig {
  /** Enable debug logging (default: false) */
  enabled?: boolean;
  /** Log every statement executed by `apply()` (default: true) */
  logStatements?: boolean;
  /** Custom logger function */
  logger?: (message: string, context?: DebugContext) => void;
}

/**
 * Events reported to the debug logger
 */
export type DebugEventType =
  | 'connect_attempt'
  | 'connect_failed'
  | 'connect_succeeded'
  | 'connection_lost'
  | 'connection_close_failed'
  | 'ephemeral_created'
  | 'ephemeral_dropped'
  | 'ephemeral_teardown_failed'
  | 'schema_file_loaded'
  | 'statement_applied';

/**
 * Debug context passed along with every log line
 */
export interface DebugContext {
  type: DebugEventType;
  target?: string;
  database?: string;
  attempt?: number;
  maxAttempts?: number;
  durationMs?: number;
  error?: string;
  file?: string;
  statement?: string;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  database: {
    host: 'localhost',
    port: 5432,
    user: 'test',
    password: 'pass',
    database: 'dev',
  },
  paths: {
    modelsFolder: 'src/models',
    productionSnapshot: 'migrations/production.dump.sql',
    pendingOutput: 'migrations/pending.sql',
  },
  retry: {
    maxAttempts: 13,
    delayMs: 5_000,
    transientOnly: false,
  },
  apply: {
    transactional: true,
  },
  ephemeral: {
    prefix: 'temp_db',
  },
} as const;
