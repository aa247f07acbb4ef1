// Configuration
export { defineConfig, loadConfigFromEnv } from './config.js';
export type { ConfigOverrides } from './config.js';

// Connections
export {
  createConnectionTarget,
  withDatabase,
  toConnectionString,
  describeTarget,
} from './connection/connection-target.js';
export { ResilientConnector, createConnector } from './connection/connector.js';
export type { Connector, ConnectorOptions } from './connection/connector.js';
export type { DatabaseClient } from './connection/client.js';
export {
  RetryHandler,
  RetryExhaustedError,
  createRetryHandler,
  isRetryableError,
} from './connection/retry-handler.js';
export type { RetryHandlerOptions, RetryResult } from './connection/retry-handler.js';

// Sessions, scratch databases and schema loading
export { SchemaSession, withSchemaSession } from './session/schema-session.js';
export type { Queryable } from './session/schema-session.js';
export {
  EphemeralDatabaseManager,
  createEphemeralDatabaseManager,
  generateTempName,
} from './ephemeral/ephemeral-database.js';
export type { EphemeralDatabaseManagerOptions } from './ephemeral/ephemeral-database.js';
export { SchemaLoader, createSchemaLoader, discoverSqlFiles } from './loader/schema-loader.js';
export type { SchemaLoaderOptions } from './loader/schema-loader.js';

// Diffing
export { Migration, renderScript } from './diff/migration.js';
export type { MigrationOptions } from './diff/migration.js';
export { PostgresDiffEngine, createDiffEngine } from './diff/diff-engine.js';
export type { DiffEngine } from './diff/diff-engine.js';
export { introspect } from './diff/introspection.js';
export { planMigration } from './diff/planner.js';
export type {
  SchemaSnapshot,
  TableSchema,
  ColumnInfo,
  ConstraintInfo,
  ConstraintType,
  IndexInfo,
  EnumInfo,
  FunctionInfo,
  PlannedStatement,
} from './diff/types.js';

// Workflows
export { runSync, isConfirmed } from './workflows/sync.js';
export { runPending } from './workflows/pending.js';
export { createWorkflowContext } from './workflows/context.js';
export type { WorkflowContextOptions } from './workflows/context.js';
export type {
  WorkflowContext,
  WorkflowState,
  Reporter,
  Prompt,
  SyncOptions,
  SyncOutcome,
  SyncResult,
  PendingResult,
} from './workflows/types.js';

// Errors
export {
  ReconcileError,
  ConfigError,
  ConnectionError,
  SchemaLoadError,
  DiffComputationError,
  UnsafeMigrationError,
  ApplyError,
} from './errors.js';
export type { ReconcileErrorCode } from './errors.js';

// Debug
export { ALWAYS_LOGGED_EVENTS, DebugLogger, createDebugLogger } from './debug.js';

// Types
export type {
  ConnectionTarget,
  RetryConfig,
  PathsConfig,
  ApplyConfig,
  EphemeralConfig,
  ReconcileConfig,
  DebugConfig,
  DebugContext,
  DebugEventType,
} from './types.js';
export { DEFAULT_CONFIG } from './types.js';
