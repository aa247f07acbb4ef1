import type { ReconcileConfig } from '../types.js';
import type { Connector } from '../connection/connector.js';
import type { EphemeralDatabaseManager } from '../ephemeral/ephemeral-database.js';
import type { SchemaLoader } from '../loader/schema-loader.js';
import type { DiffEngine } from '../diff/diff-engine.js';
import type { DebugLogger } from '../debug.js';

/**
 * Steps a workflow passes through, reported in order to `Reporter.onState`
 */
export type WorkflowState =
  | 'START'
  | 'EPHEMERAL_ACQUIRED'
  | 'SCHEMAS_LOADED'
  | 'DIFF_COMPUTED'
  | 'APPLIED'
  | 'WRITTEN'
  | 'SKIPPED'
  | 'EPHEMERAL_RELEASED'
  | 'DONE'
  | 'FAILED';

/**
 * Receives operator-facing output of a workflow
 */
export interface Reporter {
  /** A line of progress or outcome text */
  info(message: string): void;
  /** A migration script */
  sql(script: string): void;
  /** State transitions */
  onState?(state: WorkflowState): void;
}

/**
 * Asks the operator a question and resolves with the raw answer
 */
export type Prompt = (question: string) => Promise<string>;

/**
 * Everything a workflow needs, built once by the caller
 */
export interface WorkflowContext {
  config: ReconcileConfig;
  connector: Connector;
  ephemeral: EphemeralDatabaseManager;
  loader: SchemaLoader;
  engine: DiffEngine;
  prompt: Prompt;
  reporter: Reporter;
  logger: DebugLogger;
}

/**
 * Options for the sync workflow
 */
export interface SyncOptions {
  /** Apply without asking (default: false) */
  noPrompt?: boolean;
}

/**
 * How a sync run ended
 *
 * - synced: nothing to do
 * - applied: statements were applied to the live database
 * - declined: the operator answered anything but `y`
 */
export type SyncOutcome = 'synced' | 'applied' | 'declined';

/**
 * Result of the sync workflow
 */
export interface SyncResult {
  outcome: SyncOutcome;
  statements: readonly string[];
}

/**
 * Result of the pending workflow
 */
export interface PendingResult {
  statements: readonly string[];
  /** File the script was written to */
  outputPath: string;
}
