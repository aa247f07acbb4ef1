import type { EphemeralDatabaseManager } from '../../ephemeral/ephemeral-database.js';
import { toError } from '../../errors.js';
import { log, logError } from './output.js';

/**
 * Exit codes for interrupted runs, 128 + signal number
 */
export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

const managers = new Set<EphemeralDatabaseManager>();

/**
 * Register a manager whose scratch databases must be dropped on interrupt
 */
export function trackEphemeralManager(manager: EphemeralDatabaseManager): void {
  managers.add(manager);
}

/**
 * Drop the scratch databases of every tracked manager
 */
export async function releaseTracked(): Promise<void> {
  const results = await Promise.allSettled(Array.from(managers, (manager) => manager.releaseAll()));
  const failures = results.filter(
    (result): result is PromiseRejectedResult => result.status === 'rejected'
  );
  if (failures.length > 0) {
    throw new AggregateError(
      failures.map((failure) => toError(failure.reason)),
      'Failed to drop scratch databases'
    );
  }
}

async function shutdown(signal: keyof typeof SIGNAL_EXIT_CODES): Promise<never> {
  log(`\nReceived ${signal}, dropping scratch databases...`);
  try {
    await releaseTracked();
  } catch (err) {
    logError(toError(err).message);
  }
  process.exit(SIGNAL_EXIT_CODES[signal]);
}

/**
 * Drop live scratch databases on SIGINT/SIGTERM, then exit with 130/143
 */
export function installSignalHandlers(): void {
  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
