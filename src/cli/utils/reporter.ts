import type { Reporter, WorkflowState } from '../../workflows/types.js';
import { createContextSpinner, dim, log, logWarning, success, warning } from './output.js';
import type { Spinner } from './output.js';

const SPINNER_TEXT: Partial<Record<WorkflowState, string>> = {
  START: 'Creating scratch database...',
  SCHEMAS_LOADED: 'Computing schema diff...',
};

const OUTCOME_FORMAT: Record<string, (message: string) => string> = {
  'Already synced.': success,
  'Changes applied.': success,
  'Not applying.': warning,
};

/**
 * Terminal reporter that can also interleave warnings with its spinner
 */
export interface ConsoleReporter extends Reporter {
  /** Print a warning without leaving the spinner drawn over it */
  warn(message: string): void;
}

/**
 * Reporter printing workflow output to the terminal, with a spinner while
 * scratch databases are created and schemas compared
 */
export function createConsoleReporter(): ConsoleReporter {
  let spinner: Spinner | null = null;

  const stopSpinner = (): void => {
    if (spinner?.isSpinning) {
      spinner.stop();
    }
    spinner = null;
  };

  return {
    info(message) {
      stopSpinner();
      const format = OUTCOME_FORMAT[message];
      log(format ? format(message) : message);
    },

    sql(script) {
      stopSpinner();
      log('');
      log(dim(script.trimEnd()));
      log('');
    },

    warn(message) {
      const active = spinner?.isSpinning ? spinner : null;
      active?.stop();
      logWarning(message);
      active?.start();
    },

    onState(state) {
      stopSpinner();
      const text = SPINNER_TEXT[state];
      if (text) {
        spinner = createContextSpinner(text).start();
      }
    },
  };
}
