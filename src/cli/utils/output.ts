import ora from 'ora';
import chalk from 'chalk';

/**
 * Output context for CLI commands
 * Controls TTY detection, verbosity, and colors
 */
export interface OutputContext {
  /** Whether stdout is a TTY (interactive terminal) */
  isInteractive: boolean;
  /** Show verbose/debug output */
  verbose: boolean;
  /** Only show errors (quiet mode) */
  quiet: boolean;
  /** Disable colors in output */
  noColor: boolean;
}

/**
 * The part of an ora spinner the commands use
 */
export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  readonly isSpinning: boolean;
}

// Global output context - initialized with defaults
let globalContext: OutputContext = {
  isInteractive: process.stdout.isTTY ?? false,
  verbose: false,
  quiet: false,
  noColor: false,
};

/**
 * Initialize the output context from CLI options
 */
export function initOutputContext(options: {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
}): void {
  globalContext = {
    isInteractive: process.stdout.isTTY ?? false,
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
    noColor: options.noColor ?? !process.stdout.isTTY,
  };

  // Disable chalk colors if noColor is set
  if (globalContext.noColor) {
    chalk.level = 0;
  }
}

/**
 * Check if we should show interactive elements (spinners)
 */
export function shouldShowInteractive(): boolean {
  return globalContext.isInteractive && !globalContext.quiet;
}

/**
 * Check if we should show regular log output
 */
export function shouldShowLog(): boolean {
  return !globalContext.quiet;
}

/**
 * Check if we should show verbose/debug output
 */
export function shouldShowVerbose(): boolean {
  return globalContext.verbose;
}

const noopSpinner: Spinner = {
  start: () => noopSpinner,
  stop: () => noopSpinner,
  isSpinning: false,
};

/**
 * Create a spinner that respects output context
 * Returns a no-op spinner if not in interactive mode
 */
export function createContextSpinner(text: string): Spinner {
  if (!shouldShowInteractive()) {
    return noopSpinner;
  }

  return ora({
    text,
    color: 'cyan',
  });
}

/**
 * Log a message if not in quiet mode
 */
export function log(message: string): void {
  if (shouldShowLog()) {
    console.log(message);
  }
}

/**
 * Log a verbose/debug message
 */
export function debug(message: string): void {
  if (shouldShowVerbose()) {
    console.log(chalk.dim(`[debug] ${message}`));
  }
}

/**
 * Log an error message (always shown)
 */
export function logError(message: string): void {
  console.error(chalk.red('✗ ') + message);
}

/**
 * Log a warning (shown even in quiet mode)
 */
export function logWarning(message: string): void {
  console.error(chalk.yellow('⚠ ') + message);
}

/**
 * Format success message
 */
export function success(message: string): string {
  return chalk.green('✓ ') + message;
}

/**
 * Format error message
 */
export function error(message: string): string {
  return chalk.red('✗ ') + message;
}

/**
 * Format warning message
 */
export function warning(message: string): string {
  return chalk.yellow('⚠ ') + message;
}

/**
 * Format dim text
 */
export function dim(message: string): string {
  return chalk.dim(message);
}

/**
 * Format cyan text
 */
export function cyan(message: string): string {
  return chalk.cyan(message);
}
