import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import chalk from 'chalk';
import { createConsoleReporter } from './reporter.js';

const mocks = vi.hoisted(() => {
  const events: string[] = [];
  const spinner = {
    isSpinning: false,
    start() {
      events.push('start');
      this.isSpinning = true;
      return this;
    },
    stop() {
      events.push('stop');
      this.isSpinning = false;
      return this;
    },
  };
  return { events, spinner };
});

vi.mock('./output.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./output.js')>()),
  createContextSpinner: vi.fn(() => mocks.spinner),
}));

describe('createConsoleReporter', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    mocks.events.length = 0;
    mocks.spinner.isSpinning = false;
    errorSpy = vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      mocks.events.push(`warn ${String(message)}`);
    });
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should pause the spinner around a warning', () => {
    const reporter = createConsoleReporter();

    reporter.onState?.('START');
    reporter.warn('[pg-reconcile] CONNECT_FAILED attempt=1/13');

    expect(mocks.events).toEqual(['start', 'stop', 'warn ⚠ [pg-reconcile] CONNECT_FAILED attempt=1/13', 'start']);
  });

  it('should print warnings when no spinner is running', () => {
    const reporter = createConsoleReporter();

    reporter.warn('[pg-reconcile] CONNECTION_LOST');

    expect(mocks.events).toEqual(['warn ⚠ [pg-reconcile] CONNECTION_LOST']);
  });
});
