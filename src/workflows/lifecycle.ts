import type { Reporter, WorkflowState } from './types.js';

/**
 * Reports the state transitions of one workflow run.
 *
 * `run` brackets the body with START and DONE, or FAILED when the body
 * throws. EPHEMERAL_RELEASED is reported once the scratch databases are gone,
 * which is when the body has settled.
 */
export class WorkflowLifecycle {
  private acquired = false;

  constructor(private readonly reporter: Reporter) {}

  enter(state: WorkflowState): void {
    if (state === 'EPHEMERAL_ACQUIRED') {
      this.acquired = true;
    }
    this.reporter.onState?.(state);
  }

  async run<T>(body: () => Promise<T>): Promise<T> {
    this.enter('START');

    let result: T;
    try {
      result = await body();
    } catch (err) {
      if (this.acquired) {
        this.enter('EPHEMERAL_RELEASED');
      }
      this.enter('FAILED');
      throw err;
    }

    this.enter('EPHEMERAL_RELEASED');
    this.enter('DONE');
    return result;
  }
}
