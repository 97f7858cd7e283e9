import type { Logger } from '@relay/utils';

/**
 * Registry of conversions started but not yet finished, so shutdown can
 * wait for them instead of cutting uploads off.
 */
export class TaskTracker {
  private readonly tasks = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get size(): number {
    return this.tasks.size;
  }

  track(task: Promise<unknown>): void {
    const tracked: Promise<void> = task.then(
      () => {
        this.tasks.delete(tracked);
      },
      (error: unknown) => {
        this.tasks.delete(tracked);
        this.logger.error({ err: error }, 'Background conversion rejected');
      }
    );
    this.tasks.add(tracked);
  }

  /**
   * Resolve once every task tracked so far has settled
   */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }
}
