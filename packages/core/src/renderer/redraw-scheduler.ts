/**
 * Redraw Scheduler
 *
 * Periodic task behind async writers. Producers only record state; the
 * scheduler draws whatever is pending once per interval, so a burst of
 * updates costs one redraw per tick.
 */

import { createLogger } from '../utils/logger.js';

const logger = createLogger('renderer:redraw-scheduler');

export class RedrawScheduler {
  private timer: NodeJS.Timeout | null = null;
  private pendingError: unknown = null;
  private hasPendingError = false;

  constructor(
    private readonly tick: () => void,
    private readonly intervalMs: number
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.runTick(), this.intervalMs);
    this.timer.unref();
    logger.debug({ intervalMs: this.intervalMs }, 'Redraw scheduler started');
  }

  /**
   * Stop the timer and run one last tick on the caller's stack. Returns
   * only after the final redraw has been written.
   */
  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    logger.debug('Redraw scheduler stopped');
    this.tick();
  }

  /**
   * Re-throw a failure raised by a background tick. Called by the writer at
   * the start of every synchronous operation.
   */
  rethrowPending(): void {
    if (!this.hasPendingError) {
      return;
    }
    const error = this.pendingError;
    this.pendingError = null;
    this.hasPendingError = false;
    throw error;
  }

  private runTick(): void {
    try {
      this.tick();
    } catch (error) {
      logger.error({ error }, 'Background redraw failed');
      if (this.timer) {
        clearInterval(this.timer);
        this.timer = null;
      }
      this.pendingError = error;
      this.hasPendingError = true;
    }
  }
}
