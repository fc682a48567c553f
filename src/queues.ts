import logger from './logger';

/**
 * In-process job queues.
 *
 * Command handling pushes log writes here instead of awaiting them; the CLI
 * drains the queue before `process.exit` so nothing queued is lost.
 *
 * @module queues
 */

/**
 * @callback Job
 * @returns {Promise<void>} Resolves when the job is done.
 */
export type Job = () => Promise<void>;

/**
 * Runs jobs one at a time, in the order they were pushed. Each job starts on
 * a later microtask, never inside `push`. A job that rejects is logged at warn
 * level and the next one still runs.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * @param {Job} job - Work to append.
   * @returns {void}
   */
  push(job: Job): void {
    this.pending++;
    this.tail = this.tail
      .then(job)
      .catch((e: unknown) => {
        logger.warn(`Queue job failed: ${e instanceof Error ? e.message : String(e)}`);
      })
      .finally(() => {
        this.pending--;
      });
  }

  /**
   * @returns {number} Jobs pushed and not yet finished, the running one included.
   */
  size(): number {
    return this.pending;
  }

  /**
   * Wait until every job has finished, including jobs pushed while waiting.
   *
   * @returns {Promise<void>}
   */
  async drain(): Promise<void> {
    while (this.pending > 0) await this.tail;
  }
}

/**
 * Log writes, kept in order.
 * @type {SerialQueue}
 */
export const loggingQueue = new SerialQueue();
