import logger from './logger';
import { loggingQueue } from './queues';

/**
 * Asynchronous logging helpers
 *
 * Command handling logs through `enqueueLog`, which defers formatting and
 * writing to the serial `loggingQueue`.
 *
 * @module asyncLogger
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Enqueue a log message to be written via the application's logger. Never
 * throws to the caller.
 *
 * @param {LogLevel} level - winston level.
 * @param {string} msg - Message text.
 * @returns {void}
 */
export function enqueueLog(level: LogLevel, msg: string): void {
  loggingQueue.push(async () => {
    logger.log({ level, message: msg });
  });
}
