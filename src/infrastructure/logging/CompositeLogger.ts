/**
 * Fans every message out to several loggers
 */

import type { ILogger } from '../../domain/interfaces';

export interface ClosableLogger extends ILogger {
  close?(): Promise<void>;
}

export class CompositeLogger implements ILogger {
  constructor(private loggers: ClosableLogger[]) { }

  log(message: string, ...args: unknown[]): void {
    this.loggers.forEach(logger => logger.log(message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    this.loggers.forEach(logger => logger.error(message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.loggers.forEach(logger => logger.warn(message, ...args));
  }

  info(message: string, ...args: unknown[]): void {
    this.loggers.forEach(logger => logger.info(message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    this.loggers.forEach(logger => logger.debug(message, ...args));
  }

  /**
   * Close file streams (call on application shutdown)
   */
  async close(): Promise<void> {
    await Promise.all(this.loggers.map(logger => logger.close?.()));
  }
}
