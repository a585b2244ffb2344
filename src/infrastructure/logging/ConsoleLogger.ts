/**
 * Console logger implementation
 * Messages below the minimum level are dropped
 */

import { LOG_LEVEL_PRIORITY, type ILogger, type LogLevel } from '../../domain/interfaces';
import config from '../../config';

export class ConsoleLogger implements ILogger {
  private readonly threshold: number;

  constructor(minLevel: LogLevel = config.LOG_LEVEL) {
    this.threshold = LOG_LEVEL_PRIORITY[minLevel];
  }

  log(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(message, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= this.threshold;
  }
}
