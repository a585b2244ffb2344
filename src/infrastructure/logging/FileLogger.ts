/**
 * File logger implementation
 * Appends to daily files under the runtime directory; errors also go to a separate file
 */

import fs from 'fs';
import path from 'path';
import { LOG_LEVEL_PRIORITY, type ILogger, type LogLevel } from '../../domain/interfaces';
import config from '../../config';

export interface FileLoggerOptions {
  logDir?: string;
  minLevel?: LogLevel;
  now?: () => Date;
}

export class FileLogger implements ILogger {
  readonly logFile: string;
  readonly errorFile: string;
  private readonly threshold: number;
  private readonly now: () => Date;
  private writeStream: fs.WriteStream | null;
  private errorStream: fs.WriteStream | null;

  constructor(options: FileLoggerOptions = {}) {
    const logDir = options.logDir ?? path.join(config.RUNTIME_DIR, 'logs');
    this.threshold = LOG_LEVEL_PRIORITY[options.minLevel ?? config.LOG_LEVEL];
    this.now = options.now ?? (() => new Date());

    fs.mkdirSync(logDir, { recursive: true });

    const day = this.now().toISOString().split('T')[0];
    this.logFile = path.join(logDir, `app-${day}.log`);
    this.errorFile = path.join(logDir, `error-${day}.log`);

    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    this.errorStream = fs.createWriteStream(this.errorFile, { flags: 'a' });

    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
    });
    this.errorStream.on('error', (err) => {
      console.error('Error writing to error file:', err);
    });
  }

  formatMessage(level: string, message: string, ...args: unknown[]): string {
    const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    return `[${this.now().toISOString()}] [${level}] ${message}${argsStr}\n`;
  }

  log(message: string, ...args: unknown[]): void {
    this.write('info', 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled('error')) return;
    this.append(this.errorStream, 'ERROR', message, args);
    this.append(this.writeStream, 'ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', 'WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', 'INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', 'DEBUG', message, args);
  }

  /**
   * Flushes and closes both files
   */
  async close(): Promise<void> {
    const streams = [this.writeStream, this.errorStream];
    this.writeStream = null;
    this.errorStream = null;

    await Promise.all(streams.map(stream => new Promise<void>((resolve) => {
      if (!stream || stream.destroyed) {
        resolve();
        return;
      }
      stream.end(() => resolve());
    })));
  }

  private write(level: LogLevel, tag: string, message: string, args: unknown[]): void {
    if (this.enabled(level)) {
      this.append(this.writeStream, tag, message, args);
    }
  }

  private append(stream: fs.WriteStream | null, tag: string, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(this.formatMessage(tag, message, ...args));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= this.threshold;
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  return typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg);
}
