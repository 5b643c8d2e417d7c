/**
 * Logger
 *
 * Lightweight wrapper around a winston logger instance, bound to a component
 * name that is written with every line.
 */

import type winston from 'winston';

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger: winston.Logger
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('error', message, error, metadata);
  }

  /**
   * Create a child logger with a sub-component suffix.
   * e.g., logger.child('file') on component "batch" yields "batch.file"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  isDebugEnabled(): boolean {
    return this.winstonLogger.isDebugEnabled();
  }

  private log(level: string, message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error instanceof Error && error.stack) {
      meta['errorStack'] = error.stack;
    } else if (error !== undefined) {
      meta['error'] = String(error);
    }
    this.winstonLogger.log(level, message, meta);
  }
}
