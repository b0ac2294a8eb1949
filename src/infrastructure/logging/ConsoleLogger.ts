/**
 * Console logger implementation
 * Messages below the configured level are dropped; `log` is always written
 */

import { ILogger } from '../../domain/interfaces';
import type { LogLevel } from '../../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export class ConsoleLogger implements ILogger {
  constructor(private readonly level: LogLevel = 'info') { }

  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(message, ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
