/**
 * Per-stage structured log buffer. Child loggers append to their parent's
 * buffer, so the root logger holds the whole run.
 */

import type { LogLevel, StageLogEntry } from './types.js';

export class StageLogger {
  constructor(
    readonly scope: string,
    private readonly now: () => Date = () => new Date(),
    private readonly entries: StageLogEntry[] = [],
  ) {}

  log(level: LogLevel, message: string, data?: unknown): void {
    this.entries.push({
      timestamp: this.now(),
      scope: this.scope,
      level,
      message,
      data,
    });

    if (process.env.LOG_LEVEL === 'debug' || level === 'error') {
      console.log(`[${this.scope}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /** Logger for a sub-step, sharing this logger's clock and buffer. */
  child(name: string): StageLogger {
    return new StageLogger(`${this.scope}:${name}`, this.now, this.entries);
  }

  getLogs(): StageLogEntry[] {
    return [...this.entries];
  }
}
