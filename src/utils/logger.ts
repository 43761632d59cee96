import { getSettings } from './settings';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Console logger with the product prefix, e.g. "[Remote Exec] [Connection] ..."
 * Level is read from settings on every call so tests can silence it.
 */
export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.format(message), ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...details);
    }
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return RANK[level] >= RANK[getSettings().logLevel];
  }

  private format(message: string): string {
    return `[Remote Exec] [${this.scope}] ${message}`;
  }
}
