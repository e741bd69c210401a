import { LOG_LEVEL_ORDER } from './types';
import type { Logger, LogLevel } from './types';

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Defaults to 'info'. */
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
