import type { CacheEvent } from '../types/events';
import type { Logger } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface ConsoleLoggerOptions {
  /** Lowest level written; hits and misses only show at 'debug'. Defaults to 'info'. */
  level?: LogLevel;
}

/**
 * Writes to the console. Cache events only ever describe degraded
 * operations, so they go out at warn level as one JSON line.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? 'info'];
  }

  log(event: CacheEvent): void {
    if (this.enabled('warn')) {
      console.warn(JSON.stringify(event));
    }
  }

  trace(event: CacheEvent, message: string): void {
    if (this.enabled('warn')) {
      console.warn(message, JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
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
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

/** Discards everything. For embedders that keep the cache quiet. */
export class SilentLogger implements Logger {
  log(_event: CacheEvent): void {}

  trace(_event: CacheEvent, _message: string): void {}

  debug(_message: string): void {}

  info(_message: string): void {}

  warn(_message: string): void {}

  error(_error: Error, _message?: string): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: CacheEvent) {
    return this.base.log(event);
  }

  trace(event: CacheEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

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
