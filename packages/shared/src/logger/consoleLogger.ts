import type { EngineEvent } from '../types/events';
import { redactForLogs, redactString, scrubErrorStack } from '../redaction';
import { formatBindings } from './prefix';
import type { LogLevel, Logger } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Default: info */
  level?: LogLevel;
  /** Print structured events too. Default: true */
  events?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly events: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.events = options.events ?? true;
  }

  log(event: EngineEvent): void {
    if (!this.events) return;
    console.log(JSON.stringify(redactForLogs(event)));
  }

  trace(event: EngineEvent, message: string): void {
    if (!this.events) return;
    console.log(message, JSON.stringify(redactForLogs(event)));
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(redactString(message).redacted);
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(redactString(message).redacted);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(redactString(message).redacted);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(redactString(message).redacted, scrubErrorStack(error));
    } else {
      console.error(scrubErrorStack(error));
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: EngineEvent) {
    return this.base.log(event);
  }

  trace(event: EngineEvent, message: string) {
    return this.base.trace(event, formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}

/**
 * Drops everything. Used where output would only be noise, such as tests.
 */
export class SilentLogger implements Logger {
  log(): void {}
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}
