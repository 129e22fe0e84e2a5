import type { EngineEvent } from '../types/events';
import { redactString, scrubErrorMessage } from '../redaction';
import type { LogLevel, Logger } from './types';

export interface LoggedMessage {
  level: LogLevel;
  message: string;
}

/**
 * Keeps events and messages in memory. Children share the parent's buffers.
 */
export class MemoryLogger implements Logger {
  constructor(
    readonly events: EngineEvent[] = [],
    readonly messages: LoggedMessage[] = [],
  ) {}

  log(event: EngineEvent): void {
    this.events.push(event);
  }

  trace(event: EngineEvent, message: string): void {
    this.events.push(event);
    this.messages.push({ level: 'debug', message });
  }

  debug(message: string): void {
    this.messages.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(error: Error, message?: string): void {
    this.messages.push({
      level: 'error',
      message: message === undefined ? scrubErrorMessage(error) : redactString(message).redacted,
    });
  }

  child(): Logger {
    return new MemoryLogger(this.events, this.messages);
  }

  eventsOfType<T extends EngineEvent['type']>(type: T): Extract<EngineEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<EngineEvent, { type: T }> => e.type === type);
  }
}
