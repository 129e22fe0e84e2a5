import * as fs from 'fs/promises';
import * as path from 'path';
import type { EngineEvent } from '../types/events';
import { redactForLogs, redactString, scrubErrorStack } from '../redaction';
import { formatBindings } from './prefix';
import type { Logger } from './types';

/**
 * Appends redacted events to a JSON-lines file; level messages go to the console.
 */
export class JsonlLogger implements Logger {
  private dirReady: Promise<void> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  async log(event: EngineEvent): Promise<void> {
    const line = JSON.stringify({ ...this.bindings, ...redactForLogs(event) }) + '\n';
    try {
      this.dirReady ??= fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(() => {});
      await this.dirReady;
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // never rethrown into the emitting task
      console.error(`Failed to write to log file at ${this.filePath}`, scrubErrorStack(error));
    }
  }

  async trace(event: EngineEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(this.format(message));
  }

  info(message: string): void {
    console.info(this.format(message));
  }

  warn(message: string): void {
    console.warn(this.format(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.format(message), scrubErrorStack(error));
    } else {
      console.error(scrubErrorStack(error));
    }
  }

  private format(message: string): string {
    return redactString(formatBindings(this.bindings, message)).redacted;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
