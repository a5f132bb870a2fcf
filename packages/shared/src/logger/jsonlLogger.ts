import * as fs from 'fs/promises';
import { WardenEvent } from '../types/events';
import { redact } from '../redaction';
import { withBindings } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends every structured event to a JSONL file.
 * Plain messages go to the console with the logger's bindings as prefix.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: WardenEvent): Promise<void> {
    const redactedEvent = redact(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: WardenEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(withBindings(this.bindings, message));
  }

  info(message: string): void {
    console.info(withBindings(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(withBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(withBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
