import type { WardenEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Sends structured events to every sink and plain messages to the primary one,
 * so a console logger and a JSONL event log can run side by side.
 */
export class TeeLogger implements Logger {
  constructor(
    private readonly primary: Logger,
    private readonly eventSinks: Logger[],
  ) {}

  async log(event: WardenEvent): Promise<void> {
    await this.primary.log(event);
    for (const sink of this.eventSinks) {
      await sink.log(event);
    }
  }

  async trace(event: WardenEvent, message: string): Promise<void> {
    await this.primary.trace(event, message);
    for (const sink of this.eventSinks) {
      await sink.log(event);
    }
  }

  debug(message: string) {
    return this.primary.debug(message);
  }

  info(message: string) {
    return this.primary.info(message);
  }

  warn(message: string) {
    return this.primary.warn(message);
  }

  error(error: Error, message?: string) {
    return this.primary.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new TeeLogger(this.primary.child(bindings), this.eventSinks);
  }
}
