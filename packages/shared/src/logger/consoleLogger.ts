import type { WardenEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and raw events. Off by default. */
  verbose?: boolean;
  /** Only print warnings and errors, which go to stderr. Used when stdout carries JSON. */
  quiet?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.verbose = !this.quiet && (options.verbose ?? false);
  }

  log(event: WardenEvent): void {
    if (this.verbose) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: WardenEvent, message: string): void {
    if (this.verbose) {
      console.log(message, JSON.stringify(event));
    } else if (!this.quiet) {
      console.log(message);
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.info(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
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
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: WardenEvent) {
    return this.base.log(event);
  }

  trace(event: WardenEvent, message: string) {
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
    return withBindings(this.bindings, message);
  }
}

export function withBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
