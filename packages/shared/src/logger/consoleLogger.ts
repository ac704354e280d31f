import type { Logger } from './types';

export class ConsoleLogger implements Logger {
  constructor(private readonly bindings: Record<string, unknown> = {}) {}

  debug(message: string): void {
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

/**
 * Discards everything. Default for library components that were not handed a logger.
 */
export class SilentLogger implements Logger {
  debug(_message: string): void {}

  info(_message: string): void {}

  warn(_message: string): void {}

  error(_error: Error, _message?: string): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
