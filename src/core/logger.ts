import { pino, type Logger as PinoLogger } from 'pino';

import type { LogLevel } from './config.js';

export type LogFields = Record<string, unknown>;

export class Logger {
  private readonly base: PinoLogger;

  constructor(level: LogLevel | PinoLogger = 'info', name = 'courier') {
    this.base = typeof level === 'string' ? pino({ name, level }) : level;
  }

  get level(): string {
    return this.base.level;
  }

  child(bindings: LogFields): Logger {
    return new Logger(this.base.child(bindings));
  }

  debug(message: string, fields?: LogFields): void {
    this.base.debug(fields ?? {}, message);
  }

  info(message: string, fields?: LogFields): void {
    this.base.info(fields ?? {}, message);
  }

  warn(message: string, fields?: LogFields): void {
    this.base.warn(fields ?? {}, message);
  }

  error(message: string, error?: unknown, fields?: LogFields): void {
    if (error instanceof Error) {
      this.base.error({ ...fields, err: error }, message);
      return;
    }
    if (error !== undefined) {
      this.base.error({ ...fields, detail: String(error) }, message);
      return;
    }
    this.base.error(fields ?? {}, message);
  }
}

/**
 * Logger for tests and embedding hosts that bring their own log sink.
 */
export function createSilentLogger(): Logger {
  return new Logger(pino({ level: 'silent' }));
}
