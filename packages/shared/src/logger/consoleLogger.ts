import type { TermwiseEvent } from '../types/events';
import { redactString } from '../redaction';
import type { LogLevel, Logger } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Minimum level that is written. Default: `info` */
  level?: LogLevel;
}

/**
 * Writes every line to stderr. stdout carries only the generated command, which
 * the shell integration captures.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  log(event: TermwiseEvent): void {
    if (!this.enabled('debug')) return;
    console.error(`DEBUG: ${redactString(JSON.stringify(event)).redacted}`);
  }

  debug(message: string): void {
    this.write('debug', `DEBUG: ${message}`);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', `warning: ${message}`);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(redactString(message).redacted, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: LogLevel, line: string): void {
    if (!this.enabled(level)) return;
    console.error(redactString(line).redacted);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: TermwiseEvent) {
    return this.base.log(event);
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
