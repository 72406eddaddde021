import type { PlannerEvent } from '../types/events';
import { formatBindings, LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Minimum level written. Events are written at debug level. Default: info */
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(
    options: ConsoleLoggerOptions = {},
    private readonly bindings: Record<string, unknown> = {},
  ) {
    this.level = options.level ?? 'info';
  }

  log(event: PlannerEvent): void {
    if (this.enabled('debug')) {
      console.debug(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ level: this.level }, { ...this.bindings, ...bindings });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}
