import type { PlannerEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Interface for logging throughout the planner.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'PlanRequested', ... });
 * logger.warn('LLM returned no JSON, using fallback');
 * const requestLogger = logger.child({ runId: 'abc' });
 * ```
 */
export interface Logger {
  /** Persist a structured planner event. */
  log(event: PlannerEvent): MaybePromise<void>;
  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages are prefixed with `[k=v ...]`.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
