/**
 * Error codes used throughout the task planner.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'InvalidInput'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'LLMUnavailable'
  | 'TimeoutError'
  | 'HttpError'
  | 'StoreFailure'
  | 'NotFound'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all task planner errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('StoreFailure', 'Insert failed', {
 *   cause: originalError,
 *   details: { table: 'task_plans' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a goal is empty or whitespace-only.
 * No generation is attempted.
 */
export class InvalidInputError extends AppError {
  constructor(message = 'Goal is required', options: AppErrorOptions = {}) {
    super('InvalidInput', message, options);
  }
}

/**
 * Error thrown when an LLM provider call fails at the transport level
 * (non-2xx status, malformed envelope).
 */
export class ProviderError extends AppError {
  /** HTTP status returned by the provider, when there was one */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('ProviderError', message, options);
    this.status = options.status;
  }
}

/**
 * Raised by the remote generator for any failure to obtain a usable plan.
 * Recovered by falling back to the rule-based generator; never reaches callers.
 */
export class ProviderUnavailableError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('LLMUnavailable', message, options);
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown for malformed HTTP requests.
 */
export class HttpError extends AppError {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string, options: AppErrorOptions = {}) {
    super('HttpError', message, options);
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when the plan store cannot read or write.
 * Fatal for the request; not retried.
 */
export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreFailure', message, options);
  }
}

/**
 * Error thrown when a requested plan id does not exist.
 */
export class NotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFound', message, options);
  }
}

/**
 * Returns true for errors the user can fix by changing input or configuration.
 */
export function isUserCorrectable(error: unknown): boolean {
  return (
    error instanceof ConfigError || error instanceof UsageError || error instanceof InvalidInputError
  );
}
