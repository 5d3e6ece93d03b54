/**
 * Error codes used throughout termwise.
 * User-correctable errors exit with code 2, provider failures with 3,
 * everything else with 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Provider errors (exit code 3)
  | 'ProviderError'
  | 'ResponseFormatError'
  | 'RateLimitError'
  | 'TimeoutError'
  // Runtime errors (exit code 1)
  | 'UnknownError';

/**
 * Process exit codes shared with the shell integration scripts.
 *
 * `Attention` is a reserved sentinel: the calling shell shows a review warning
 * and still places the command in the input buffer. Codes 1-9 are tool failures.
 */
export const ExitCode = {
  Success: 0,
  Error: 1,
  Config: 2,
  Provider: 3,
  Attention: 10,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

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
 * Base error class for all termwise errors.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'API request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'gemini' }
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
 * Error thrown when configuration is invalid or missing (no API key, bad YAML).
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
 * Error thrown when a model provider request fails.
 */
export class ProviderError extends AppError {
  /** Provider identifier, e.g. `gemini` */
  public readonly provider?: string;
  /** HTTP status returned by the provider, when there was one */
  public readonly status?: number;

  constructor(
    message: string,
    options: AppErrorOptions & { provider?: string; status?: number } = {},
  ) {
    super('ProviderError', message, options);
    this.provider = options.provider;
    this.status = options.status;
  }
}

/**
 * Error thrown when a model answer cannot be turned into a command or explanation.
 */
export class ResponseFormatError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ResponseFormatError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
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
 * Maps any thrown value to a tool-failure exit code. Never returns the
 * attention sentinel.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (!(error instanceof AppError)) {
    return ExitCode.Error;
  }
  switch (error.code) {
    case 'ConfigError':
    case 'UsageError':
      return ExitCode.Config;
    case 'ProviderError':
    case 'ResponseFormatError':
    case 'RateLimitError':
    case 'TimeoutError':
      return ExitCode.Provider;
    default:
      return ExitCode.Error;
  }
}
