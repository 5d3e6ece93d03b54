import { AppError, ConfigError, ProviderError, RateLimitError, TimeoutError } from '@termwise/shared';

/**
 * Interface for API error types that have a status code.
 * Used by the base adapter to handle common error mapping.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Configuration for error type checking in provider adapters.
 * Each provider can supply its own error class checks.
 */
export interface ErrorTypeConfig {
  /** Check if the error is an API error with status code */
  isAPIError: (error: unknown) => error is APIErrorLike;
  /** Check if the error is a connection timeout error */
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for LLM provider adapters that provides common error mapping logic.
 * Subclasses should configure error type checks for their specific SDK.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  abstract id(): string;

  /**
   * Maps provider-specific errors to standardized errors:
   * - 429 status -> RateLimitError
   * - 401/403 status -> ConfigError
   * - Timeout errors -> TimeoutError
   * - Other API errors -> ProviderError carrying the status
   * - Anything else -> ProviderError wrapping the cause
   */
  protected mapError(error: unknown): Error {
    if (error instanceof AppError) return error;

    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(`${this.id()} rejected the API key: ${error.message}`, {
          cause: error,
        });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (this.errorConfig.isAPIError(error)) {
      return new ProviderError(`${this.id()} API error: ${error.message}`, {
        cause: error,
        provider: this.id(),
        status: error.status,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`${this.id()} request failed: ${message}`, {
      cause: error,
      provider: this.id(),
    });
  }
}
