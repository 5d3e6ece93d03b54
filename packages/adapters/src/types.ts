import { Logger } from '@termwise/shared';

/**
 * Configuration options for retry behavior on transient failures.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxRetries: 5,
 *   initialDelayMs: 2000,
 * };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 2 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 500 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 5000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Context passed to adapter methods for each request.
 */
export interface AdapterContext {
  /** Identifier of the CLI invocation */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for a single attempt */
  timeoutMs?: number;
  /** Retry configuration for transient failures */
  retryOptions?: RetryOptions;
}

/**
 * Connection settings shared by the HTTP-backed providers.
 */
export interface ProviderSettings {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
}
