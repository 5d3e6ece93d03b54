import { ConfigError, RateLimitError, TimeoutError } from '@termwise/shared';
import { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry options for provider API requests.
 *
 * ## Retriable Errors
 *
 * - `RateLimitError` (HTTP 429)
 * - `TimeoutError`
 * - Server errors (HTTP 5xx)
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * `ConfigError` (HTTP 401, 403), other 4xx responses and user aborts fail
 * immediately.
 *
 * ## Delay Calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter)
 * ```
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

function numberField(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function stringField(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * Determines if an error is safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof ConfigError) {
    return false;
  }

  // SDK errors carry the HTTP status directly or on a wrapped cause
  const cause: unknown =
    typeof error === 'object' && error !== null && 'cause' in error
      ? Reflect.get(error, 'cause')
      : undefined;
  const status =
    numberField(error, 'status') ??
    numberField(error, 'statusCode') ??
    numberField(cause, 'status');
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = stringField(error, 'code') ?? stringField(cause, 'code');
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

/**
 * Executes a provider request with automatic retry, timeout, and abort handling.
 *
 * ```typescript
 * const result = await executeProviderRequest(
 *   ctx,
 *   'gemini',
 *   'gemini-2.5-flash',
 *   (signal) => client.chat.completions.create({ ... }, { signal }),
 *   { maxRetries: 5 },
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    const abortController = new AbortController();
    const abortHandler = () => {
      abortController.abort();
    };

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    let timedOut = false;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        timedOut = true;
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      // SDKs surface our own abort as a generic abort error
      lastError =
        timedOut && !(error instanceof TimeoutError)
          ? new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`, { cause: error })
          : error;

      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      if (!isRetriableError(lastError) || attempts >= maxRetries) {
        break;
      }

      attempts++;

      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      const finalDelay = Math.max(0, delay + jitter);

      await new Promise((resolve) => setTimeout(resolve, finalDelay));
    }
  }

  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
