/**
 * Resilience
 *
 * Linear-backoff retry for store requests. This is the only place transient
 * faults are retried; callers above the store client see either a result or
 * a final error.
 */

import type { RetryConfig } from '../client/config.js';
import { BlobStorageError, TransientStoreError, ValidationError, toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';

/** Sleep function, replaceable in tests */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Default sleep that stops early when the signal aborts
 */
export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Decide whether an error is worth another attempt
 */
export function isTransient(error: unknown): boolean {
  return error instanceof BlobStorageError && error.isRetryable();
}

/**
 * Retry executor with linear backoff.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(config: RetryConfig, logger: Logger = new NoopLogger(), sleep: Sleep = defaultSleep) {
    this.config = config;
    this.logger = logger;
    this.sleep = sleep;
  }

  /**
   * Execute an operation with retry logic.
   *
   * Non-transient errors propagate unchanged on the first failure. A transient
   * error that survives every retry is wrapped in a TransientStoreError.
   */
  async execute<T>(operationName: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const maxAttempts = this.config.maxRetries + 1;
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await operation();
      } catch (error) {
        if (!isTransient(error) || signal?.aborted) {
          throw error;
        }

        const lastError = toError(error);
        if (attempt >= maxAttempts) {
          throw new TransientStoreError({
            message: `${operationName} failed after ${attempt} attempts: ${lastError.message}`,
            attempts: attempt,
            statusCode: error instanceof BlobStorageError ? error.statusCode : undefined,
            container: error instanceof BlobStorageError ? error.container : undefined,
            blobName: error instanceof BlobStorageError ? error.blobName : undefined,
            requestId: error instanceof BlobStorageError ? error.requestId : undefined,
            cause: lastError,
          });
        }

        const delay = this.calculateDelay(error);
        this.logger.debug('Retrying store request', {
          operation: operationName,
          attempt,
          delayMs: delay,
          error: lastError.message,
        });
        await this.sleep(delay, signal);
      }
    }
  }

  /**
   * Fixed interval, unless the service asked for a longer wait
   */
  private calculateDelay(error: unknown): number {
    const retryAfter = error instanceof BlobStorageError ? error.retryAfterMs : undefined;
    return Math.max(this.config.retryIntervalMs, retryAfter ?? 0);
  }
}

/**
 * Create a retry executor.
 */
export function createRetryExecutor(config: RetryConfig, logger?: Logger): RetryExecutor {
  if (config.maxRetries < 0) {
    throw new ValidationError({ message: 'maxRetries must not be negative', field: 'maxRetries' });
  }
  return new RetryExecutor(config, logger);
}
