import type { Logger } from '../../logger.js';
import { isRetryable, StreamUnavailableError } from './errors.js';
import { realScheduler, type Scheduler } from './Scheduler.js';

export interface RetryParams {
  /** 最大試行回数（初回を含む） */
  maxAttempts: number;
  retryBaseMs: number;
  retryMultiplier: number;
  maxRetryMs: number;
}

export const DEFAULT_RETRY: RetryParams = {
  maxAttempts: 5,
  retryBaseMs: 1000,
  retryMultiplier: 2,
  maxRetryMs: 30_000,
};

export interface RetryOptions extends Partial<RetryParams> {
  signal?: AbortSignal;
  scheduler?: Scheduler;
  logger?: Logger;
  /** 待機に入る直前に呼ばれる */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export function getNextRetryMs(params: RetryParams, attempt: number): number {
  if (attempt < 1) {
    throw new Error('Attempts are indexed starting with 1');
  }
  return Math.min(params.retryBaseMs * params.retryMultiplier ** (attempt - 1), params.maxRetryMs);
}

/**
 * 一時的な障害 (FetchError / FramingError / TruncatedStreamError) を指数バックオフでリトライする。
 * それ以外の例外はそのまま投げ、試行回数を使い切ったら StreamUnavailableError。
 * 中断された場合は signal.reason (AbortError) を投げる。
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const params: RetryParams = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY.maxAttempts,
    retryBaseMs: options.retryBaseMs ?? DEFAULT_RETRY.retryBaseMs,
    retryMultiplier: options.retryMultiplier ?? DEFAULT_RETRY.retryMultiplier,
    maxRetryMs: options.maxRetryMs ?? DEFAULT_RETRY.maxRetryMs,
  };
  const scheduler = options.scheduler ?? realScheduler;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      options.signal?.throwIfAborted();
      if (!isRetryable(error)) throw error;
      if (attempt >= params.maxAttempts) {
        options.logger?.error({ err: error, attempts: attempt }, 'retries exhausted');
        throw new StreamUnavailableError(attempt, error);
      }

      const delayMs = getNextRetryMs(params, attempt);
      options.logger?.warn({ err: error, attempt, delayMs }, 'retrying');
      options.onRetry?.(attempt, delayMs, error);
      await scheduler.sleep(delayMs, options.signal);
      options.signal?.throwIfAborted();
    }
  }
}
