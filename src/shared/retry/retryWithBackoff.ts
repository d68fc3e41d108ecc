import { createLoggerFacade } from "../logging/logger.js";

const logger = createLoggerFacade("retry");

export interface RetryAttempt {
  error: Error;
  attemptNumber: number;
  retriesLeft: number;
}

export interface RetryOptions {
  /**
   * 失败后最多再试几次，默认 3（总尝试次数 = retries + 1）
   */
  retries?: number;
  /**
   * 第 n 次重试前等待 baseDelay * 2^(n-1)，默认 100ms
   */
  baseDelay?: number;
  /**
   * 单次等待上限，缺省不封顶
   */
  maxDelay?: number;
  onFailedAttempt?: (attempt: RetryAttempt) => void;
  /**
   * 返回 false 时原样抛出当前错误
   */
  shouldRetry?: (attempt: RetryAttempt) => boolean;
}

export function calculateBackoff(attemptNumber: number, baseDelay: number, maxDelay?: number): number {
  const raw = baseDelay * 2 ** (attemptNumber - 1);
  return maxDelay === undefined ? raw : Math.min(raw, maxDelay);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * 指数退避重试。后端提交、轮询周期与文件存储共用。
 *
 * @example
 * ```ts
 * const status = await retryWithBackoff(() => client.pollStatus(reference), {
 *   retries: 3,
 *   baseDelay: 1000,
 *   maxDelay: 8000
 * });
 * ```
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const retries = options.retries ?? 3;
  const baseDelay = options.baseDelay ?? 100;
  const report =
    options.onFailedAttempt ??
    (({ error, attemptNumber, retriesLeft }: RetryAttempt) => {
      logger.warn("Operation failed, retrying", { attemptNumber, retriesLeft, error: error.message });
    });

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return await fn();
    } catch (caught) {
      const attempt: RetryAttempt = {
        error: asError(caught),
        attemptNumber,
        retriesLeft: retries + 1 - attemptNumber
      };
      if (attempt.retriesLeft <= 0 || (options.shouldRetry && !options.shouldRetry(attempt))) {
        throw attempt.error;
      }
      report(attempt);
      await sleep(calculateBackoff(attemptNumber, baseDelay, options.maxDelay));
    }
  }
}
