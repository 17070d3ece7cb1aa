/**
 * バックオフ付きリトライユーティリティ
 *
 * @description RetryableError を投げた試行のみ再実行し、それ以外の例外は即座に伝播する
 */

/** 遅延の増やし方 */
export type BackoffStrategy = 'fixed' | 'linear' | 'exponential';

export interface RetryOptions {
  /** 最大リトライ回数（初回を含まない、デフォルト: 3） */
  maxRetries?: number;
  /** 基本遅延時間（ミリ秒、デフォルト: 500） */
  baseDelayMs?: number;
  /** 最大遅延時間（ミリ秒、デフォルト: 10000） */
  maxDelayMs?: number;
  /** 遅延の増やし方（デフォルト: linear） */
  backoff?: BackoffStrategy;
  /** ジッター幅（ミリ秒、デフォルト: 0） */
  jitterMs?: number;
  /** リトライ時のコールバック */
  onRetry?: (attempt: number, error: RetryableError, delayMs: number) => void;
}

/**
 * 一時的な失敗（再試行すれば成功しうる）
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RetryableError';
  }
}

/**
 * 全試行が一時的な失敗で終わった
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: RetryableError
  ) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 遅延時間を計算
 *
 * @param attempt 0始まりの試行番号（失敗した試行）
 */
export function calculateDelay(
  attempt: number,
  backoff: BackoffStrategy,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs = 0
): number {
  const delay =
    backoff === 'fixed'
      ? baseDelayMs
      : backoff === 'linear'
        ? baseDelayMs * (attempt + 1)
        : baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(delay, maxDelayMs);
  return cappedDelay + Math.random() * jitterMs;
}

/**
 * リトライ付きで関数を実行
 *
 * 初回 + 最大 maxRetries 回実行する。全て RetryableError で失敗した場合は
 * RetryExhaustedError を投げる。
 *
 * @example
 * ```typescript
 * const body = await withRetry(
 *   async () => {
 *     const response = await transport.send(request);
 *     if (response.status === 503) {
 *       throw new RetryableError('Service unavailable', 503);
 *     }
 *     return response.body;
 *   },
 *   { maxRetries: 3, baseDelayMs: 500 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 500,
    maxDelayMs = 10000,
    backoff = 'linear',
    jitterMs = 0,
    onRetry,
  } = options ?? {};

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      if (!(error instanceof RetryableError)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        throw new RetryExhaustedError(attempt + 1, error);
      }

      const delayMs = calculateDelay(attempt, backoff, baseDelayMs, maxDelayMs, jitterMs);
      onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs);
    }
  }
}
