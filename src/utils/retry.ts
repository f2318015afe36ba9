import { sleep as defaultSleep, type SleepFn } from './sleep.js';
import { toErrorMessage } from './error.js';

export interface RetryOptions {
  /** 初回の待機時間（ミリ秒）。以降は倍々に伸ばす */
  baseDelayMs?: number;
  /** 再試行すべきエラーか判定する。false ならその場で投げ直す */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: SleepFn;
}

/**
 * 一時的な失敗に対して指数バックオフで再試行する
 *
 * @param maxRetries - 初回を除く最大再試行回数
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  options: RetryOptions = {},
): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }
      attempt++;
      const delay = baseDelayMs * 2 ** (attempt - 1);
      console.warn(`再試行 ${attempt}/${maxRetries}（${delay}ms 後）: ${toErrorMessage(error)}`);
      await sleep(delay);
    }
  }
}
