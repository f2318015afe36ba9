/**
 * GitHub API のレートリミット判定と待機時間の算出
 *
 * 待機時間の優先順位:
 *   1. retry-after ヘッダー（秒）
 *   2. x-ratelimit-reset ヘッダー（epoch 秒）までの残り時間 + 1 秒
 *      （x-ratelimit-remaining が 0 より大きい二次レートリミットでは使わない）
 *   3. baseDelayMs * 2^(attempt-1) の指数バックオフ
 * いずれも [minDelayMs, maxDelayMs] に丸める。
 */

import type { RateLimitPolicy } from '../config/schema.js';

const RESET_MARGIN_MS = 1000;

const RATE_LIMIT_MESSAGE = /rate limit/i;

/**
 * エラーレスポンスがレートリミットによるものか判定する
 *
 * 二次レートリミットは x-ratelimit-remaining が残っていても 403 で返り、
 * retry-after が付かないことがあるため本文の message も見る。
 *
 * @param body - レスポンス本文（読めなかった場合は空文字）
 */
export function isRateLimited(status: number, headers: Headers, body: string = ''): boolean {
  if (status === 429) {
    return true;
  }
  if (status !== 403) {
    return false;
  }
  return headers.get('x-ratelimit-remaining') === '0' ||
    headers.has('retry-after') ||
    RATE_LIMIT_MESSAGE.test(body);
}

function parseHeaderNumber(headers: Headers, name: string): number | undefined {
  const value = headers.get(name);
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * 次の再試行までの待機時間（ミリ秒）を返す
 *
 * @param attempt - 同じページでの連続待機回数（1 始まり）
 * @param now - 現在時刻（epoch ミリ秒）
 */
export function computeRateLimitDelay(
  headers: Headers,
  attempt: number,
  policy: RateLimitPolicy,
  now: number,
): number {
  let delay: number;

  const retryAfter = parseHeaderNumber(headers, 'retry-after');
  const reset = parseHeaderNumber(headers, 'x-ratelimit-reset');
  const remaining = parseHeaderNumber(headers, 'x-ratelimit-remaining');
  const quotaExhausted = remaining === undefined || remaining === 0;

  if (retryAfter !== undefined) {
    delay = retryAfter * 1000;
  } else if (reset !== undefined && quotaExhausted) {
    delay = reset * 1000 - now + RESET_MARGIN_MS;
  } else {
    delay = policy.baseDelayMs * 2 ** (attempt - 1);
  }

  return Math.min(Math.max(delay, policy.minDelayMs), policy.maxDelayMs);
}
