/**
 * GitHub フォロワー取得モジュール
 *
 * GET /users/{username}/followers をページ送りし、フォロワー全件を取得する。
 * 取得したページが per_page 未満になった時点を終端とみなす。
 * レートリミットは同じページを待機後に再試行し、呼び出し側には返さない。
 */

import { z } from 'zod';
import type { RateLimitPolicy } from '../config/schema.js';
import {
  AccountNotFoundError,
  AuthenticationFailedError,
  MalformedResponseError,
  NetworkError,
  RateLimitExceededError,
} from '../errors.js';
import { toErrorMessage } from '../utils/error.js';
import { withRetry } from '../utils/retry.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import { computeRateLimitDelay, isRateLimited } from './rate-limit.js';
import type { Follower } from './types.js';

// 通信失敗・5xx の再試行回数
const TRANSIENT_RETRIES = 3;
const TRANSIENT_BASE_DELAY_MS = 2000;

const GitHubUserSchema = z.object({
  login: z.string().min(1),
  id: z.number(),
  avatar_url: z.string(),
  html_url: z.string(),
});

const FollowersPageSchema = z.array(GitHubUserSchema);

export interface FollowerFetcherOptions {
  apiBase: string;
  pageSize: number;
  /** ページ間の待機（ミリ秒） */
  requestDelayMs: number;
  rateLimit: RateLimitPolicy;
  token?: string;
  fetch?: typeof fetch;
  sleep?: SleepFn;
  now?: () => number;
}

function isTransient(error: unknown): boolean {
  return error instanceof NetworkError &&
    (error.status === undefined || error.status >= 500);
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    console.warn(`GitHub: エラーレスポンス本文を読み取れませんでした: ${toErrorMessage(error)}`);
    return '';
  }
}

export class FollowerFetcher {
  private readonly fetchFn: typeof fetch;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(private readonly options: FollowerFetcherOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * 指定ユーザーのフォロワーを全件取得する
   *
   * @param username - GitHub ユーザー名
   * @returns login で重複排除したフォロワー（取得順）
   */
  async fetchAll(username: string): Promise<Follower[]> {
    const byLogin = new Map<string, Follower>();

    for (let page = 1; ; page++) {
      // ページネーションリクエスト間にディレイを挿入（最初のリクエストは除く）
      if (page > 1 && this.options.requestDelayMs > 0) {
        await this.sleep(this.options.requestDelayMs);
      }

      const followers = await this.fetchPage(username, page);
      for (const follower of followers) {
        if (!byLogin.has(follower.login)) {
          byLogin.set(follower.login, follower);
        }
      }
      console.log(`  ページ ${page}: ${followers.length}件 (累計 ${byLogin.size}件)`);

      if (followers.length < this.options.pageSize) {
        break;
      }
    }

    return Array.from(byLogin.values());
  }

  private pageUrl(username: string, page: number): string {
    const base = this.options.apiBase.replace(/\/+$/, '');
    const url = new URL(`${base}/users/${encodeURIComponent(username)}/followers`);
    url.searchParams.set('page', String(page));
    url.searchParams.set('per_page', String(this.options.pageSize));
    return url.toString();
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  /**
   * 1 リクエストを送る。通信失敗と 5xx は NetworkError として投げる（withRetry の再試行対象）
   */
  private async request(url: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: this.headers(),
        signal: AbortSignal.timeout(30_000),
      });
    } catch (error) {
      throw new NetworkError(`GitHub: 通信エラー: ${toErrorMessage(error)}`, undefined, { cause: error });
    }

    if (response.status >= 500) {
      await response.body?.cancel();
      throw new NetworkError(`GitHub: サーバーエラー (HTTP ${response.status})`, response.status);
    }
    return response;
  }

  private async fetchPage(username: string, page: number): Promise<Follower[]> {
    const url = this.pageUrl(username, page);
    const { maxWaits } = this.options.rateLimit;
    let waits = 0;

    for (;;) {
      const response = await withRetry(() => this.request(url), TRANSIENT_RETRIES, {
        baseDelayMs: TRANSIENT_BASE_DELAY_MS,
        shouldRetry: isTransient,
        sleep: this.sleep,
      });

      if (response.ok) {
        return this.parsePage(response, page);
      }

      // エラー本文は読み切って接続を解放する
      const body = await readErrorBody(response);

      if (isRateLimited(response.status, response.headers, body)) {
        waits++;
        if (maxWaits !== undefined && waits > maxWaits) {
          throw new RateLimitExceededError(page, maxWaits);
        }
        const delay = computeRateLimitDelay(response.headers, waits, this.options.rateLimit, this.now());
        console.warn(`GitHub: レートリミットに達しました。${Math.ceil(delay / 1000)}秒待機してページ ${page} を再試行します`);
        await this.sleep(delay);
        continue;
      }

      if (response.status === 401) {
        throw new AuthenticationFailedError('GitHub: 認証エラー（トークンが無効です） (HTTP 401)', 401);
      }
      if (response.status === 403) {
        throw new AuthenticationFailedError('GitHub: アクセス権限が不足しています (HTTP 403)', 403);
      }
      if (response.status === 404) {
        throw new AccountNotFoundError(username);
      }
      throw new NetworkError(`GitHub: フォロワー取得に失敗 (HTTP ${response.status})`, response.status);
    }
  }

  private async parsePage(response: Response, page: number): Promise<Follower[]> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new MalformedResponseError(page, 'JSON として解析できません', { cause: error });
    }

    const result = FollowersPageSchema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'スキーマ不一致';
      throw new MalformedResponseError(page, detail, { cause: result.error });
    }

    return result.data.map(user => ({
      login: user.login,
      id: user.id,
      avatarUrl: user.avatar_url,
      htmlUrl: user.html_url,
    }));
  }
}
