/**
 * 実行を中断する致命的エラーの定義
 * レートリミットは Fetcher 内で待機・再試行するため、ここには現れない
 */

/** 復旧できない HTTP 応答・通信失敗 */
export class NetworkError extends Error {
  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/** 401、またはレートリミット以外の 403 */
export class AuthenticationFailedError extends NetworkError {
  constructor(message: string, status: number) {
    super(message, status);
    this.name = 'AuthenticationFailedError';
  }
}

/** 404（アカウントが存在しない） */
export class AccountNotFoundError extends NetworkError {
  constructor(readonly username: string) {
    super(`GitHub: ユーザー ${username} が見つかりません (HTTP 404)`, 404);
    this.name = 'AccountNotFoundError';
  }
}

/** rateLimit.maxWaits を超えて待機が続いた */
export class RateLimitExceededError extends NetworkError {
  constructor(readonly page: number, readonly waits: number) {
    super(`GitHub: ページ ${page} のレートリミット待機が ${waits} 回を超えたため中断します`, 429);
    this.name = 'RateLimitExceededError';
  }
}

/** レスポンスの形式が想定外 */
export class MalformedResponseError extends Error {
  constructor(readonly page: number, detail: string, options?: ErrorOptions) {
    super(`GitHub: ページ ${page} のレスポンスが不正です: ${detail}`, options);
    this.name = 'MalformedResponseError';
  }
}

/** スナップショット・履歴ファイルの読み書き失敗 */
export class StorageIOError extends Error {
  constructor(readonly path: string, detail: string, options?: ErrorOptions) {
    super(`${path}: ${detail}`, options);
    this.name = 'StorageIOError';
  }
}
