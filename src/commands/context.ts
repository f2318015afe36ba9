import { loadConfig, resolveToken, type Config } from '../config/schema.js';
import { FollowerFetcher } from '../github/followers.js';
import { parseUsername } from '../github/username.js';
import { FollowerStore } from '../store/followers.js';
import { FollowerTracker } from '../tracker/tracker.js';

export interface CommonOptions {
  config: string;
  dataDir?: string;
  token?: string;
}

// 設定ファイルと CLI オプションから FollowerTracker を組み立てる
export function createTracker(username: string, options: CommonOptions): { config: Config; tracker: FollowerTracker } {
  const login = parseUsername(username);
  const config = loadConfig(options.config);
  const fetcher = new FollowerFetcher({
    apiBase: config.github.apiBase,
    pageSize: config.github.pageSize,
    requestDelayMs: config.github.requestDelayMs,
    rateLimit: config.rateLimit,
    token: resolveToken(config, options.token),
  });
  const store = new FollowerStore(options.dataDir ?? config.storage.dataDir, login);
  return { config, tracker: new FollowerTracker(fetcher, store) };
}

export function parseCount(value: string, label: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`${label} には 0 以上の整数を指定してください: ${value}`);
  }
  return parsed;
}
