import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';

// GitHub API 設定
const GitHubSchema = z.object({
  apiBase: z.string().url().default('https://api.github.com'),
  pageSize: z.number().int().min(1).max(100).default(100),
  requestDelayMs: z.number().int().nonnegative().default(1000),
  tokenEnvVar: z.string().default('GITHUB_TOKEN'),
});

// レートリミット時の待機ポリシー
const RateLimitSchema = z.object({
  baseDelayMs: z.number().int().positive().default(60_000),
  minDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().positive().default(900_000),
  // 未指定なら待機回数は無制限
  maxWaits: z.number().int().positive().optional(),
}).refine(policy => policy.minDelayMs <= policy.maxDelayMs, {
  message: 'rateLimit.minDelayMs は rateLimit.maxDelayMs 以下にしてください',
});

// 保存先設定
const StorageSchema = z.object({
  dataDir: z.string().default('data'),
});

// 全体設定スキーマ
export const ConfigSchema = z.object({
  github: GitHubSchema.default({}),
  rateLimit: RateLimitSchema.default({}),
  storage: StorageSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubSchema>;
export type RateLimitPolicy = z.infer<typeof RateLimitSchema>;

// config.yamlを読み込み、zodでバリデーションしてパース済みConfigオブジェクトを返す
// ファイルが存在しなければ全項目デフォルト値
export function loadConfig(configPath: string = 'config.yaml'): Config {
  if (!existsSync(configPath)) {
    return ConfigSchema.parse({});
  }
  const raw = readFileSync(configPath, 'utf-8');
  // 空ファイルは null になる
  const parsed: unknown = parse(raw) ?? {};
  return ConfigSchema.parse(parsed);
}

/**
 * トークンを解決する。--token 指定を優先し、なければ設定された環境変数を見る
 */
export function resolveToken(config: Config, cliToken?: string): string | undefined {
  if (cliToken && cliToken.trim().length > 0) {
    return cliToken.trim();
  }
  const fromEnv = process.env[config.github.tokenEnvVar];
  if (typeof fromEnv === 'string' && fromEnv.trim().length > 0) {
    return fromEnv.trim();
  }
  return undefined;
}
