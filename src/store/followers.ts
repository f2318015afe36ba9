import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { StorageIOError } from '../errors.js';
import type { Follower } from '../github/types.js';
import { toErrorMessage } from '../utils/error.js';
import { compareByLogin } from '../tracker/diff.js';

const FollowerSchema = z.object({
  login: z.string().min(1),
  id: z.number(),
  avatarUrl: z.string(),
  htmlUrl: z.string(),
});

const SnapshotSchema = z.object({
  username: z.string(),
  fetchedAt: z.string(),
  count: z.number().int().nonnegative(),
  followers: z.array(FollowerSchema),
});

const HistoryEntrySchema = z.object({
  timestamp: z.string(),
  gained: z.array(FollowerSchema),
  lost: z.array(FollowerSchema),
  totalFollowers: z.number().int().nonnegative(),
  initial: z.boolean().default(false),
});

const HistorySchema = z.array(HistoryEntrySchema);

export type Snapshot = z.infer<typeof SnapshotSchema>;
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

/**
 * ユーザーごとのスナップショットと履歴を JSON ファイルで管理する
 *
 *   {dataDir}/{username}_followers.json  最新スナップショット（毎回全置換）
 *   {dataDir}/{username}_history.json    差分履歴（追記のみ）
 *
 * GitHub のユーザー名は大文字小文字を区別しないため、ファイル名は小文字にそろえる。
 */
export class FollowerStore {
  readonly snapshotPath: string;
  readonly historyPath: string;

  constructor(private readonly dataDir: string, readonly username: string) {
    const key = username.toLowerCase();
    this.snapshotPath = join(dataDir, `${key}_followers.json`);
    this.historyPath = join(dataDir, `${key}_history.json`);
  }

  private ensureDataDir(): void {
    if (!existsSync(this.dataDir)) {
      try {
        mkdirSync(this.dataDir, { recursive: true });
      } catch (error) {
        throw new StorageIOError(this.dataDir, `ディレクトリを作成できません: ${toErrorMessage(error)}`, { cause: error });
      }
    }
  }

  // 一時ファイルに書いてから rename で置き換える。失敗時は既存ファイルが残る
  private writeAtomic(filePath: string, data: unknown): void {
    this.ensureDataDir();
    const tmpPath = `${filePath}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
      renameSync(tmpPath, filePath);
    } catch (error) {
      throw new StorageIOError(filePath, `書き込みに失敗しました: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private readJson(filePath: string): unknown {
    try {
      return JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new StorageIOError(filePath, `JSONの読み込みに失敗しました。ファイルが破損している可能性があります: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  // 前回スナップショットを読み込む。存在しなければ null（初回実行）
  loadSnapshot(): Snapshot | null {
    if (!existsSync(this.snapshotPath)) {
      return null;
    }
    const result = SnapshotSchema.safeParse(this.readJson(this.snapshotPath));
    if (!result.success) {
      throw new StorageIOError(this.snapshotPath, `スナップショットの形式が不正です: ${result.error.message}`);
    }
    return result.data;
  }

  // スナップショットを全置換で保存（login 昇順）
  saveSnapshot(followers: readonly Follower[], fetchedAt: Date): Snapshot {
    const snapshot: Snapshot = {
      username: this.username,
      fetchedAt: fetchedAt.toISOString(),
      count: followers.length,
      followers: [...followers].sort(compareByLogin),
    };
    this.writeAtomic(this.snapshotPath, snapshot);
    return snapshot;
  }

  loadHistory(): HistoryEntry[] {
    if (!existsSync(this.historyPath)) {
      return [];
    }
    const result = HistorySchema.safeParse(this.readJson(this.historyPath));
    if (!result.success) {
      throw new StorageIOError(this.historyPath, `履歴の形式が不正です: ${result.error.message}`);
    }
    return result.data;
  }

  // 履歴エントリを追記保存
  appendHistory(entry: HistoryEntry): void {
    const existing = this.loadHistory();
    existing.push(entry);
    this.writeAtomic(this.historyPath, existing);
  }
}
