/**
 * フォロワー増減の記録
 *
 * 1 回の実行: 取得 → 差分 → 履歴追記 → スナップショット置換。
 * 取得中に失敗した場合は保存済みファイルに一切触れない。
 * 変化がない実行も履歴に 1 件記録する。
 */

import type { FollowerFetcher } from '../github/followers.js';
import type { Follower } from '../github/types.js';
import type { FollowerStore, HistoryEntry } from '../store/followers.js';
import { diffFollowers } from './diff.js';

export interface CheckResult {
  gained: Follower[];
  lost: Follower[];
  totalFollowers: number;
  initial: boolean;
  entry: HistoryEntry;
}

export interface RecentChange {
  follower: Follower;
  timestamp: string;
}

export interface FollowerStats {
  totalFollowers: number;
  /** 初回（ベースライン）を除いた累計 */
  totalGained: number;
  totalLost: number;
  recentGained: RecentChange[];
  recentLost: RecentChange[];
  lastCheckedAt?: string;
}

export class FollowerTracker {
  constructor(
    private readonly fetcher: FollowerFetcher,
    private readonly store: FollowerStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get username(): string {
    return this.store.username;
  }

  async checkChanges(): Promise<CheckResult> {
    console.log(`GitHub: ${this.username} のフォロワーを取得中...`);
    const current = await this.fetcher.fetchAll(this.username);

    const previous = this.store.loadSnapshot();
    const diff = diffFollowers(previous?.followers ?? null, current);

    const now = this.clock();
    const entry: HistoryEntry = {
      timestamp: now.toISOString(),
      gained: diff.gained,
      lost: diff.lost,
      totalFollowers: current.length,
      initial: diff.initial,
    };

    // 履歴を先に確定させ、スナップショットは最後に置き換える
    this.store.appendHistory(entry);
    this.store.saveSnapshot(current, now);

    return {
      gained: diff.gained,
      lost: diff.lost,
      totalFollowers: current.length,
      initial: diff.initial,
      entry,
    };
  }

  getStats(recent: number = 5): FollowerStats {
    const snapshot = this.store.loadSnapshot();
    const history = this.store.loadHistory().filter(entry => !entry.initial);

    const gained = history.flatMap(entry => entry.gained.map(follower => ({ follower, timestamp: entry.timestamp })));
    const lost = history.flatMap(entry => entry.lost.map(follower => ({ follower, timestamp: entry.timestamp })));

    return {
      totalFollowers: snapshot?.count ?? 0,
      totalGained: gained.length,
      totalLost: lost.length,
      recentGained: recent > 0 ? gained.slice(-recent) : [],
      recentLost: recent > 0 ? lost.slice(-recent) : [],
      lastCheckedAt: snapshot?.fetchedAt,
    };
  }

  getHistory(limit: number = 10): HistoryEntry[] {
    const history = this.store.loadHistory();
    return limit > 0 ? history.slice(-limit) : [];
  }
}
