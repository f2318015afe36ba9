/**
 * フォロワー監視の型定義
 */

/** フォロワー（login が識別子。その他は表示用） */
export interface Follower {
  login: string;
  id: number;
  avatarUrl: string;
  htmlUrl: string;
}

/** 差分計算の結果 */
export interface FollowerDiff {
  gained: Follower[];
  lost: Follower[];
  /** 前回スナップショットが存在しない初回実行 */
  initial: boolean;
}
