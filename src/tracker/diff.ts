import type { Follower, FollowerDiff } from '../github/types.js';

export function compareByLogin(a: Follower, b: Follower): number {
  if (a.login < b.login) return -1;
  if (a.login > b.login) return 1;
  return 0;
}

/**
 * 前回と今回のフォロワー集合の差分を求める
 *
 * gained = 今回 − 前回、lost = 前回 − 今回（login で比較、login 昇順）。
 * 前回が null（初回実行）の場合は今回の全員を gained とし、initial を立てる。
 */
export function diffFollowers(previous: readonly Follower[] | null, current: readonly Follower[]): FollowerDiff {
  const prevLogins = new Set((previous ?? []).map(f => f.login));
  const currLogins = new Set(current.map(f => f.login));

  const gained = current.filter(f => !prevLogins.has(f.login)).sort(compareByLogin);
  const lost = (previous ?? []).filter(f => !currLogins.has(f.login)).sort(compareByLogin);

  return { gained, lost, initial: previous === null };
}
