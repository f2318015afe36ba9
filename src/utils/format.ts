import { format } from 'date-fns';
import type { Follower } from '../github/types.js';

// ISO 8601 文字列をローカル時刻で表示する
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (isNaN(date.getTime())) {
    return iso;
  }
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

export function formatFollower(follower: Follower): string {
  return `${follower.login} - ${follower.htmlUrl}`;
}
