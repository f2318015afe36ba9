import { afterEach, describe, expect, it, vi } from 'vitest';
import { printCheckResult } from './check.js';
import type { CheckResult } from '../tracker/tracker.js';
import type { Follower } from '../github/types.js';

function follower(login: string): Follower {
  return { login, id: 1, avatarUrl: '', htmlUrl: `https://github.example.test/${login}` };
}

function captureLog(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    lines.push(String(line));
  });
  return lines;
}

function result(partial: Partial<CheckResult>): CheckResult {
  return {
    gained: [],
    lost: [],
    totalFollowers: 0,
    initial: false,
    entry: { timestamp: '2026-03-01T00:00:00.000Z', gained: [], lost: [], totalFollowers: 0, initial: false },
    ...partial,
  };
}

describe('printCheckResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports the first run as a baseline instead of new followers', () => {
    const lines = captureLog();

    printCheckResult(result({ initial: true, gained: [follower('x'), follower('y')], totalFollowers: 2 }));

    expect(lines).toEqual(['\n初回実行のため、現在の 2 人をベースラインとして記録しました。']);
  });

  it('lists gained and lost followers', () => {
    const lines = captureLog();

    printCheckResult(result({ gained: [follower('d')], lost: [follower('a')], totalFollowers: 3 }));

    expect(lines).toEqual([
      '\n🎉 新しいフォロワー (1):',
      '  • d - https://github.example.test/d',
      '\n👋 フォロー解除 (1):',
      '  • a - https://github.example.test/a',
      '\nフォロワー合計: 3 人',
    ]);
  });

  it('says so when nothing changed', () => {
    const lines = captureLog();

    printCheckResult(result({ totalFollowers: 5 }));

    expect(lines).toEqual([
      '\n新しいフォロワーはいません。',
      '\nフォロー解除はありません。',
      '\nフォロワー合計: 5 人',
    ]);
  });
});
