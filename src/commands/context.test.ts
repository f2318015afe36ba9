import { describe, expect, it } from 'vitest';
import { createTracker, parseCount } from './context.js';

describe('createTracker', () => {
  it('rejects a username that would leave the data directory', () => {
    expect(() => createTracker('../x', { config: '/nonexistent/follower-watch.yaml', dataDir: 'unused' }))
      .toThrow('GitHub ユーザー名として不正です: "../x"');
  });

  it('builds a tracker for a valid username', () => {
    const { config, tracker } = createTracker('Octocat', { config: '/nonexistent/follower-watch.yaml' });

    expect(tracker.username).toBe('Octocat');
    expect(config.storage.dataDir).toBe('data');
  });
});

describe('parseCount', () => {
  it('parses non-negative integers', () => {
    expect(parseCount('7', '--limit')).toBe(7);
  });

  it('rejects negative or non-numeric values', () => {
    expect(() => parseCount('-1', '--limit')).toThrow('--limit には 0 以上の整数を指定してください: -1');
    expect(() => parseCount('many', '--limit')).toThrow();
  });
});
