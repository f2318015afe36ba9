import { describe, expect, it } from 'vitest';
import { diffFollowers } from './diff.js';
import type { Follower } from '../github/types.js';

function followers(...logins: string[]): Follower[] {
  return logins.map((login, index) => ({
    login,
    id: index + 1,
    avatarUrl: `https://avatars.example.test/${login}`,
    htmlUrl: `https://github.example.test/${login}`,
  }));
}

function logins(list: Follower[]): string[] {
  return list.map(f => f.login);
}

describe('diffFollowers', () => {
  it('reports gained and lost logins', () => {
    const diff = diffFollowers(followers('a', 'b', 'c'), followers('b', 'c', 'd'));
    expect(logins(diff.gained)).toEqual(['d']);
    expect(logins(diff.lost)).toEqual(['a']);
    expect(diff.initial).toBe(false);
  });

  it('treats a missing previous snapshot as the baseline', () => {
    const diff = diffFollowers(null, followers('y', 'x'));
    expect(logins(diff.gained)).toEqual(['x', 'y']);
    expect(diff.lost).toEqual([]);
    expect(diff.initial).toBe(true);
  });

  it('distinguishes an empty previous snapshot from a missing one', () => {
    const diff = diffFollowers([], followers('x', 'y'));
    expect(logins(diff.gained)).toEqual(['x', 'y']);
    expect(diff.lost).toEqual([]);
    expect(diff.initial).toBe(false);
  });

  it('returns no changes for identical sets', () => {
    const diff = diffFollowers(followers('a', 'b'), followers('b', 'a'));
    expect(diff.gained).toEqual([]);
    expect(diff.lost).toEqual([]);
  });

  it('keeps the lost follower attributes from the previous snapshot', () => {
    const previous = followers('gone');
    const diff = diffFollowers(previous, []);
    expect(diff.lost).toEqual(previous);
  });

  it('reconstructs the current set from the previous set and the diff', () => {
    const pairs: Array<[string[], string[]]> = [
      [['a', 'b', 'c'], ['b', 'c', 'd']],
      [[], ['x']],
      [['x'], []],
      [['m', 'n'], ['m', 'n']],
      [['p', 'q', 'r', 's'], ['s', 't', 'p']],
    ];

    for (const [prev, curr] of pairs) {
      const diff = diffFollowers(followers(...prev), followers(...curr));
      const lost = new Set(logins(diff.lost));
      const rebuilt = new Set([...prev.filter(login => !lost.has(login)), ...logins(diff.gained)]);
      expect([...rebuilt].sort()).toEqual([...curr].sort());
    }
  });
});
