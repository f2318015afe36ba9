import { describe, expect, it } from 'vitest';
import { formatFollower, formatTimestamp } from './format.js';

describe('formatTimestamp', () => {
  it('formats in local time', () => {
    const iso = new Date(2026, 0, 2, 3, 4, 5).toISOString();
    expect(formatTimestamp(iso)).toBe('2026-01-02 03:04:05');
  });

  it('returns unparsable values unchanged', () => {
    expect(formatTimestamp('yesterday')).toBe('yesterday');
  });
});

describe('formatFollower', () => {
  it('shows the login and profile url', () => {
    expect(formatFollower({ login: 'amy', id: 1, avatarUrl: '', htmlUrl: 'https://github.example.test/amy' }))
      .toBe('amy - https://github.example.test/amy');
  });
});
