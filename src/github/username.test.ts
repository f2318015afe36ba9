import { describe, expect, it } from 'vitest';
import { parseUsername } from './username.js';

describe('parseUsername', () => {
  it('accepts letters, digits and hyphens', () => {
    expect(parseUsername('Octo-cat42')).toBe('Octo-cat42');
  });

  it('trims surrounding whitespace', () => {
    expect(parseUsername('  octocat ')).toBe('octocat');
  });

  it('rejects path traversal', () => {
    expect(() => parseUsername('../x')).toThrow('GitHub ユーザー名として不正です: "../x"');
  });

  it('rejects separators and empty names', () => {
    expect(() => parseUsername('a/b')).toThrow();
    expect(() => parseUsername('')).toThrow();
    expect(() => parseUsername('a'.repeat(40))).toThrow();
  });
});
