import { describe, it, expect } from 'vitest';
import { findMatch, isSortKey, sortEntries } from './entryOrdering.js';
import { makeEntry } from '../core/test-helpers.js';

const DIR = '/d';

describe('sortEntries', () => {
  const entries = [
    makeEntry(DIR, 'b.txt', { size: 10, modifiedTime: 300, createdTime: 100 }),
    makeEntry(DIR, 'A.txt', { size: 30, modifiedTime: 100, createdTime: 300 }),
    makeEntry(DIR, 'c.txt', { size: 20, modifiedTime: 200, createdTime: 200 }),
  ];

  it('sorts by name case-insensitively', () => {
    expect(sortEntries(entries, 'name').map((e) => e.name)).toEqual(['A.txt', 'b.txt', 'c.txt']);
  });

  it('sorts by modified time, oldest first', () => {
    expect(sortEntries(entries, 'modified').map((e) => e.name)).toEqual([
      'A.txt',
      'c.txt',
      'b.txt',
    ]);
  });

  it('sorts by creation time, oldest first', () => {
    expect(sortEntries(entries, 'created').map((e) => e.name)).toEqual([
      'b.txt',
      'c.txt',
      'A.txt',
    ]);
  });

  it('sorts by size, largest first', () => {
    expect(sortEntries(entries, 'size').map((e) => e.name)).toEqual(['A.txt', 'c.txt', 'b.txt']);
  });

  it('breaks ties by name', () => {
    const tied = [
      makeEntry(DIR, 'z', { size: 5 }),
      makeEntry(DIR, 'm', { size: 5 }),
      makeEntry(DIR, 'a', { size: 5 }),
    ];
    expect(sortEntries(tied, 'size').map((e) => e.name)).toEqual(['a', 'm', 'z']);
  });

  it('orders names differing only in case deterministically', () => {
    const names = sortEntries([makeEntry(DIR, 'b'), makeEntry(DIR, 'B')], 'name').map(
      (e) => e.name
    );
    expect(names).toEqual(['B', 'b']);
  });

  it('does not modify its input', () => {
    const before = entries.map((e) => e.name);
    sortEntries(entries, 'size');
    expect(entries.map((e) => e.name)).toEqual(before);
  });
});

describe('findMatch', () => {
  const entries = ['alpha', 'Beta', 'gamma', 'alphabet'].map((n) => makeEntry(DIR, n));

  it('finds the next match after the start, ignoring case', () => {
    expect(findMatch(entries, 'bet', 0)).toBe(1);
  });

  it('wraps around the end of the listing', () => {
    expect(findMatch(entries, 'alpha', 3)).toBe(0);
  });

  it('checks the start entry last', () => {
    expect(findMatch(entries, 'gamma', 2)).toBe(2);
    expect(findMatch(entries, 'alpha', 0)).toBe(3);
  });

  it('returns null when nothing matches', () => {
    expect(findMatch(entries, 'zeta', 0)).toBeNull();
    expect(findMatch(entries, '', 0)).toBeNull();
  });
});

describe('isSortKey', () => {
  it('accepts known keys only', () => {
    expect(isSortKey('size')).toBe(true);
    expect(isSortKey('Size')).toBe(false);
    expect(isSortKey(3)).toBe(false);
  });
});
