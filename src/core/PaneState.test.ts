import { describe, it, expect } from 'vitest';
import { PaneState, clampIndex, scrollToReveal } from './PaneState.js';
import { makeEntry } from './test-helpers.js';

const DIR = '/work';

function paneWith(names: string[], height: number = 20): PaneState {
  const pane = new PaneState(DIR, 'name', height);
  pane.setListing(
    DIR,
    names.map((n) => makeEntry(DIR, n))
  );
  return pane;
}

const TEN = ['a0', 'a1', 'a2', 'a3', 'a4', 'a5', 'a6', 'a7', 'a8', 'a9'];

describe('clampIndex', () => {
  it('clamps into [0, length-1]', () => {
    expect(clampIndex(-3, 5)).toBe(0);
    expect(clampIndex(9, 5)).toBe(4);
    expect(clampIndex(2, 5)).toBe(2);
  });

  it('returns 0 for an empty list', () => {
    expect(clampIndex(4, 0)).toBe(0);
  });
});

describe('scrollToReveal', () => {
  it('keeps the offset while the cursor is visible', () => {
    expect(scrollToReveal(5, 2, 5, 20)).toBe(2);
  });

  it('scrolls down just enough to show the cursor on the last row', () => {
    expect(scrollToReveal(9, 2, 5, 20)).toBe(5);
  });

  it('scrolls up to the cursor row', () => {
    expect(scrollToReveal(1, 4, 5, 20)).toBe(1);
  });

  it('never scrolls past the end of a shorter list', () => {
    expect(scrollToReveal(2, 8, 5, 4)).toBe(0);
  });
});

describe('PaneState navigation', () => {
  it('moves down by n, clamped to the last entry', () => {
    const pane = paneWith(TEN);
    for (const [start, n] of [
      [0, 1],
      [0, 4],
      [3, 6],
      [7, 5],
      [9, 1],
    ]) {
      pane.setCursor(start);
      pane.moveDown(n);
      expect(pane.cursor).toBe(Math.min(start + n, TEN.length - 1));
    }
  });

  it('moves up by n, clamped to the first entry', () => {
    const pane = paneWith(TEN);
    for (const [start, n] of [
      [9, 1],
      [9, 4],
      [3, 6],
      [0, 2],
    ]) {
      pane.setCursor(start);
      pane.moveUp(n);
      expect(pane.cursor).toBe(Math.max(start - n, 0));
    }
  });

  it('does not wrap around', () => {
    const pane = paneWith(['x', 'y']);
    pane.moveUp(1);
    expect(pane.cursor).toBe(0);
    pane.moveDown(5);
    expect(pane.cursor).toBe(1);
  });

  it('jumps to the top and bottom', () => {
    const pane = paneWith(TEN);
    pane.gotoBottom();
    expect(pane.cursor).toBe(9);
    pane.gotoTop();
    expect(pane.cursor).toBe(0);
  });

  it('keeps cursor 0 and no current entry on an empty listing', () => {
    const pane = paneWith([]);
    pane.moveDown(3);
    pane.gotoBottom();
    expect(pane.cursor).toBe(0);
    expect(pane.currentEntry).toBeNull();
    expect(pane.selectionTargets()).toEqual([]);
  });

  it('scrolls minimally to follow the cursor', () => {
    const pane = paneWith(TEN, 4);
    pane.moveDown(5);
    expect(pane.scrollOffset).toBe(2);
    pane.moveUp(1);
    expect(pane.scrollOffset).toBe(2);
    pane.moveUp(3);
    expect(pane.scrollOffset).toBe(1);
  });
});

describe('PaneState listing and marks', () => {
  it('sorts entries by name on load', () => {
    const pane = paneWith(['b', 'C', 'a']);
    expect(pane.entries.map((e) => e.name)).toEqual(['a', 'b', 'C']);
  });

  it('toggles the mark of the cursor entry', () => {
    const pane = paneWith(['a', 'b']);
    expect(pane.toggleMark()).toBe(true);
    expect([...pane.marked]).toEqual(['/work/a']);
    expect(pane.toggleMark()).toBe(false);
    expect(pane.marked.size).toBe(0);
  });

  it('keeps marks by path across a reload that reorders entries', () => {
    const pane = paneWith(['a', 'b', 'c']);
    pane.setCursor(2);
    pane.toggleMark();
    pane.setListing(DIR, [makeEntry(DIR, 'c'), makeEntry(DIR, 'aa'), makeEntry(DIR, 'a')]);
    expect([...pane.marked]).toEqual(['/work/c']);
    expect(pane.markedPaths()).toEqual(['/work/c']);
  });

  it('drops marks whose path left the listing', () => {
    const pane = paneWith(['a', 'b']);
    pane.toggleMark();
    pane.setListing(DIR, [makeEntry(DIR, 'b')]);
    expect(pane.marked.size).toBe(0);
  });

  it('clamps the cursor when the listing shrinks', () => {
    const pane = paneWith(TEN);
    pane.gotoBottom();
    pane.setListing(DIR, [makeEntry(DIR, 'a0'), makeEntry(DIR, 'a1')]);
    expect(pane.cursor).toBe(1);
  });

  it('resets the cursor when the directory changes', () => {
    const pane = paneWith(TEN);
    pane.setCursor(6);
    pane.setListing('/work/sub', [makeEntry('/work/sub', 'x'), makeEntry('/work/sub', 'y')]);
    expect(pane.cursor).toBe(0);
    expect(pane.directory).toBe('/work/sub');
  });

  it('focuses a given path when present', () => {
    const pane = paneWith(TEN);
    pane.setListing(DIR, TEN.map((n) => makeEntry(DIR, n)), { path: '/work/a7' });
    expect(pane.cursor).toBe(7);
  });

  it('returns marked entries in listing order as selection targets', () => {
    const pane = paneWith(['a', 'b', 'c']);
    pane.setCursor(2);
    pane.toggleMark();
    pane.setCursor(0);
    pane.toggleMark();
    expect(pane.selectionTargets()).toEqual(['/work/a', '/work/c']);
  });

  it('falls back to the cursor entry when nothing is marked', () => {
    const pane = paneWith(['a', 'b', 'c']);
    pane.setCursor(1);
    expect(pane.selectionTargets()).toEqual(['/work/b']);
  });

  it('returns the paths of an inclusive index range in either direction', () => {
    const pane = paneWith(TEN);
    expect(pane.rangePaths(5, 3)).toEqual(['/work/a3', '/work/a4', '/work/a5']);
    expect(pane.rangePaths(8, 20)).toEqual(['/work/a8', '/work/a9']);
  });

  it('keeps the cursor on the same entry when the sort key changes', () => {
    const pane = new PaneState(DIR);
    pane.setListing(DIR, [
      makeEntry(DIR, 'small', { size: 1 }),
      makeEntry(DIR, 'big', { size: 100 }),
      makeEntry(DIR, 'mid', { size: 10 }),
    ]);
    pane.setCursor(2); // small
    pane.setSortKey('size');
    expect(pane.entries.map((e) => e.name)).toEqual(['big', 'mid', 'small']);
    expect(pane.currentEntry?.name).toBe('small');
  });
});
