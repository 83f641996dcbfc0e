import type { Entry } from './FileSystem.js';
import { sortEntries, type SortKey } from '../utils/entryOrdering.js';

export const DEFAULT_VIEWPORT_HEIGHT = 20;

export function clampIndex(index: number, length: number): number {
  if (length <= 0) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

/**
 * Smallest scroll change that keeps `cursor` inside a window of `height`
 * rows. Never re-centers.
 */
export function scrollToReveal(
  cursor: number,
  scrollOffset: number,
  height: number,
  length: number
): number {
  const rows = Math.max(1, height);
  let offset = scrollOffset;
  if (cursor < offset) {
    offset = cursor;
  } else if (cursor >= offset + rows) {
    offset = cursor - rows + 1;
  }
  const maxOffset = Math.max(0, length - rows);
  return Math.min(Math.max(offset, 0), maxOffset);
}

export interface ListingFocus {
  /** Put the cursor on this path if it is in the new listing. */
  path?: string | null;
  /** Start at the top instead of keeping the old cursor index. */
  resetCursor?: boolean;
}

/**
 * One directory pane: listing, cursor, scroll offset, marks and sort order.
 *
 * Marks are stored by path so they survive reloads and reordering; any mark
 * whose path is missing from a new listing is dropped.
 */
export class PaneState {
  private _directory: string;
  private _entries: Entry[] = [];
  private _cursor = 0;
  private _scrollOffset = 0;
  private _marked = new Set<string>();
  private _sortKey: SortKey;
  private _viewportHeight: number;

  constructor(
    directory: string,
    sortKey: SortKey = 'name',
    viewportHeight: number = DEFAULT_VIEWPORT_HEIGHT
  ) {
    this._directory = directory;
    this._sortKey = sortKey;
    this._viewportHeight = viewportHeight;
  }

  get directory(): string {
    return this._directory;
  }

  get entries(): readonly Entry[] {
    return this._entries;
  }

  get cursor(): number {
    return this._cursor;
  }

  get scrollOffset(): number {
    return this._scrollOffset;
  }

  get marked(): ReadonlySet<string> {
    return this._marked;
  }

  get sortKey(): SortKey {
    return this._sortKey;
  }

  get viewportHeight(): number {
    return this._viewportHeight;
  }

  get currentEntry(): Entry | null {
    return this._entries[this._cursor] ?? null;
  }

  isMarked(entryPath: string): boolean {
    return this._marked.has(entryPath);
  }

  indexOfPath(entryPath: string): number {
    return this._entries.findIndex((e) => e.path === entryPath);
  }

  /**
   * Replace the listing wholesale. Entries are sorted by the pane's sort key.
   */
  setListing(directory: string, entries: readonly Entry[], focus: ListingFocus = {}): void {
    const directoryChanged = directory !== this._directory;
    this._directory = directory;
    this._entries = sortEntries(entries, this._sortKey);

    const present = new Set(this._entries.map((e) => e.path));
    for (const markedPath of [...this._marked]) {
      if (!present.has(markedPath)) this._marked.delete(markedPath);
    }

    const focusIndex = focus.path ? this.indexOfPath(focus.path) : -1;
    if (focusIndex >= 0) {
      this._cursor = focusIndex;
    } else if (focus.resetCursor || directoryChanged) {
      this._cursor = 0;
      this._scrollOffset = 0;
    } else {
      this._cursor = clampIndex(this._cursor, this._entries.length);
    }
    this.reveal();
  }

  setSortKey(key: SortKey): void {
    const current = this.currentEntry?.path ?? null;
    this._sortKey = key;
    this._entries = sortEntries(this._entries, key);
    if (current) {
      this._cursor = clampIndex(this.indexOfPath(current), this._entries.length);
    }
    this.reveal();
  }

  setViewportHeight(height: number): void {
    this._viewportHeight = Math.max(1, height);
    this.reveal();
  }

  setCursor(index: number): void {
    this._cursor = clampIndex(index, this._entries.length);
    this.reveal();
  }

  moveDown(count: number = 1): void {
    this.setCursor(this._cursor + count);
  }

  moveUp(count: number = 1): void {
    this.setCursor(this._cursor - count);
  }

  gotoTop(): void {
    this.setCursor(0);
  }

  gotoBottom(): void {
    this.setCursor(this._entries.length - 1);
  }

  /** Toggle the mark on the cursor entry. Returns the new marked state. */
  toggleMark(): boolean {
    const entry = this.currentEntry;
    if (!entry) return false;
    if (this._marked.has(entry.path)) {
      this._marked.delete(entry.path);
      return false;
    }
    this._marked.add(entry.path);
    return true;
  }

  setMarks(paths: Iterable<string>): void {
    this._marked = new Set(paths);
  }

  unmark(paths: Iterable<string>): void {
    for (const p of paths) this._marked.delete(p);
  }

  /** Paths of entries with index in [min(a,b), max(a,b)]. */
  rangePaths(a: number, b: number): string[] {
    const lo = clampIndex(Math.min(a, b), this._entries.length);
    const hi = clampIndex(Math.max(a, b), this._entries.length);
    return this._entries.slice(lo, hi + 1).map((e) => e.path);
  }

  /** Marked paths in listing order. */
  markedPaths(): string[] {
    return this._entries.filter((e) => this._marked.has(e.path)).map((e) => e.path);
  }

  /**
   * Entries an operation acts on: every marked entry, or the cursor entry
   * when nothing is marked. Empty for an empty listing.
   */
  selectionTargets(): string[] {
    const marked = this.markedPaths();
    if (marked.length > 0) return marked;
    const entry = this.currentEntry;
    return entry ? [entry.path] : [];
  }

  private reveal(): void {
    this._scrollOffset = scrollToReveal(
      this._cursor,
      this._scrollOffset,
      this._viewportHeight,
      this._entries.length
    );
  }
}
