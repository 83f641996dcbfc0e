import type { Entry } from '../core/FileSystem.js';

export type SortKey = 'modified' | 'created' | 'size' | 'name';

/** Sort picker options, in display order. */
export const SORT_OPTIONS: ReadonlyArray<{ key: SortKey; label: string }> = [
  { key: 'modified', label: 'Last modified date' },
  { key: 'created', label: 'Creation date' },
  { key: 'size', label: 'File size' },
  { key: 'name', label: 'Alphabetical' },
];

export const SORT_KEYS: readonly SortKey[] = SORT_OPTIONS.map((o) => o.key);

export function isSortKey(value: unknown): value is SortKey {
  return typeof value === 'string' && SORT_KEYS.some((k) => k === value);
}

function compareNames(a: Entry, b: Entry): number {
  const la = a.name.toLowerCase();
  const lb = b.name.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  // Case-only differences still need a stable, total order
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Return a new array sorted by `key`. Ties fall back to the name order,
 * so a listing always has one well-defined order.
 *
 * Modified and created sort oldest first; size sorts largest first.
 */
export function sortEntries(entries: readonly Entry[], key: SortKey): Entry[] {
  const sorted = [...entries];
  sorted.sort((a, b) => {
    let primary = 0;
    switch (key) {
      case 'modified':
        primary = a.modifiedTime - b.modifiedTime;
        break;
      case 'created':
        primary = a.createdTime - b.createdTime;
        break;
      case 'size':
        primary = b.size - a.size;
        break;
      case 'name':
        primary = 0;
        break;
    }
    return primary !== 0 ? primary : compareNames(a, b);
  });
  return sorted;
}

/**
 * Find the next entry whose name contains `query` (case-insensitive),
 * searching forward from the entry after `start` and wrapping around.
 * `start` itself is checked last.
 */
export function findMatch(entries: readonly Entry[], query: string, start: number): number | null {
  if (!query || entries.length === 0) return null;
  const needle = query.toLowerCase();
  const total = entries.length;
  for (let i = 1; i <= total; i++) {
    const idx = (start + i) % total;
    if (entries[idx].name.toLowerCase().includes(needle)) {
      return idx;
    }
  }
  return null;
}
