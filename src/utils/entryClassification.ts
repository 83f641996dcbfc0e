import type { Entry } from '../core/FileSystem.js';

export type EntryClass = 'directory' | 'hidden' | 'executable' | 'default';

/**
 * Classify an entry for coloring.
 * Precedence: directory > hidden > executable > default, so a hidden
 * directory is a directory and a hidden executable is hidden.
 */
export function classifyEntry(entry: Pick<Entry, 'isDirectory' | 'isHidden' | 'isExecutable'>): EntryClass {
  if (entry.isDirectory) return 'directory';
  if (entry.isHidden) return 'hidden';
  if (entry.isExecutable) return 'executable';
  return 'default';
}

/** Blessed color names; null means the terminal default. */
export const ENTRY_COLORS: Record<EntryClass, string | null> = {
  directory: 'blue',
  hidden: 'red',
  executable: 'green',
  default: null,
};
