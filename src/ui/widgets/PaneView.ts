import type { Entry } from '../../core/FileSystem.js';
import type { SortKey } from '../../utils/entryOrdering.js';
import { SORT_OPTIONS } from '../../utils/entryOrdering.js';
import { ENTRY_COLORS, classifyEntry } from '../../utils/entryClassification.js';
import { fitColumns } from '../../utils/ansiTruncate.js';
import { abbreviateHomePath } from '../../config.js';
import { escapeTags } from '../tags.js';

/** What the pane renderer needs from a PaneState. */
export interface PaneViewModel {
  readonly directory: string;
  readonly entries: readonly Entry[];
  readonly cursor: number;
  readonly scrollOffset: number;
  readonly marked: ReadonlySet<string>;
  readonly sortKey: SortKey;
}

const MARKER = '*';

function displayName(entry: Entry): string {
  return entry.isDirectory ? `${entry.name}/` : entry.name;
}

/**
 * Format one pane listing as blessed-compatible tagged string.
 *
 * Each row is `<marker> <name>`, padded to `width` so the cursor highlight
 * spans the pane. Only the active pane highlights its cursor row.
 */
export function formatPaneView(
  pane: PaneViewModel,
  isActive: boolean,
  width: number,
  height: number
): string {
  if (pane.entries.length === 0) {
    return '{gray-fg}(empty directory){/gray-fg}';
  }

  const visible = pane.entries.slice(pane.scrollOffset, pane.scrollOffset + Math.max(0, height));
  const lines: string[] = [];

  for (let i = 0; i < visible.length; i++) {
    const entry = visible[i];
    const index = pane.scrollOffset + i;
    const isMarked = pane.marked.has(entry.path);
    const isCursor = isActive && index === pane.cursor;

    const marker = isMarked ? MARKER : ' ';
    const text = escapeTags(fitColumns(`${marker} ${displayName(entry)}`, width));
    const color = ENTRY_COLORS[classifyEntry(entry)];

    let line = color ? `{${color}-fg}${text}{/${color}-fg}` : text;
    if (isMarked) line = `{bold}${line}{/bold}`;
    if (isCursor) line = `{inverse}${line}{/inverse}`;
    lines.push(line);
  }

  return lines.join('\n');
}

/**
 * Border label for a pane: its directory, plus the sort order when it is
 * not alphabetical.
 */
export function formatPaneLabel(pane: PaneViewModel, isActive: boolean): string {
  let label = escapeTags(abbreviateHomePath(pane.directory));
  if (pane.sortKey !== 'name') {
    const option = SORT_OPTIONS.find((o) => o.key === pane.sortKey);
    if (option) label += ` {gray-fg}[${option.label}]{/gray-fg}`;
  }
  if (pane.marked.size > 0) {
    label += ` {yellow-fg}${pane.marked.size} marked{/yellow-fg}`;
  }
  return isActive ? ` {bold}{yellow-fg}${label}{/yellow-fg}{/bold} ` : ` ${label} `;
}
