import * as path from 'node:path';
import type { TextDocument } from '../../core/ViewerState.js';
import { visibleLines } from '../../core/ViewerState.js';
import { getLanguageFromPath, highlightBlock } from '../../utils/languageDetection.js';
import { truncateAnsi } from '../../utils/ansiTruncate.js';
import { ANSI_GRAY, ANSI_RESET, ANSI_YELLOW } from '../../utils/ansi.js';
import { escapeTags } from '../tags.js';

const TAB = '    ';

// Highlighting a whole document is the expensive part; do it once per document.
const highlightCache = new WeakMap<TextDocument, string[]>();

/**
 * Make a line safe to print: tabs become spaces, other control characters
 * (including stray escape sequences) become '?'.
 */
export function sanitizeLine(line: string): string {
  return line.replace(/\t/g, TAB).replace(/[\x00-\x1f\x7f]/g, '?');
}

function displayLines(doc: TextDocument): string[] {
  const cached = highlightCache.get(doc);
  if (cached) return cached;

  const plain = doc.lines.map(sanitizeLine);
  const language = getLanguageFromPath(doc.path);
  const lines = language ? highlightBlock(plain, language) : plain;
  highlightCache.set(doc, lines);
  return lines;
}

/**
 * Format the visible part of a text document as blessed-compatible tagged
 * string, with relative line numbers in the gutter. The row at the scroll
 * line shows its absolute number in yellow.
 */
export function formatTextViewer(
  doc: TextDocument,
  scrollLine: number,
  width: number,
  height: number
): string {
  if (doc.lines.length === 0) {
    return '{gray-fg}(empty file){/gray-fg}';
  }

  const lines = displayLines(doc);
  const gutterWidth = String(doc.lines.length - 1).length;
  // Layout: lineNum + space(1) + content
  const contentWidth = Math.max(1, width - gutterWidth - 1);

  const rows = visibleLines(doc, scrollLine, height).map((row) => {
    const numberColor = row.index === scrollLine ? ANSI_YELLOW : ANSI_GRAY;
    const label = String(row.label).padStart(gutterWidth, ' ');
    const text = truncateAnsi(lines[row.index], contentWidth);
    return `{escape}${numberColor}${label}${ANSI_RESET} ${text}{/escape}`;
  });

  return rows.join('\n');
}

/**
 * Border label for the text viewer.
 */
export function formatViewerLabel(doc: TextDocument): string {
  const name = escapeTags(path.basename(doc.path));
  const suffix = doc.truncated ? ' {yellow-fg}(truncated){/yellow-fg}' : '';
  return ` {bold}${name}{/bold} {gray-fg}${doc.lines.length} lines{/gray-fg}${suffix} `;
}
