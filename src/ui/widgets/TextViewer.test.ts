import { describe, it, expect } from 'vitest';
import { formatTextViewer, formatViewerLabel, sanitizeLine } from './TextViewer.js';
import type { TextDocument } from '../../core/ViewerState.js';

function makeDoc(count: number, filePath: string = '/p/data.unknownext'): TextDocument {
  return {
    path: filePath,
    lines: Array.from({ length: count }, (_, i) => `line ${i}`),
    truncated: false,
  };
}

describe('formatTextViewer', () => {
  it('numbers rows relative to the scroll line', () => {
    const rows = formatTextViewer(makeDoc(30), 10, 20, 3).split('\n');
    expect(rows).toEqual([
      '{escape}\x1b[33m10\x1b[0m line 10{/escape}',
      '{escape}\x1b[90m 1\x1b[0m line 11{/escape}',
      '{escape}\x1b[90m 2\x1b[0m line 12{/escape}',
    ]);
  });

  it('shows the distance 3 for the line three below the scroll line', () => {
    const rows = formatTextViewer(makeDoc(30), 10, 20, 5).split('\n');
    expect(rows[3]).toBe('{escape}\x1b[90m 3\x1b[0m line 13{/escape}');
  });

  it('truncates long lines to the viewer width', () => {
    const rows = formatTextViewer(makeDoc(30), 10, 8, 1).split('\n');
    expect(rows).toEqual(['{escape}\x1b[33m10\x1b[0m line…{/escape}']);
  });

  it('shows a placeholder for an empty file', () => {
    expect(formatTextViewer(makeDoc(0), 0, 20, 5)).toBe('{gray-fg}(empty file){/gray-fg}');
  });
});

describe('sanitizeLine', () => {
  it('expands tabs and replaces control characters', () => {
    expect(sanitizeLine('a\tb\x1bc')).toBe('a    b?c');
  });
});

describe('formatViewerLabel', () => {
  it('names the file and flags truncation', () => {
    const doc = { ...makeDoc(30, '/p/notes.md'), truncated: true };
    expect(formatViewerLabel(doc)).toBe(
      ' {bold}notes.md{/bold} {gray-fg}30 lines{/gray-fg} {yellow-fg}(truncated){/yellow-fg} '
    );
  });
});
