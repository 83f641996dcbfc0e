import { describe, it, expect } from 'vitest';
import {
  clampScrollLine,
  decodeTextDocument,
  isBinaryContent,
  isImagePath,
  relativeLineNumber,
  visibleLines,
} from './ViewerState.js';
import { DecodeError } from './errors.js';

describe('isImagePath', () => {
  it('recognizes image extensions case-insensitively', () => {
    expect(isImagePath('/p/photo.PNG')).toBe(true);
    expect(isImagePath('/p/scan.tif')).toBe(true);
    expect(isImagePath('/p/pic.webp')).toBe(true);
  });

  it('rejects other files', () => {
    expect(isImagePath('/p/notes.txt')).toBe(false);
    expect(isImagePath('/p/png')).toBe(false);
    expect(isImagePath('/p/.png')).toBe(false);
  });
});

describe('isBinaryContent', () => {
  it('detects a NUL byte', () => {
    expect(isBinaryContent(Buffer.from([0x41, 0x00, 0x42]))).toBe(true);
  });

  it('accepts plain text', () => {
    expect(isBinaryContent(Buffer.from('hello\nworld'))).toBe(false);
  });
});

describe('decodeTextDocument', () => {
  it('splits lines and drops one trailing newline', () => {
    const doc = decodeTextDocument('/f.txt', { data: Buffer.from('a\nb\r\nc\n'), truncated: false });
    expect(doc.lines).toEqual(['a', 'b', 'c']);
    expect(doc.truncated).toBe(false);
  });

  it('gives an empty file no lines', () => {
    const doc = decodeTextDocument('/empty', { data: Buffer.alloc(0), truncated: false });
    expect(doc.lines).toEqual([]);
  });

  it('throws DecodeError for binary content', () => {
    expect(() =>
      decodeTextDocument('/bin', { data: Buffer.from([1, 0, 2]), truncated: false })
    ).toThrow(DecodeError);
  });
});

describe('relative line numbers', () => {
  it('shows the distance from the scroll line', () => {
    expect(relativeLineNumber(13, 10)).toBe(3);
    expect(relativeLineNumber(7, 10)).toBe(3);
  });

  it('shows the absolute number on the scroll line itself', () => {
    expect(relativeLineNumber(10, 10)).toBe(10);
  });
});

describe('clampScrollLine', () => {
  it('clamps into [0, totalLines-1]', () => {
    expect(clampScrollLine(50, 20)).toBe(19);
    expect(clampScrollLine(-1, 20)).toBe(0);
    expect(clampScrollLine(3, 0)).toBe(0);
  });
});

describe('visibleLines', () => {
  const doc = {
    path: '/f',
    lines: Array.from({ length: 30 }, (_, i) => `line ${i}`),
    truncated: false,
  };

  it('labels the visible window relative to the top line', () => {
    const rows = visibleLines(doc, 10, 4);
    expect(rows).toEqual([
      { index: 10, label: 10, text: 'line 10' },
      { index: 11, label: 1, text: 'line 11' },
      { index: 12, label: 2, text: 'line 12' },
      { index: 13, label: 3, text: 'line 13' },
    ]);
  });

  it('stops at the end of the document', () => {
    expect(visibleLines(doc, 28, 10).map((r) => r.index)).toEqual([28, 29]);
  });
});
