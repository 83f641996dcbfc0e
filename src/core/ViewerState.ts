import * as path from 'node:path';
import type { FileContent } from './FileSystem.js';
import { DecodeError } from './errors.js';
import { clampIndex } from './PaneState.js';

export const DEFAULT_MAX_TEXT_FILE_SIZE = 1024 * 1024; // 1MB

const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  'png',
  'jpg',
  'jpeg',
  'gif',
  'bmp',
  'tiff',
  'tif',
  'webp',
  'avif',
]);

/**
 * Image detection by file extension.
 */
export function isImagePath(filePath: string): boolean {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return IMAGE_EXTENSIONS.has(ext);
}

/**
 * Check if content appears to be binary.
 */
export function isBinaryContent(buffer: Buffer): boolean {
  // Check first 8KB for null bytes (common in binary files)
  const checkLength = Math.min(buffer.length, 8192);
  for (let i = 0; i < checkLength; i++) {
    if (buffer[i] === 0) return true;
  }
  return false;
}

export interface TextDocument {
  path: string;
  lines: string[];
  truncated: boolean;
}

/**
 * Decode file content for the text viewer.
 * @throws DecodeError when the content looks binary
 */
export function decodeTextDocument(filePath: string, content: FileContent): TextDocument {
  if (isBinaryContent(content.data)) {
    throw new DecodeError(filePath, 'binary file, cannot display as text');
  }
  let text = content.data.toString('utf-8');
  if (text.endsWith('\n')) text = text.slice(0, -1);
  const lines = text === '' ? [] : text.split(/\r?\n/);
  return { path: filePath, lines, truncated: content.truncated };
}

/** Clamp a scroll line into [0, totalLines-1]. */
export function clampScrollLine(line: number, totalLines: number): number {
  return clampIndex(line, totalLines);
}

/**
 * Number shown beside line `index`: the distance from `scrollLine`, or the
 * line's own index on the scroll line itself.
 */
export function relativeLineNumber(index: number, scrollLine: number): number {
  return index === scrollLine ? index : Math.abs(index - scrollLine);
}

export interface VisibleLine {
  index: number;
  label: number;
  text: string;
}

/**
 * Lines visible in a viewer of `height` rows whose top row is `scrollLine`.
 */
export function visibleLines(
  doc: TextDocument,
  scrollLine: number,
  height: number
): VisibleLine[] {
  const start = clampScrollLine(scrollLine, doc.lines.length);
  return doc.lines.slice(start, start + Math.max(0, height)).map((text, i) => ({
    index: start + i,
    label: relativeLineNumber(start + i, start),
    text,
  }));
}
