/**
 * ANSI-aware string truncation.
 *
 * Truncates strings containing ANSI escape codes at a terminal column limit
 * while preserving formatting up to the truncation point. Column widths come
 * from string-width, so wide (CJK, emoji) characters count as two.
 */

import stringWidth from 'string-width';
import { ANSI_PATTERN, ANSI_RESET } from './ansi.js';

/**
 * Terminal columns a string occupies, ignoring ANSI codes.
 */
export function visualLength(str: string): number {
  return stringWidth(str);
}

/**
 * Cut plain text (no ANSI codes) to at most `columns` columns.
 */
function takeColumns(text: string, columns: number): { text: string; width: number } {
  let result = '';
  let width = 0;
  for (const char of text) {
    const charWidth = stringWidth(char);
    if (width + charWidth > columns) break;
    result += char;
    width += charWidth;
  }
  return { text: result, width };
}

/**
 * Truncate a string with ANSI codes to a column limit.
 *
 * @param suffix - appended when the string is cut (default: '…')
 * @returns the string unchanged when it fits, otherwise the cut string with a
 *   reset before the suffix if any ANSI codes were kept
 */
export function truncateAnsi(str: string, maxColumns: number, suffix: string = '…'): string {
  if (maxColumns <= 0) {
    return suffix;
  }
  if (visualLength(str) <= maxColumns) {
    return str;
  }

  const target = maxColumns - stringWidth(suffix);

  if (!str.includes('\x1b')) {
    return takeColumns(str, Math.max(0, target)).text + suffix;
  }

  // Walk text and ANSI segments, keeping codes and cutting text at the limit
  let result = '';
  let width = 0;
  let lastIndex = 0;
  let hasAnsiCodes = false;

  const appendText = (text: string): boolean => {
    const taken = takeColumns(text, Math.max(0, target - width));
    result += taken.text;
    width += taken.width;
    return taken.text.length === text.length;
  };

  for (const match of str.matchAll(ANSI_PATTERN)) {
    const index = match.index ?? 0;
    if (index > lastIndex && !appendText(str.slice(lastIndex, index))) {
      return result + ANSI_RESET + suffix;
    }
    result += match[0];
    hasAnsiCodes = true;
    lastIndex = index + match[0].length;
  }
  appendText(str.slice(lastIndex));

  return result + (hasAnsiCodes ? ANSI_RESET : '') + suffix;
}

/**
 * Pad a string with spaces to exactly `columns` columns, truncating first
 * when it is too wide.
 */
export function fitColumns(str: string, columns: number): string {
  if (columns <= 0) return '';
  const fitted = truncateAnsi(str, columns);
  return fitted + ' '.repeat(Math.max(0, columns - visualLength(fitted)));
}
