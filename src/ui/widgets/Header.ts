import { taggedWidth } from '../tags.js';

/**
 * Format header content as blessed-compatible tagged string: the program name
 * on the left and the clipboard size on the right.
 */
export function formatHeader(clipboardCount: number, width: number): string {
  const leftContent = '{bold}{cyan-fg}duopane{/cyan-fg}{/bold}';
  if (clipboardCount === 0) {
    return leftContent;
  }

  const rightContent = `{gray-fg}clipboard:{/gray-fg} {yellow-fg}${clipboardCount} item(s){/yellow-fg}`;
  const padding = Math.max(1, width - taggedWidth(leftContent) - taggedWidth(rightContent));
  return leftContent + ' '.repeat(padding) + rightContent;
}
