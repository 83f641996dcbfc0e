import type { Mode, ModeKind } from '../../state/Mode.js';
import type { PendingInput } from '../../core/KeyAccumulator.js';
import type { Status } from '../../core/AppController.js';
import { escapeTags, taggedWidth } from '../tags.js';

const HINTS: Record<ModeKind, string> = {
  browse: 'j/k:move h/l:pane enter:open v:mark V:visual y:copy p:paste x:delete /:search s:sort q:quit',
  visual: 'j/k:extend gg/G:ends V/Esc:done',
  text: 'j/k:scroll gg/G:top/bottom enter/Esc:close q:quit',
  image: 'enter/Esc:close q:quit',
  confirmDelete: 'y:delete n/Esc:cancel',
  search: 'enter:done Esc:leave',
  rename: 'enter:rename Esc:cancel',
  sort: 'j/k:choose enter:apply Esc:cancel',
};

const MODE_LABELS: Partial<Record<ModeKind, string>> = {
  visual: '-- VISUAL --',
  text: '-- VIEW --',
  image: '-- IMAGE --',
  confirmDelete: '-- DELETE --',
  sort: '-- SORT --',
};

export interface FooterState {
  mode: Mode;
  status: Status | null;
  pending: PendingInput;
}

/**
 * Left side: the search/rename prompt while one is open, otherwise the last
 * status message, otherwise key hints for the mode.
 */
function formatLeft(state: FooterState): string {
  const { mode, status } = state;
  if (mode.kind === 'search') {
    return `{bold}/{/bold}${escapeTags(mode.query)}{inverse} {/inverse}`;
  }
  if (mode.kind === 'rename') {
    return `{gray-fg}rename:{/gray-fg} ${escapeTags(mode.original)} {gray-fg}->{/gray-fg} ${escapeTags(mode.buffer)}{inverse} {/inverse}`;
  }
  if (status) {
    const color = status.level === 'error' ? 'red' : 'green';
    return `{${color}-fg}${escapeTags(status.message)}{/${color}-fg}`;
  }
  return `{gray-fg}${HINTS[mode.kind]}{/gray-fg}`;
}

/**
 * Right side: keys typed so far in an unfinished sequence, then the mode name.
 */
function formatRight(state: FooterState): string {
  const parts: string[] = [];
  const pending = state.pending.digits + (state.pending.pendingG ? 'g' : '');
  if (pending) {
    parts.push(`{yellow-fg}${pending}{/yellow-fg}`);
  }
  const label = MODE_LABELS[state.mode.kind];
  if (label) {
    parts.push(`{bold}{cyan-fg}${label}{/cyan-fg}{/bold}`);
  }
  return parts.join(' ');
}

/**
 * Format footer content as blessed-compatible tagged string.
 */
export function formatFooter(state: FooterState, width: number): string {
  const leftContent = formatLeft(state);
  const rightContent = formatRight(state);
  if (!rightContent) {
    return leftContent;
  }

  // Calculate padding for right alignment
  const padding = Math.max(1, width - taggedWidth(leftContent) - taggedWidth(rightContent));
  return leftContent + ' '.repeat(padding) + rightContent;
}
