/**
 * Interaction modes. Exactly one is active at a time; the controller
 * switches between them by replacing the whole value.
 */

export type PaneId = 'left' | 'right';

export type Mode =
  | { kind: 'browse' }
  | { kind: 'visual'; anchor: number; baseMarks: ReadonlySet<string> }
  | { kind: 'text'; path: string; scrollLine: number; totalLines: number }
  | { kind: 'image'; path: string; pane: PaneId }
  | { kind: 'confirmDelete'; targets: string[] }
  | { kind: 'search'; query: string; origin: number }
  | { kind: 'rename'; path: string; original: string; buffer: string }
  | { kind: 'sort'; selected: number };

export type ModeKind = Mode['kind'];

export const BROWSE: Mode = { kind: 'browse' };

export function oppositePane(pane: PaneId): PaneId {
  return pane === 'left' ? 'right' : 'left';
}

/**
 * Prompt modes consume every key themselves: no count prefixes,
 * no multi-key sequences, no global quit.
 */
export function isPromptMode(mode: Mode): boolean {
  switch (mode.kind) {
    case 'confirmDelete':
    case 'search':
    case 'rename':
    case 'sort':
      return true;
    default:
      return false;
  }
}
