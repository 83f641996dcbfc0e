import type { Widgets } from 'blessed';

/**
 * Actions that keyboard bindings can trigger.
 * App implements this interface and passes itself.
 */
export interface KeyBindingActions {
  pressKey(key: string): void;
  exit(): void;
}

/** The parts of a blessed key event the normalizer reads. */
export type KeyEvent = Pick<Widgets.Events.IKeyEventArg, 'name' | 'ctrl' | 'meta'>;

const NAMED_KEYS: ReadonlySet<string> = new Set([
  'enter',
  'escape',
  'backspace',
  'up',
  'down',
  'left',
  'right',
]);

/**
 * Turn a blessed keypress into the key name the controller understands:
 * one of the named keys, or the typed character. Returns null for keys the
 * file manager has no use for.
 *
 * blessed reports Enter twice, as 'return' followed by 'enter'; only the
 * second one is passed on.
 */
export function normalizeKey(ch: string | undefined, key: KeyEvent | undefined): string | null {
  if (key?.ctrl || key?.meta) return null;

  const name = key?.name;
  if (name === 'return') return null;
  if (name && NAMED_KEYS.has(name)) return name;

  if (ch && ch.length === 1 && ch >= ' ' && ch !== '\x7f') return ch;
  return null;
}

/**
 * Register keyboard handling on the blessed screen.
 */
export function setupKeyBindings(screen: Widgets.Screen, actions: KeyBindingActions): void {
  // Always available, whatever mode the controller is in
  screen.key(['C-c'], () => {
    actions.exit();
  });

  screen.on('keypress', (ch: string | undefined, key: KeyEvent | undefined) => {
    const normalized = normalizeKey(ch, key);
    if (normalized !== null) {
      actions.pressKey(normalized);
    }
  });
}
