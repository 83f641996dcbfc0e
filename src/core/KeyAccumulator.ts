/**
 * Turns single key presses into commands, buffering vim-style count
 * prefixes ("4j") and the two-key "gg" sequence.
 */

export type CommandType =
  | 'moveDown'
  | 'moveUp'
  | 'gotoTop'
  | 'gotoBottom'
  | 'toggleVisual'
  | 'left'
  | 'right'
  | 'enter'
  | 'toggleMark'
  | 'copy'
  | 'paste'
  | 'delete'
  | 'deleteNow'
  | 'quit'
  | 'cancel'
  | 'search'
  | 'rename'
  | 'sort';

export interface Command {
  type: CommandType;
  count: number;
}

export type KeyResolution =
  | { kind: 'pending' }
  | { kind: 'command'; command: Command }
  | { kind: 'ignored'; key: string };

export const DEFAULT_KEYMAP: Readonly<Record<string, CommandType>> = {
  j: 'moveDown',
  down: 'moveDown',
  k: 'moveUp',
  up: 'moveUp',
  G: 'gotoBottom',
  V: 'toggleVisual',
  h: 'left',
  left: 'left',
  l: 'right',
  right: 'right',
  enter: 'enter',
  v: 'toggleMark',
  y: 'copy',
  p: 'paste',
  x: 'delete',
  X: 'deleteNow',
  q: 'quit',
  escape: 'cancel',
  '/': 'search',
  r: 'rename',
  s: 'sort',
};

/** Commands whose count is meaningless and always resolves to 1. */
const COUNT_DISCARDED: ReadonlySet<CommandType> = new Set(['gotoTop', 'gotoBottom']);

export const MAX_COUNT = 99999;

export interface PendingInput {
  digits: string;
  pendingG: boolean;
}

export class KeyAccumulator {
  private digits = '';
  private pendingG = false;

  constructor(private keymap: Readonly<Record<string, CommandType>> = DEFAULT_KEYMAP) {}

  get pending(): PendingInput {
    return { digits: this.digits, pendingG: this.pendingG };
  }

  /** Count the buffered digits would give the next command. */
  get count(): number {
    if (!this.digits) return 1;
    return Math.min(Number.parseInt(this.digits, 10), MAX_COUNT);
  }

  reset(): void {
    this.digits = '';
    this.pendingG = false;
  }

  feed(key: string): KeyResolution {
    if (this.pendingG) {
      this.pendingG = false;
      if (key === 'g') {
        return this.resolve('gotoTop');
      }
      // Cancelled sequence: drop the count too, then treat the key as fresh
      this.digits = '';
      return this.feed(key);
    }

    if (isDigit(key) && (key !== '0' || this.digits !== '')) {
      this.digits += key;
      return { kind: 'pending' };
    }

    if (key === '0') {
      return this.resolve('gotoTop');
    }

    if (key === 'g') {
      this.pendingG = true;
      return { kind: 'pending' };
    }

    const type = Object.hasOwn(this.keymap, key) ? this.keymap[key] : undefined;
    if (!type) {
      this.reset();
      return { kind: 'ignored', key };
    }
    return this.resolve(type);
  }

  private resolve(type: CommandType): KeyResolution {
    const count = COUNT_DISCARDED.has(type) ? 1 : this.count;
    this.reset();
    return { kind: 'command', command: { type, count } };
  }
}

function isDigit(key: string): boolean {
  return key.length === 1 && key >= '0' && key <= '9';
}
