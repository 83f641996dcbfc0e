import * as path from 'node:path';
import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import { escapeTags } from '../tags.js';

const MAX_LISTED = 5;

/**
 * Lines of the delete confirmation box: the count, up to five names, and
 * the key prompt.
 */
export function formatDeleteConfirm(targets: readonly string[], maxNameWidth: number): string[] {
  const lines: string[] = [];
  lines.push(`{bold}{yellow-fg}Delete ${targets.length} item(s)?{/yellow-fg}{/bold}`);
  lines.push('');

  for (const target of targets.slice(0, MAX_LISTED)) {
    const name = path.basename(target);
    const displayName =
      name.length > maxNameWidth ? '...' + name.slice(-(maxNameWidth - 3)) : name;
    lines.push(`{white-fg}${escapeTags(displayName)}{/white-fg}`);
  }
  if (targets.length > MAX_LISTED) {
    lines.push(`{gray-fg}... and ${targets.length - MAX_LISTED} more{/gray-fg}`);
  }
  lines.push('');

  lines.push(
    '{gray-fg}Press {/gray-fg}{green-fg}y{/green-fg}{gray-fg} to confirm, {/gray-fg}{red-fg}n{/red-fg}{gray-fg} or Esc to cancel{/gray-fg}'
  );
  return lines;
}

/**
 * Confirmation box shown while the controller is in the delete prompt.
 * It takes no input of its own; keys go to the controller.
 */
export class DeleteConfirm {
  private box: Widgets.BoxElement;
  private static readonly WIDTH = 50;

  constructor(screen: Widgets.Screen) {
    this.box = blessed.box({
      parent: screen,
      top: 'center',
      left: 'center',
      width: DeleteConfirm.WIDTH,
      height: 7,
      border: {
        type: 'line',
      },
      style: {
        border: {
          fg: 'yellow',
        },
      },
      tags: true,
      hidden: true,
    });
  }

  /** Show the box for `targets`, or hide it when null. */
  update(targets: readonly string[] | null): void {
    if (!targets) {
      this.box.hide();
      return;
    }
    const lines = formatDeleteConfirm(targets, DeleteConfirm.WIDTH - 6);
    this.box.height = lines.length + 2;
    this.box.setContent(lines.join('\n'));
    this.box.show();
    this.box.setFront();
  }
}
