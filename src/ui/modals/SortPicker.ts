import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import { SORT_OPTIONS, type SortKey } from '../../utils/entryOrdering.js';

/**
 * Lines of the sort picker: one per option, the selected one inverted and
 * the pane's current order marked with a check.
 */
export function formatSortPicker(selected: number, current: SortKey): string[] {
  return SORT_OPTIONS.map((option, i) => {
    const check = option.key === current ? '{green-fg}✓{/green-fg}' : ' ';
    const label = ` ${option.label} `;
    return i === selected ? `${check}{inverse}${label}{/inverse}` : `${check}${label}`;
  });
}

/**
 * Sort order picker drawn from controller state. Keys go to the controller.
 */
export class SortPicker {
  private box: Widgets.BoxElement;

  constructor(screen: Widgets.Screen) {
    this.box = blessed.box({
      parent: screen,
      top: 'center',
      left: 'center',
      width: 30,
      height: SORT_OPTIONS.length + 2,
      label: ' Sort By ',
      border: {
        type: 'line',
      },
      style: {
        border: {
          fg: 'cyan',
        },
      },
      tags: true,
      hidden: true,
    });
  }

  /** Show the picker with `selected` highlighted, or hide it when null. */
  update(selected: number | null, current: SortKey): void {
    if (selected === null) {
      this.box.hide();
      return;
    }
    this.box.setContent(formatSortPicker(selected, current).join('\n'));
    this.box.show();
    this.box.setFront();
  }
}
