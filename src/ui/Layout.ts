import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';

/** Header (1) + footer (1). */
const LAYOUT_OVERHEAD = 2;
/** Border rows/columns around each pane and the viewer. */
const BORDER = 2;

export interface LayoutDimensions {
  width: number;
  height: number;
  headerHeight: number;
  contentTop: number;
  contentHeight: number;
  leftWidth: number;
  rightLeft: number;
  rightWidth: number;
  /** Rows available for entries inside a bordered pane. */
  listHeight: number;
  footerRow: number;
}

/**
 * Calculate layout dimensions from the terminal size: two side-by-side panes
 * between a one-line header and a one-line footer.
 */
export function calculateLayout(terminalHeight: number, terminalWidth: number): LayoutDimensions {
  const headerHeight = 1;
  const contentHeight = Math.max(BORDER + 1, terminalHeight - LAYOUT_OVERHEAD);
  const leftWidth = Math.floor(terminalWidth / 2);

  return {
    width: terminalWidth,
    height: terminalHeight,
    headerHeight,
    contentTop: headerHeight,
    contentHeight,
    leftWidth,
    rightLeft: leftWidth,
    rightWidth: terminalWidth - leftWidth,
    listHeight: contentHeight - BORDER,
    footerRow: terminalHeight - 1,
  };
}

/** Inner size of a bordered box. */
export function innerSize(box: Widgets.BoxElement): { width: number; height: number } {
  const width = typeof box.width === 'number' ? box.width : 0;
  const height = typeof box.height === 'number' ? box.height : 0;
  return { width: Math.max(0, width - BORDER), height: Math.max(0, height - BORDER) };
}

/**
 * LayoutManager creates and manages the blessed boxes: header, the two pane
 * boxes, a full-width viewer box that covers both panes, and the footer.
 */
export class LayoutManager {
  public screen: Widgets.Screen;
  public headerBox: Widgets.BoxElement;
  public leftPane: Widgets.BoxElement;
  public rightPane: Widgets.BoxElement;
  public viewerBox: Widgets.BoxElement;
  public footerBox: Widgets.BoxElement;

  private _dimensions: LayoutDimensions;

  constructor(screen: Widgets.Screen) {
    this.screen = screen;
    this._dimensions = this.calculateDimensions();

    this.headerBox = this.createLineBox(0);
    this.leftPane = this.createFramedBox(this._dimensions.leftWidth, 0);
    this.rightPane = this.createFramedBox(this._dimensions.rightWidth, this._dimensions.rightLeft);
    this.viewerBox = this.createFramedBox(this._dimensions.width, 0);
    this.viewerBox.hide();
    this.footerBox = this.createLineBox(this._dimensions.footerRow);

    // Handle screen resize
    screen.on('resize', () => this.updateLayout());
  }

  get dimensions(): LayoutDimensions {
    return this._dimensions;
  }

  paneBox(id: 'left' | 'right'): Widgets.BoxElement {
    return id === 'left' ? this.leftPane : this.rightPane;
  }

  private calculateDimensions(): LayoutDimensions {
    const height = typeof this.screen.height === 'number' ? this.screen.height : 24;
    const width = typeof this.screen.width === 'number' ? this.screen.width : 80;
    return calculateLayout(height || 24, width || 80);
  }

  private createLineBox(top: number): Widgets.BoxElement {
    return blessed.box({
      parent: this.screen,
      top,
      left: 0,
      width: '100%',
      height: 1,
      tags: true,
    });
  }

  private createFramedBox(width: number, left: number): Widgets.BoxElement {
    return blessed.box({
      parent: this.screen,
      top: this._dimensions.contentTop,
      left,
      width,
      height: this._dimensions.contentHeight,
      tags: true,
      border: {
        type: 'line',
      },
      style: {
        border: {
          fg: 'gray',
        },
      },
    });
  }

  private updateLayout(): void {
    this._dimensions = this.calculateDimensions();
    const d = this._dimensions;

    this.leftPane.width = d.leftWidth;
    this.leftPane.height = d.contentHeight;

    this.rightPane.left = d.rightLeft;
    this.rightPane.width = d.rightWidth;
    this.rightPane.height = d.contentHeight;

    this.viewerBox.width = d.width;
    this.viewerBox.height = d.contentHeight;

    this.footerBox.top = d.footerRow;
  }
}
