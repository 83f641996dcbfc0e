import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import * as path from 'node:path';
import { LayoutManager, innerSize } from './ui/Layout.js';
import { setupKeyBindings } from './KeyBindings.js';
import { formatHeader } from './ui/widgets/Header.js';
import { formatFooter } from './ui/widgets/Footer.js';
import { formatPaneLabel, formatPaneView } from './ui/widgets/PaneView.js';
import { formatTextViewer, formatViewerLabel } from './ui/widgets/TextViewer.js';
import { ImagePreview } from './ui/widgets/ImagePreview.js';
import { DeleteConfirm } from './ui/modals/DeleteConfirm.js';
import { SortPicker } from './ui/modals/SortPicker.js';
import { escapeTags } from './ui/tags.js';
import { AppController } from './core/AppController.js';
import { NodeFileSystem } from './core/FileSystem.js';
import type { PaneId } from './state/Mode.js';
import type { Config } from './config.js';
import * as logger from './utils/logger.js';

export interface AppOptions {
  config: Config;
  initialPath?: string;
}

/**
 * Terminal front end.
 * Forwards keys to the AppController and redraws the blessed widgets from
 * its state after every change.
 */
export class App {
  private screen: Widgets.Screen;
  private layout: LayoutManager;
  private controller: AppController;
  private deleteConfirm: DeleteConfirm;
  private sortPicker: SortPicker;
  private imagePreview: ImagePreview;

  constructor(options: AppOptions) {
    const { config } = options;

    // Create blessed screen
    this.screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title: 'duopane',
      terminal: 'xterm-256color',
    });

    this.layout = new LayoutManager(this.screen);

    this.controller = new AppController({
      fs: new NodeFileSystem(),
      initialDirectory: options.initialPath ?? process.cwd(),
      sortKey: config.sortBy,
      maxTextFileSize: config.maxTextFileSize,
      showImages: config.showImages,
      viewportHeight: this.layout.dimensions.listHeight,
    });
    logger.debug(`started in ${this.controller.left.directory}`);

    this.deleteConfirm = new DeleteConfirm(this.screen);
    this.sortPicker = new SortPicker(this.screen);
    this.imagePreview = new ImagePreview(
      () => this.render(),
      (filePath, err) => this.controller.reportImageFailure(filePath, err)
    );

    setupKeyBindings(this.screen, {
      pressKey: (key) => this.controller.pressKey(key),
      exit: () => this.exit(),
    });

    this.controller.on('state-change', () => this.render());
    this.controller.on('quit', () => this.exit());

    // Handle screen resize - re-render content
    // Use setImmediate to ensure screen dimensions are fully updated
    this.screen.on('resize', () => {
      setImmediate(() => {
        this.controller.setViewportHeight(this.layout.dimensions.listHeight);
        this.render();
      });
    });

    this.render();
  }

  private render(): void {
    const { width } = this.layout.dimensions;
    const mode = this.controller.mode;

    this.layout.headerBox.setContent(formatHeader(this.controller.clipboard.paths.length, width));
    this.layout.footerBox.setContent(
      formatFooter(
        {
          mode,
          status: this.controller.status,
          pending: this.controller.pendingInput,
        },
        width
      )
    );

    const doc = this.controller.document;
    if (mode.kind === 'text' && doc) {
      this.renderViewer(formatViewerLabel(doc), (w, h) => formatTextViewer(doc, mode.scrollLine, w, h));
    } else {
      this.layout.viewerBox.hide();
      this.renderPane('left');
      this.renderPane('right');
    }

    if (mode.kind !== 'image') {
      this.imagePreview.clear();
    }

    this.deleteConfirm.update(mode.kind === 'confirmDelete' ? mode.targets : null);
    this.sortPicker.update(
      mode.kind === 'sort' ? mode.selected : null,
      this.controller.activePane.sortKey
    );

    this.screen.render();
  }

  private renderViewer(label: string, format: (width: number, height: number) => string): void {
    const box = this.layout.viewerBox;
    const { width, height } = innerSize(box);
    this.layout.leftPane.hide();
    this.layout.rightPane.hide();
    box.setLabel(label);
    box.setContent(format(width, height));
    box.show();
  }

  private renderPane(id: PaneId): void {
    const box = this.layout.paneBox(id);
    const { width, height } = innerSize(box);
    const mode = this.controller.mode;
    const isActive = this.controller.active === id;

    if (mode.kind === 'image' && mode.pane === id) {
      box.setLabel(` {bold}${escapeTags(path.basename(mode.path))}{/bold} `);
      box.setContent(this.imagePreview.contentFor(mode.path, width, height));
    } else {
      const pane = this.controller.pane(id);
      box.setLabel(formatPaneLabel(pane, isActive));
      box.setContent(formatPaneView(pane, isActive, width, height));
    }
    box.style.border.fg = isActive ? 'yellow' : 'gray';
    box.show();
  }

  exit(): void {
    this.imagePreview.clear();
    // Destroy screen (this will clean up terminal)
    this.screen.destroy();
  }

  /**
   * Start the application (returns when app exits).
   */
  start(): Promise<void> {
    return new Promise((resolve) => {
      this.screen.on('destroy', () => {
        resolve();
      });
    });
  }
}
