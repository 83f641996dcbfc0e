import * as path from 'node:path';
import { EventEmitter } from 'node:events';
import type { Entry, FileSystem } from './FileSystem.js';
import { PaneState, DEFAULT_VIEWPORT_HEIGHT, type ListingFocus } from './PaneState.js';
import { Clipboard, describePasteReport, type PasteIssue } from './Clipboard.js';
import { KeyAccumulator, type Command, type PendingInput } from './KeyAccumulator.js';
import {
  DEFAULT_MAX_TEXT_FILE_SIZE,
  clampScrollLine,
  decodeTextDocument,
  isImagePath,
  type TextDocument,
} from './ViewerState.js';
import { formatError } from './errors.js';
import { BROWSE, isPromptMode, oppositePane, type Mode, type PaneId } from '../state/Mode.js';
import { SORT_OPTIONS, findMatch, type SortKey } from '../utils/entryOrdering.js';
import * as logger from '../utils/logger.js';

export interface Status {
  level: 'info' | 'error';
  message: string;
}

export interface AppControllerOptions {
  fs: FileSystem;
  initialDirectory: string;
  sortKey?: SortKey;
  maxTextFileSize?: number;
  showImages?: boolean;
  viewportHeight?: number;
}

type AppControllerEventMap = {
  'state-change': [];
  quit: [];
};

type ModeOf<K extends Mode['kind']> = Extract<Mode, { kind: K }>;

function isPrintable(key: string): boolean {
  return key.length === 1 && key >= ' ';
}

function isValidEntryName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\0');
}

/**
 * Owns both panes, the clipboard, the interaction mode and pending key input.
 *
 * Keys come in through `pressKey`, are resolved into commands by the
 * KeyAccumulator (or handed straight to the active prompt) and applied
 * synchronously. Every change ends with a 'state-change' event; the
 * renderer draws from the getters.
 */
export class AppController extends EventEmitter<AppControllerEventMap> {
  readonly left: PaneState;
  readonly right: PaneState;
  readonly clipboard = new Clipboard();

  private fs: FileSystem;
  private accumulator = new KeyAccumulator();
  private maxTextFileSize: number;
  private showImages: boolean;

  private _active: PaneId = 'left';
  private _mode: Mode = BROWSE;
  private _document: TextDocument | null = null;
  private _status: Status | null = null;
  private _quitRequested = false;

  constructor(options: AppControllerOptions) {
    super();
    this.fs = options.fs;
    this.maxTextFileSize = options.maxTextFileSize ?? DEFAULT_MAX_TEXT_FILE_SIZE;
    this.showImages = options.showImages ?? true;

    const sortKey = options.sortKey ?? 'name';
    const height = options.viewportHeight ?? DEFAULT_VIEWPORT_HEIGHT;
    const dir = path.resolve(options.initialDirectory);
    this.left = new PaneState(dir, sortKey, height);
    this.right = new PaneState(dir, sortKey, height);

    const entries = this.listDirectory(dir);
    if (entries) {
      this.left.setListing(dir, entries, { resetCursor: true });
      this.right.setListing(dir, entries, { resetCursor: true });
    }
  }

  get active(): PaneId {
    return this._active;
  }

  get activePane(): PaneState {
    return this.pane(this._active);
  }

  get inactivePane(): PaneState {
    return this.pane(oppositePane(this._active));
  }

  get mode(): Mode {
    return this._mode;
  }

  get document(): TextDocument | null {
    return this._document;
  }

  get status(): Status | null {
    return this._status;
  }

  get pendingInput(): PendingInput {
    return this.accumulator.pending;
  }

  get quitRequested(): boolean {
    return this._quitRequested;
  }

  pane(id: PaneId): PaneState {
    return id === 'left' ? this.left : this.right;
  }

  setViewportHeight(rows: number): void {
    this.left.setViewportHeight(rows);
    this.right.setViewportHeight(rows);
  }

  /**
   * Feed one raw key. Prompts receive keys directly; every other mode goes
   * through the key accumulator.
   */
  pressKey(key: string): void {
    if (isPromptMode(this._mode)) {
      this.accumulator.reset();
      this._status = null;
      this.handlePromptKey(key);
      this.emit('state-change');
      return;
    }

    const result = this.accumulator.feed(key);
    if (result.kind === 'command') {
      this.apply(result.command);
      return;
    }
    this.emit('state-change');
  }

  /**
   * Apply one resolved command to the current mode.
   */
  apply(command: Command): void {
    this._status = null;
    const mode = this._mode;
    switch (mode.kind) {
      case 'browse':
        this.applyBrowse(command);
        break;
      case 'visual':
        this.applyVisual(mode, command);
        break;
      case 'text':
        this.applyText(mode, command);
        break;
      case 'image':
        this.applyImage(command);
        break;
      default:
        if (command.type === 'enter') this.handlePromptKey('enter');
        else if (command.type === 'cancel') this.handlePromptKey('escape');
        break;
    }
    this.emit('state-change');
  }

  /**
   * Called by the renderer when an image could not be decoded. Ignored
   * unless that image is still on screen.
   */
  reportImageFailure(imagePath: string, err: unknown): void {
    const mode = this._mode;
    if (mode.kind !== 'image' || mode.path !== imagePath) return;
    this._mode = BROWSE;
    this.setError(`Cannot display ${path.basename(imagePath)}: ${formatError(err)}`);
    this.emit('state-change');
  }

  // --- Browse ---------------------------------------------------------------

  private applyBrowse(command: Command): void {
    const pane = this.activePane;
    switch (command.type) {
      case 'moveDown':
        pane.moveDown(command.count);
        break;
      case 'moveUp':
        pane.moveUp(command.count);
        break;
      case 'gotoTop':
        pane.gotoTop();
        break;
      case 'gotoBottom':
        pane.gotoBottom();
        break;
      case 'toggleVisual':
        this.enterVisual();
        break;
      case 'left':
      case 'right':
        this.moveHorizontally(command.type);
        break;
      case 'enter':
        this.openCursorEntry();
        break;
      case 'toggleMark':
        pane.toggleMark();
        break;
      case 'copy':
        this.copySelection();
        break;
      case 'paste':
        this.pasteClipboard();
        break;
      case 'delete': {
        const targets = pane.selectionTargets();
        if (targets.length > 0) this._mode = { kind: 'confirmDelete', targets };
        break;
      }
      case 'deleteNow':
        this.deleteTargets(pane.selectionTargets());
        break;
      case 'quit':
        this.requestQuit();
        break;
      case 'cancel':
        break;
      case 'search':
        this._mode = { kind: 'search', query: '', origin: pane.cursor };
        break;
      case 'rename': {
        const entry = pane.currentEntry;
        if (entry) {
          this._mode = { kind: 'rename', path: entry.path, original: entry.name, buffer: entry.name };
        }
        break;
      }
      case 'sort': {
        const selected = SORT_OPTIONS.findIndex((o) => o.key === pane.sortKey);
        this._mode = { kind: 'sort', selected: Math.max(0, selected) };
        break;
      }
    }
  }

  private enterVisual(): void {
    const pane = this.activePane;
    const entry = pane.currentEntry;
    if (!entry) return;
    const baseMarks = new Set(pane.marked);
    this._mode = { kind: 'visual', anchor: pane.cursor, baseMarks };
    pane.setMarks([...baseMarks, entry.path]);
  }

  /**
   * `l` from the left pane and `h` from the right pane cross over to the
   * other pane; the outward key goes to the parent directory instead.
   */
  private moveHorizontally(direction: 'left' | 'right'): void {
    const inward =
      (this._active === 'left' && direction === 'right') ||
      (this._active === 'right' && direction === 'left');
    if (inward) {
      this._active = oppositePane(this._active);
    } else {
      this.gotoParentDirectory();
    }
  }

  private gotoParentDirectory(): void {
    const pane = this.activePane;
    const current = pane.directory;
    const parent = path.dirname(current);
    if (parent === current) return;

    const entries = this.listDirectory(parent);
    if (!entries) return;
    pane.setListing(parent, entries, { path: current });
  }

  private openCursorEntry(): void {
    const pane = this.activePane;
    const entry = pane.currentEntry;
    if (!entry) return;

    if (entry.isDirectory) {
      const entries = this.listDirectory(entry.path);
      if (entries) pane.setListing(entry.path, entries, { resetCursor: true });
      return;
    }

    if (this.showImages && isImagePath(entry.path)) {
      this._mode = { kind: 'image', path: entry.path, pane: oppositePane(this._active) };
      return;
    }

    this.openTextViewer(entry);
  }

  private openTextViewer(entry: Entry): void {
    let doc: TextDocument;
    try {
      doc = decodeTextDocument(entry.path, this.fs.readFile(entry.path, this.maxTextFileSize));
    } catch (err) {
      logger.debug(`open ${entry.path} failed: ${formatError(err)}`);
      this.setError(`Cannot open ${entry.name}: ${formatError(err)}`);
      return;
    }
    this._document = doc;
    this._mode = { kind: 'text', path: entry.path, scrollLine: 0, totalLines: doc.lines.length };
  }

  private copySelection(): void {
    const targets = this.activePane.selectionTargets();
    if (targets.length === 0) {
      this.setInfo('Nothing to copy');
      return;
    }
    this.clipboard.copy(targets, this._active);
    this.setInfo(`Copied ${targets.length} item(s)`);
  }

  private pasteClipboard(): void {
    if (this.clipboard.isEmpty) {
      this.setInfo('Clipboard is empty');
      return;
    }
    const report = this.clipboard.paste(this.fs, this.activePane.directory);
    for (const issue of report.failed) {
      logger.debug(`paste ${issue.path} failed: ${issue.reason}`);
    }
    this.refreshAfterMutation();

    const message = describePasteReport(report);
    if (report.failed.length > 0) this.setError(message);
    else this.setInfo(message);
  }

  private deleteTargets(targets: readonly string[]): void {
    if (targets.length === 0) return;

    const removed: string[] = [];
    const failed: PasteIssue[] = [];
    for (const target of targets) {
      try {
        this.fs.remove(target);
        removed.push(target);
      } catch (err) {
        logger.debug(`delete ${target} failed: ${formatError(err)}`);
        failed.push({ path: target, reason: formatError(err) });
      }
    }
    // Marks must go even when the reload below fails
    this.left.unmark(removed);
    this.right.unmark(removed);
    this.refreshAfterMutation();

    const deleted = removed.length;
    if (failed.length === 0) {
      this.setInfo(`Deleted ${deleted} item(s)`);
      return;
    }
    const details = failed.map((f) => `${path.basename(f.path)} (${f.reason})`).join(', ');
    this.setError(`Deleted ${deleted} item(s); failed ${failed.length}: ${details}`);
  }

  // --- Visual select --------------------------------------------------------

  private applyVisual(mode: ModeOf<'visual'>, command: Command): void {
    const pane = this.activePane;
    switch (command.type) {
      case 'moveDown':
        pane.moveDown(command.count);
        break;
      case 'moveUp':
        pane.moveUp(command.count);
        break;
      case 'gotoTop':
        pane.gotoTop();
        break;
      case 'gotoBottom':
        pane.gotoBottom();
        break;
      case 'toggleVisual':
      case 'cancel':
        this._mode = BROWSE;
        return;
      case 'quit':
        this.requestQuit();
        return;
      default:
        return;
    }
    pane.setMarks([...mode.baseMarks, ...pane.rangePaths(mode.anchor, pane.cursor)]);
  }

  // --- Viewers --------------------------------------------------------------

  private applyText(mode: ModeOf<'text'>, command: Command): void {
    let line = mode.scrollLine;
    switch (command.type) {
      case 'moveDown':
        line += command.count;
        break;
      case 'moveUp':
        line -= command.count;
        break;
      case 'gotoTop':
        line = 0;
        break;
      case 'gotoBottom':
        line = mode.totalLines - 1;
        break;
      case 'enter':
      case 'cancel':
        this.closeViewer();
        return;
      case 'quit':
        this.requestQuit();
        return;
      default:
        return;
    }
    this._mode = { ...mode, scrollLine: clampScrollLine(line, mode.totalLines) };
  }

  private applyImage(command: Command): void {
    if (command.type === 'enter' || command.type === 'cancel') {
      this.closeViewer();
    } else if (command.type === 'quit') {
      this.requestQuit();
    }
  }

  private closeViewer(): void {
    this._mode = BROWSE;
    this._document = null;
  }

  // --- Prompts --------------------------------------------------------------

  private handlePromptKey(key: string): void {
    const mode = this._mode;
    switch (mode.kind) {
      case 'confirmDelete':
        this.handleConfirmKey(mode, key);
        break;
      case 'search':
        this.handleSearchKey(mode, key);
        break;
      case 'rename':
        this.handleRenameKey(mode, key);
        break;
      case 'sort':
        this.handleSortKey(mode, key);
        break;
      default:
        break;
    }
  }

  private handleConfirmKey(mode: ModeOf<'confirmDelete'>, key: string): void {
    if (key === 'y' || key === 'Y' || key === 'enter') {
      this._mode = BROWSE;
      this.deleteTargets(mode.targets);
    } else if (key === 'n' || key === 'N' || key === 'escape' || key === 'q') {
      this._mode = BROWSE;
      this.setInfo('Delete cancelled');
    }
  }

  private handleSearchKey(mode: ModeOf<'search'>, key: string): void {
    if (key === 'enter' || key === 'escape') {
      this._mode = BROWSE;
      return;
    }

    let query = mode.query;
    if (key === 'backspace') {
      query = query.slice(0, -1);
    } else if (isPrintable(key)) {
      query += key;
    } else {
      return;
    }
    this._mode = { ...mode, query };

    const pane = this.activePane;
    if (!query) {
      pane.setCursor(mode.origin);
      return;
    }
    const match = findMatch(pane.entries, query, mode.origin);
    if (match !== null) pane.setCursor(match);
  }

  private handleRenameKey(mode: ModeOf<'rename'>, key: string): void {
    if (key === 'escape') {
      this._mode = BROWSE;
    } else if (key === 'enter') {
      this._mode = BROWSE;
      this.commitRename(mode);
    } else if (key === 'backspace') {
      this._mode = { ...mode, buffer: mode.buffer.slice(0, -1) };
    } else if (isPrintable(key)) {
      this._mode = { ...mode, buffer: mode.buffer + key };
    }
  }

  private commitRename(mode: ModeOf<'rename'>): void {
    const name = mode.buffer;
    if (name === mode.original) return;
    if (!isValidEntryName(name)) {
      this.setError(`Invalid name: "${name}"`);
      return;
    }

    const target = path.join(path.dirname(mode.path), name);
    if (this.fs.exists(target)) {
      this.setError(`Cannot rename ${mode.original}: ${name} already exists`);
      return;
    }

    try {
      this.fs.rename(mode.path, target);
    } catch (err) {
      logger.debug(`rename ${mode.path} failed: ${formatError(err)}`);
      this.setError(`Cannot rename ${mode.original}: ${formatError(err)}`);
      return;
    }

    const pane = this.activePane;
    if (pane.isMarked(mode.path)) {
      pane.setMarks([...pane.marked].map((p) => (p === mode.path ? target : p)));
    }
    this.refreshAfterMutation({ path: target });
    this.setInfo(`Renamed ${mode.original} to ${name}`);
  }

  private handleSortKey(mode: ModeOf<'sort'>, key: string): void {
    const total = SORT_OPTIONS.length;
    switch (key) {
      case 'j':
      case 'down':
        this._mode = { ...mode, selected: (mode.selected + 1) % total };
        break;
      case 'k':
      case 'up':
        this._mode = { ...mode, selected: (mode.selected + total - 1) % total };
        break;
      case 'enter':
        this._mode = BROWSE;
        this.activePane.setSortKey(SORT_OPTIONS[mode.selected].key);
        break;
      case 'escape':
      case 'q':
        this._mode = BROWSE;
        break;
      default:
        break;
    }
  }

  // --- Helpers --------------------------------------------------------------

  private listDirectory(dir: string): Entry[] | null {
    try {
      return this.fs.listDirectory(dir);
    } catch (err) {
      logger.debug(`list ${dir} failed: ${formatError(err)}`);
      this.setError(`Cannot read ${dir}: ${formatError(err)}`);
      return null;
    }
  }

  /**
   * Reload the active pane after a paste, delete or rename, plus the other
   * pane when it shows the same directory or its directory is gone.
   */
  private refreshAfterMutation(focus: ListingFocus = {}): void {
    const activeDir = this.activePane.directory;
    this.reloadPane(this.activePane, focus);

    const other = this.inactivePane;
    if (other.directory === activeDir || !this.fs.exists(other.directory)) {
      this.reloadPane(other);
    }
  }

  /** Reload a pane, climbing to the nearest existing ancestor if needed. */
  private reloadPane(pane: PaneState, focus: ListingFocus = {}): void {
    let dir = pane.directory;
    while (!this.fs.exists(dir) && path.dirname(dir) !== dir) {
      dir = path.dirname(dir);
    }
    const entries = this.listDirectory(dir);
    if (entries) pane.setListing(dir, entries, focus);
  }

  private requestQuit(): void {
    this._quitRequested = true;
    this.emit('quit');
  }

  private setInfo(message: string): void {
    this._status = { level: 'info', message };
  }

  private setError(message: string): void {
    this._status = { level: 'error', message };
  }
}
