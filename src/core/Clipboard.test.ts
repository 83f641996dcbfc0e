import { describe, it, expect, beforeEach } from 'vitest';
import { Clipboard, describePasteReport } from './Clipboard.js';
import { MemoryFileSystem } from './test-helpers.js';

describe('Clipboard', () => {
  let fs: MemoryFileSystem;
  let clipboard: Clipboard;

  beforeEach(() => {
    fs = new MemoryFileSystem()
      .writeFile('/src/a.txt', 'alpha')
      .writeFile('/src/b.txt', 'beta')
      .writeFile('/src/dir/inner.txt', 'inner')
      .mkdir('/dest');
    clipboard = new Clipboard();
  });

  it('starts empty', () => {
    expect(clipboard.isEmpty).toBe(true);
    expect(clipboard.sourcePane).toBeNull();
  });

  it('replaces its contents on every copy', () => {
    clipboard.copy(['/src/a.txt'], 'left');
    clipboard.copy(['/src/b.txt'], 'right');
    expect(clipboard.paths).toEqual(['/src/b.txt']);
    expect(clipboard.sourcePane).toBe('right');
  });

  it('pastes files into the destination directory', () => {
    clipboard.copy(['/src/a.txt', '/src/b.txt'], 'left');
    const report = clipboard.paste(fs, '/dest');
    expect(report).toEqual({
      copied: ['/dest/a.txt', '/dest/b.txt'],
      skipped: [],
      failed: [],
    });
    expect(fs.read('/dest/a.txt')).toBe('alpha');
  });

  it('copies directories recursively', () => {
    clipboard.copy(['/src/dir'], 'left');
    clipboard.paste(fs, '/dest');
    expect(fs.read('/dest/dir/inner.txt')).toBe('inner');
  });

  it('skips names that already exist and never overwrites them', () => {
    fs.writeFile('/dest/b.txt', 'original');
    clipboard.copy(['/src/a.txt', '/src/b.txt'], 'left');
    const report = clipboard.paste(fs, '/dest');
    expect(report.copied).toEqual(['/dest/a.txt']);
    expect(report.skipped).toEqual([{ path: '/src/b.txt', reason: 'already exists' }]);
    expect(fs.read('/dest/b.txt')).toBe('original');
  });

  it('skips every entry when pasting back into the source directory', () => {
    clipboard.copy(['/src/a.txt', '/src/b.txt'], 'left');
    const report = clipboard.paste(fs, '/src');
    expect(report.copied).toEqual([]);
    expect(report.skipped.map((s) => s.path)).toEqual(['/src/a.txt', '/src/b.txt']);
  });

  it('refuses to copy a directory into its own subtree', () => {
    clipboard.copy(['/src/dir'], 'left');
    fs.mkdir('/src/dir/nested');
    const report = clipboard.paste(fs, '/src/dir/nested');
    expect(report.skipped).toEqual([
      { path: '/src/dir', reason: 'cannot copy a directory into itself' },
    ]);
    expect(fs.exists('/src/dir/nested/dir')).toBe(false);
  });

  it('treats a child named like "..b" as part of the subtree', () => {
    clipboard.copy(['/src/dir'], 'left');
    fs.mkdir('/src/dir/..b');
    const report = clipboard.paste(fs, '/src/dir/..b');
    expect(report.skipped).toEqual([
      { path: '/src/dir', reason: 'cannot copy a directory into itself' },
    ]);
    expect(report.failed).toEqual([]);
  });

  it('allows pasting a directory into a sibling whose name starts with ".."', () => {
    clipboard.copy(['/src/dir'], 'left');
    fs.mkdir('/src/..b');
    const report = clipboard.paste(fs, '/src/..b');
    expect(report.copied).toEqual(['/src/..b/dir']);
    expect(fs.read('/src/..b/dir/inner.txt')).toBe('inner');
  });

  it('reports vanished sources and keeps going', () => {
    clipboard.copy(['/src/a.txt', '/src/b.txt'], 'left');
    fs.remove('/src/a.txt');
    const report = clipboard.paste(fs, '/dest');
    expect(report.failed).toEqual([{ path: '/src/a.txt', reason: 'no longer exists' }]);
    expect(report.copied).toEqual(['/dest/b.txt']);
  });

  it('reports copy failures per entry', () => {
    fs.failOn('/src/a.txt', 'EACCES');
    clipboard.copy(['/src/a.txt', '/src/b.txt'], 'left');
    const report = clipboard.paste(fs, '/dest');
    expect(report.failed).toEqual([{ path: '/src/a.txt', reason: 'permission denied' }]);
    expect(report.copied).toEqual(['/dest/b.txt']);
  });

  it('keeps its contents after pasting', () => {
    clipboard.copy(['/src/a.txt'], 'left');
    clipboard.paste(fs, '/dest');
    fs.mkdir('/other');
    const report = clipboard.paste(fs, '/other');
    expect(report.copied).toEqual(['/other/a.txt']);
  });
});

describe('describePasteReport', () => {
  it('summarizes copied items only', () => {
    expect(describePasteReport({ copied: ['/d/a', '/d/b'], skipped: [], failed: [] })).toBe(
      'Pasted 2 item(s)'
    );
  });

  it('lists skipped and failed names', () => {
    expect(
      describePasteReport({
        copied: ['/d/a'],
        skipped: [{ path: '/s/b', reason: 'already exists' }],
        failed: [{ path: '/s/c', reason: 'permission denied' }],
      })
    ).toBe('Pasted 1 item(s); skipped 1: b; failed 1: c (permission denied)');
  });
});
