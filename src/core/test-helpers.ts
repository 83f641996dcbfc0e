import * as path from 'node:path';
import type { Entry, FileContent, FileSystem } from './FileSystem.js';
import { isHiddenName } from './FileSystem.js';
import { FileSystemError, type FileSystemOperation } from './errors.js';

type MemoryNode =
  | { kind: 'dir'; mtime: number }
  | { kind: 'file'; data: Buffer; mode: number; mtime: number };

function codedError(code: string): Error {
  return Object.assign(new Error(code), { code });
}

function isWithin(candidate: string, root: string): boolean {
  return candidate === root || candidate.startsWith(root === '/' ? '/' : `${root}/`);
}

/**
 * In-memory FileSystem for controller tests. Paths are absolute POSIX
 * paths; parents are created on demand.
 */
export class MemoryFileSystem implements FileSystem {
  private nodes = new Map<string, MemoryNode>([['/', { kind: 'dir', mtime: 0 }]]);
  private failures = new Map<string, string>();
  private clock = 1;

  /** Mutating calls in order, e.g. "remove /a/b.txt". */
  readonly log: string[] = [];

  mkdir(dirPath: string): this {
    const parts = dirPath.split('/').filter(Boolean);
    let current = '';
    for (const part of parts) {
      current += `/${part}`;
      if (!this.nodes.has(current)) {
        this.nodes.set(current, { kind: 'dir', mtime: this.clock++ });
      }
    }
    return this;
  }

  writeFile(filePath: string, content: string | Buffer, mode: number = 0o644): this {
    this.mkdir(path.dirname(filePath));
    const data = typeof content === 'string' ? Buffer.from(content) : content;
    this.nodes.set(filePath, { kind: 'file', data, mode, mtime: this.clock++ });
    return this;
  }

  /** Make every later mutating call on `target` fail with `code`. */
  failOn(target: string, code: string = 'EACCES'): this {
    this.failures.set(target, code);
    return this;
  }

  /** Sorted paths of everything under `root`, excluding `root`. */
  tree(root: string = '/'): string[] {
    return [...this.nodes.keys()].filter((p) => p !== root && isWithin(p, root)).sort();
  }

  read(filePath: string): string | null {
    const node = this.nodes.get(filePath);
    return node?.kind === 'file' ? node.data.toString('utf-8') : null;
  }

  listDirectory(dir: string): Entry[] {
    const node = this.nodes.get(dir);
    if (!node) throw new FileSystemError('list', dir, codedError('ENOENT'));
    if (node.kind !== 'dir') throw new FileSystemError('list', dir, codedError('ENOTDIR'));
    this.checkFailure('list', dir);

    const entries: Entry[] = [];
    for (const [entryPath, child] of this.nodes) {
      if (entryPath === dir || path.dirname(entryPath) !== dir) continue;
      const name = path.basename(entryPath);
      entries.push({
        path: entryPath,
        name,
        isDirectory: child.kind === 'dir',
        isHidden: isHiddenName(name),
        isExecutable: child.kind === 'file' && (child.mode & 0o111) !== 0,
        isSymlink: false,
        size: child.kind === 'file' ? child.data.length : 0,
        modifiedTime: child.mtime,
        createdTime: child.mtime,
      });
    }
    return entries;
  }

  readFile(filePath: string, maxBytes: number): FileContent {
    const node = this.nodes.get(filePath);
    if (!node) throw new FileSystemError('read', filePath, codedError('ENOENT'));
    if (node.kind !== 'file') throw new FileSystemError('read', filePath, codedError('EISDIR'));
    this.checkFailure('read', filePath);
    return {
      data: node.data.subarray(0, maxBytes),
      truncated: node.data.length > maxBytes,
    };
  }

  exists(filePath: string): boolean {
    return this.nodes.has(filePath);
  }

  isDirectory(filePath: string): boolean {
    return this.nodes.get(filePath)?.kind === 'dir';
  }

  copy(src: string, dest: string): void {
    this.log.push(`copy ${src} ${dest}`);
    this.checkFailure('copy', src);
    if (!this.nodes.has(src)) throw new FileSystemError('copy', src, codedError('ENOENT'));
    if (this.nodes.has(dest)) throw new FileSystemError('copy', src, codedError('EEXIST'));

    this.mkdir(path.dirname(dest));
    for (const [nodePath, node] of [...this.nodes]) {
      if (!isWithin(nodePath, src)) continue;
      const copied = dest + nodePath.slice(src.length);
      this.nodes.set(copied, node.kind === 'file' ? { ...node, data: Buffer.from(node.data) } : { ...node });
    }
  }

  remove(filePath: string): void {
    this.log.push(`remove ${filePath}`);
    this.checkFailure('delete', filePath);
    if (!this.nodes.has(filePath)) throw new FileSystemError('delete', filePath, codedError('ENOENT'));
    for (const nodePath of [...this.nodes.keys()]) {
      if (isWithin(nodePath, filePath)) this.nodes.delete(nodePath);
    }
  }

  rename(from: string, to: string): void {
    this.log.push(`rename ${from} ${to}`);
    this.checkFailure('rename', from);
    if (!this.nodes.has(from)) throw new FileSystemError('rename', from, codedError('ENOENT'));
    for (const [nodePath, node] of [...this.nodes]) {
      if (!isWithin(nodePath, from)) continue;
      this.nodes.delete(nodePath);
      this.nodes.set(to + nodePath.slice(from.length), node);
    }
  }

  private checkFailure(operation: FileSystemOperation, target: string): void {
    const code = this.failures.get(target);
    if (code) throw new FileSystemError(operation, target, codedError(code));
  }
}

let nextTime = 1;

/**
 * Build an Entry for pure PaneState tests.
 */
export function makeEntry(dir: string, name: string, overrides: Partial<Entry> = {}): Entry {
  const time = nextTime++;
  return {
    path: path.join(dir, name),
    name,
    isDirectory: false,
    isHidden: isHiddenName(name),
    isExecutable: false,
    isSymlink: false,
    size: 0,
    modifiedTime: time,
    createdTime: time,
    ...overrides,
  };
}
