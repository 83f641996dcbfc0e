import * as fs from 'node:fs';
import * as path from 'node:path';
import { FileSystemError } from './errors.js';

/**
 * Snapshot of one directory entry, taken at listing time.
 */
export interface Entry {
  path: string;
  name: string;
  isDirectory: boolean;
  isHidden: boolean;
  isExecutable: boolean;
  isSymlink: boolean;
  size: number;
  modifiedTime: number; // ms since epoch
  createdTime: number; // ms since epoch
}

export interface FileContent {
  data: Buffer;
  truncated: boolean;
}

/**
 * Synchronous filesystem port used by the controller.
 * Every method throws FileSystemError on failure.
 */
export interface FileSystem {
  listDirectory(dir: string): Entry[];
  readFile(filePath: string, maxBytes: number): FileContent;
  exists(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
  /** Copy `src` (recursively for directories) to `dest`. Fails if `dest` exists. */
  copy(src: string, dest: string): void;
  remove(filePath: string): void;
  rename(from: string, to: string): void;
}

export function isHiddenName(name: string): boolean {
  return name.startsWith('.');
}

function toEntry(fullPath: string, name: string): Entry {
  const linkStats = fs.lstatSync(fullPath);
  let stats = linkStats;
  if (linkStats.isSymbolicLink()) {
    try {
      stats = fs.statSync(fullPath);
    } catch {
      // Dangling link: describe the link itself
      stats = linkStats;
    }
  }

  const isDirectory = stats.isDirectory();
  return {
    path: fullPath,
    name,
    isDirectory,
    isHidden: isHiddenName(name),
    isExecutable: !isDirectory && (stats.mode & 0o111) !== 0,
    isSymlink: linkStats.isSymbolicLink(),
    size: stats.size,
    modifiedTime: stats.mtimeMs,
    createdTime: stats.birthtimeMs,
  };
}

/**
 * FileSystem backed by node:fs synchronous calls.
 */
export class NodeFileSystem implements FileSystem {
  listDirectory(dir: string): Entry[] {
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch (err) {
      throw new FileSystemError('list', dir, err);
    }

    const entries: Entry[] = [];
    for (const name of names) {
      try {
        entries.push(toEntry(path.join(dir, name), name));
      } catch {
        // Entry vanished between readdir and lstat
        continue;
      }
    }
    return entries;
  }

  readFile(filePath: string, maxBytes: number): FileContent {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(filePath);
    } catch (err) {
      throw new FileSystemError('read', filePath, err);
    }
    // Opening a FIFO or a device can block until another process shows up
    if (!stats.isFile()) {
      throw new FileSystemError('read', filePath, new Error('not a regular file'));
    }

    let fd: number | null = null;
    try {
      fd = fs.openSync(filePath, 'r');
      const size = fs.fstatSync(fd).size;
      const length = Math.min(size, maxBytes);
      const data = Buffer.alloc(length);
      let offset = 0;
      while (offset < length) {
        const read = fs.readSync(fd, data, offset, length - offset, offset);
        if (read === 0) break;
        offset += read;
      }
      return { data: data.subarray(0, offset), truncated: size > maxBytes };
    } catch (err) {
      throw new FileSystemError('read', filePath, err);
    } finally {
      if (fd !== null) fs.closeSync(fd);
    }
  }

  exists(filePath: string): boolean {
    try {
      fs.lstatSync(filePath);
      return true;
    } catch {
      return false;
    }
  }

  isDirectory(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isDirectory();
    } catch {
      return false;
    }
  }

  copy(src: string, dest: string): void {
    try {
      fs.cpSync(src, dest, {
        recursive: true,
        force: false,
        errorOnExist: true,
        preserveTimestamps: true,
      });
    } catch (err) {
      throw new FileSystemError('copy', src, err);
    }
  }

  remove(filePath: string): void {
    try {
      fs.rmSync(filePath, { recursive: true });
    } catch (err) {
      throw new FileSystemError('delete', filePath, err);
    }
  }

  rename(from: string, to: string): void {
    try {
      fs.renameSync(from, to);
    } catch (err) {
      throw new FileSystemError('rename', from, err);
    }
  }
}
