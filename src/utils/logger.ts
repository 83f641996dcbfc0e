/**
 * Stderr logger.
 *
 * `debug()` is gated by `setDebug(true)` (from --debug or the config file).
 * While the screen is up, stderr lands on top of the panes, so
 * `setLogFile()` can redirect every line to a file instead.
 */

import * as fs from 'node:fs';
import { formatError } from '../core/errors.js';

let debugEnabled = false;
let logFile: string | null = null;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function setLogFile(filePath: string | null): void {
  logFile = filePath;
}

function write(line: string): void {
  if (logFile) {
    try {
      fs.appendFileSync(logFile, line);
      return;
    } catch (err) {
      const failed = logFile;
      logFile = null;
      process.stderr.write(`[duopane warn] cannot write ${failed}: ${formatError(err)}\n`);
    }
  }
  process.stderr.write(line);
}

function timestamp(): string {
  return new Date().toISOString();
}

export function debug(message: string): void {
  if (debugEnabled) {
    write(`[duopane ${timestamp()}] ${message}\n`);
  }
}

export function warn(message: string): void {
  write(`[duopane warn] ${message}\n`);
}

export function error(message: string, err?: unknown): void {
  const detail = err ? `: ${formatError(err)}` : '';
  write(`[duopane error] ${message}${detail}\n`);
}
