import * as path from 'node:path';
import type { FileSystem } from './FileSystem.js';
import type { PaneId } from '../state/Mode.js';
import { formatError } from './errors.js';

export interface PasteIssue {
  path: string;
  reason: string;
}

export interface PasteReport {
  copied: string[]; // destination paths
  skipped: PasteIssue[]; // name conflicts, never overwritten
  failed: PasteIssue[];
}

function isSameOrInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  const outside = rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel);
  return !outside;
}

/**
 * Copied entry paths. Replaced by every copy, never cleared otherwise, so
 * the same contents can be pasted into any number of directories.
 */
export class Clipboard {
  private _paths: string[] = [];
  private _sourcePane: PaneId | null = null;

  get paths(): readonly string[] {
    return this._paths;
  }

  get sourcePane(): PaneId | null {
    return this._sourcePane;
  }

  get isEmpty(): boolean {
    return this._paths.length === 0;
  }

  copy(paths: readonly string[], sourcePane: PaneId): void {
    this._paths = [...paths];
    this._sourcePane = sourcePane;
  }

  /**
   * Copy every clipboard entry into `destDir`.
   *
   * An entry whose name already exists in `destDir` is skipped, as is a
   * directory pasted into itself or one of its descendants. A failing entry
   * does not stop the rest of the batch.
   */
  paste(fs: FileSystem, destDir: string): PasteReport {
    const report: PasteReport = { copied: [], skipped: [], failed: [] };

    for (const src of this._paths) {
      const dest = path.join(destDir, path.basename(src));

      if (!fs.exists(src)) {
        report.failed.push({ path: src, reason: 'no longer exists' });
        continue;
      }
      if (fs.exists(dest)) {
        report.skipped.push({ path: src, reason: 'already exists' });
        continue;
      }
      if (fs.isDirectory(src) && isSameOrInside(destDir, src)) {
        report.skipped.push({ path: src, reason: 'cannot copy a directory into itself' });
        continue;
      }

      try {
        fs.copy(src, dest);
        report.copied.push(dest);
      } catch (err) {
        report.failed.push({ path: src, reason: formatError(err) });
      }
    }

    return report;
  }
}

function listNames(issues: readonly PasteIssue[]): string {
  return issues.map((i) => path.basename(i.path)).join(', ');
}

/**
 * One-line summary of a paste for the status line.
 */
export function describePasteReport(report: PasteReport): string {
  const parts = [`Pasted ${report.copied.length} item(s)`];
  if (report.skipped.length > 0) {
    parts.push(`skipped ${report.skipped.length}: ${listNames(report.skipped)}`);
  }
  if (report.failed.length > 0) {
    const details = report.failed
      .map((i) => `${path.basename(i.path)} (${i.reason})`)
      .join(', ');
    parts.push(`failed ${report.failed.length}: ${details}`);
  }
  return parts.join('; ');
}
