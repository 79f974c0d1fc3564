import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { ProjectDetector } from './detector.js';
import { DirectoryUnreadable, ScanAborted, ScanCancelled } from './errors.js';
import { canonicalPath, isMissing } from './paths.js';
import type { ScanSettings } from './types.js';

export type WalkSettings = Pick<ScanSettings, 'excludePaths' | 'maxDepth'>;

/** Canonical directory → largest remaining depth budget it was visited with. */
export type VisitedSet = Map<string, number>;

export type WalkOptions = {
  visited?: VisitedSet;
  signal?: AbortSignal;
};

export type WalkResult = {
  candidates: string[];
  errors: Error[];
};

function trimSeparators(value: string): string {
  return value.replace(/[\\/]+$/, '');
}

/**
 * Plain names match a directory's base name. Entries containing a separator
 * are path fragments matched against the end of the directory path.
 */
export function isExcluded(dir: string, excludePaths: string[]): boolean {
  const base = path.basename(dir);
  for (const entry of excludePaths) {
    if (!entry) continue;
    if (!/[\\/]/.test(entry)) {
      if (base === entry) return true;
      continue;
    }
    const fragment = trimSeparators(path.normalize(entry));
    if (path.isAbsolute(fragment) ? dir === fragment : dir.endsWith(`${path.sep}${fragment}`)) return true;
  }
  return false;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

/**
 * Depth-first walk of one root. A directory the detector accepts is reported
 * and not descended into. Directories are tracked by canonical path, so
 * symlink cycles and overlapping roots sharing `visited` are walked once.
 * `maxDepth` must be a non-negative integer; anything else aborts the root.
 */
export async function walkRoot(root: string, detector: ProjectDetector, settings: WalkSettings, options: WalkOptions = {}): Promise<WalkResult> {
  const visited = options.visited ?? new Map<string, number>();
  const candidates: string[] = [];
  const errors: Error[] = [];
  const maxDepth = settings.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    errors.push(new ScanAborted(root, { cause: `invalid maxDepth: ${maxDepth}` }));
    return { candidates, errors };
  }

  let start: string;
  try {
    start = await canonicalPath(root);
    const stat = await fs.stat(start);
    if (!stat.isDirectory()) throw new Error('not a directory');
  } catch (error) {
    errors.push(new ScanAborted(root, { cause: error }));
    return { candidates, errors };
  }

  const visit = async (dir: string, depth: number): Promise<void> => {
    if (options.signal?.aborted) return;
    const remaining = maxDepth - depth;
    const seen = visited.get(dir);
    if (seen !== undefined && seen >= remaining) return;
    visited.set(dir, remaining);

    let isRoot: boolean;
    try {
      isRoot = await detector.isProjectRoot(dir);
    } catch (error) {
      errors.push(depth === 0 ? new ScanAborted(root, { cause: error }) : new DirectoryUnreadable(dir, { cause: error }));
      return;
    }
    if (isRoot) {
      // Already reported with a larger budget, which changes nothing for a project.
      if (seen === undefined) candidates.push(dir);
      return;
    }
    if (depth >= maxDepth) return;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      errors.push(depth === 0 ? new ScanAborted(root, { cause: error }) : new DirectoryUnreadable(dir, { cause: error }));
      return;
    }

    for (const entry of entries.sort(byName)) {
      if (options.signal?.aborted) return;
      if (!entry.isDirectory() && !entry.isSymbolicLink()) continue;
      const child = path.join(dir, entry.name);
      if (isExcluded(child, settings.excludePaths)) continue;

      let target: string;
      try {
        target = await canonicalPath(child);
        if (!(await fs.stat(target)).isDirectory()) continue;
      } catch (error) {
        // Dangling symlinks are not directories.
        if (isMissing(error)) continue;
        errors.push(new DirectoryUnreadable(child, { cause: error }));
        continue;
      }
      if (target !== child && isExcluded(target, settings.excludePaths)) continue;
      await visit(target, depth + 1);
    }
  };

  await visit(start, 0);
  if (options.signal?.aborted) errors.push(new ScanCancelled());
  return { candidates, errors };
}
