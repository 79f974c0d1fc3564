import type { ProjectDetector } from './detector.js';
import { ScanCancelled, ScanError } from './errors.js';
import { defaultScanSettings, type ProjectConfig, type ScanSettings } from './types.js';
import { walkRoot, type VisitedSet, type WalkSettings } from './walker.js';

export type ScanOptions = {
  settings?: Partial<WalkSettings>;
  signal?: AbortSignal;
  onProject?: (project: ProjectConfig) => void;
};

export type ScanResult = {
  // Always an array, empty when nothing was found.
  projects: ProjectConfig[];
  error?: ScanError;
};

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Walks every root in order and detects each candidate directory once.
 * Failures are collected into `error`; they never discard other results.
 */
export async function scanForProjects(roots: string[], detector: ProjectDetector, options: ScanOptions = {}): Promise<ScanResult> {
  const settings: WalkSettings = {
    excludePaths: options.settings?.excludePaths ?? defaultScanSettings.excludePaths,
    maxDepth: options.settings?.maxDepth ?? defaultScanSettings.maxDepth
  };
  const visited: VisitedSet = new Map();
  const found: string[] = [];
  const errors: Error[] = [];

  for (const root of roots) {
    if (options.signal?.aborted) break;
    const walked = await walkRoot(root, detector, settings, { visited, signal: options.signal });
    found.push(...walked.candidates);
    errors.push(...walked.errors);
  }

  const candidates = [...new Set(found)];
  const projects: ProjectConfig[] = [];
  for (const dir of candidates) {
    if (options.signal?.aborted) break;
    try {
      const detected = await detector.detectProject(dir);
      projects.push(detected.project);
      errors.push(...detected.errors);
      options.onProject?.(detected.project);
    } catch (error) {
      errors.push(toError(error));
    }
  }

  if (options.signal?.aborted && !errors.some((error) => error instanceof ScanCancelled)) errors.push(new ScanCancelled());
  return errors.length ? { projects, error: new ScanError(errors) } : { projects };
}

/** Scans `settings.scanPaths`; a disabled configuration scans nothing. */
export async function scanFromSettings(settings: ScanSettings, detector: ProjectDetector, options: Omit<ScanOptions, 'settings'> = {}): Promise<ScanResult> {
  if (!settings.enabled) return { projects: [] };
  return scanForProjects(settings.scanPaths, detector, { ...options, settings });
}
