import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export function expandHome(value: string, home = os.homedir()): string {
  if (value === '~') return home;
  if (value.startsWith('~/') || value.startsWith(`~${path.sep}`)) return path.join(home, value.slice(2));
  return value;
}

function stripTrailingSeparator(value: string): string {
  const root = path.parse(value).root;
  let out = value;
  while (out.length > root.length && (out.endsWith('/') || out.endsWith(path.sep))) out = out.slice(0, -1);
  return out;
}

/** Absolute path with `~` expanded and separators normalised; symlinks are left alone. */
export function absolutePath(value: string): string {
  return stripTrailingSeparator(path.resolve(expandHome(value)));
}

/**
 * Absolute path with symlinks resolved. Rejects when the path does not exist,
 * so callers decide how a missing directory is reported.
 */
export async function canonicalPath(value: string): Promise<string> {
  return stripTrailingSeparator(await fs.realpath(absolutePath(value)));
}

/** Canonical path when the target exists, the absolute path otherwise. */
export async function canonicalPathOrAbsolute(value: string): Promise<string> {
  try {
    return await canonicalPath(value);
  } catch (error) {
    if (isMissing(error)) return absolutePath(value);
    throw error;
  }
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
