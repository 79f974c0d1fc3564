import fs from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { absolutePath, canonicalPath, canonicalPathOrAbsolute, expandHome } from '../src/paths.js';
import { tempDir } from './helpers.js';

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~', '/home/dev')).toBe('/home/dev');
    expect(expandHome('~/code', '/home/dev')).toBe('/home/dev/code');
    expect(expandHome('/srv/~/code', '/home/dev')).toBe('/srv/~/code');
    expect(expandHome('~other/code', '/home/dev')).toBe('~other/code');
  });
});

describe('absolutePath', () => {
  it('strips trailing separators but keeps the filesystem root', () => {
    expect(absolutePath('/work/alpha/')).toBe('/work/alpha');
    expect(absolutePath('/work//alpha///')).toBe('/work/alpha');
    expect(absolutePath('/')).toBe('/');
  });
});

describe('canonicalPath', () => {
  it('resolves symlinks', async () => {
    const base = tempDir();
    fs.mkdirSync(path.join(base, 'real'));
    fs.symlinkSync(path.join(base, 'real'), path.join(base, 'link'), 'dir');
    expect(await canonicalPath(path.join(base, 'link') + '/')).toBe(path.join(base, 'real'));
  });

  it('rejects missing paths unless asked for a fallback', async () => {
    const missing = path.join(tempDir(), 'missing');
    await expect(canonicalPath(missing)).rejects.toThrow();
    expect(await canonicalPathOrAbsolute(`${missing}/`)).toBe(missing);
  });
});
