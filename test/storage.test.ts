import { createHash } from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { UnreadableConfig } from '../src/errors.js';
import { FileStorage, MemoryStorage, type Storage } from '../src/storage.js';
import { tempDir } from './helpers.js';

function contract(name: string, create: () => Storage): void {
  describe(name, () => {
    it('reads back what it wrote', async () => {
      const storage = create();
      await storage.write('project:/work/alpha', '{"a":1}');
      expect(await storage.read('project:/work/alpha')).toBe('{"a":1}');
    });

    it('returns undefined for missing keys', async () => {
      expect(await create().read('project:/nowhere')).toBeUndefined();
    });

    it('overwrites existing keys', async () => {
      const storage = create();
      await storage.write('k', 'one');
      await storage.write('k', 'two');
      expect(await storage.read('k')).toBe('two');
    });

    it('lists keys by prefix', async () => {
      const storage = create();
      await storage.write('project:/a/c', '1');
      await storage.write('project:/a/b', '2');
      await storage.write('other:x', '3');
      expect((await storage.list('project:')).sort()).toEqual(['project:/a/b', 'project:/a/c']);
      expect(await storage.list('none:')).toEqual([]);
    });

    it('accepts long and non-ASCII keys', async () => {
      const storage = create();
      const long = `project:/home/developer/code/${Array.from({ length: 16 }, (_, i) => `segment-${i}`).join('/')}`;
      const wide = 'project:/home/dev/プロジェクト一覧/顧客向けアプリケーション/サーバー実装モジュール';
      await storage.write(long, 'long');
      await storage.write(wide, 'wide');
      expect(await storage.read(long)).toBe('long');
      expect(await storage.read(wide)).toBe('wide');
      expect((await storage.list('project:')).sort()).toEqual([long, wide].sort());
    });

    it('deletes keys', async () => {
      const storage = create();
      await storage.write('k', 'v');
      expect(await storage.delete('k')).toBe(true);
      expect(await storage.delete('k')).toBe(false);
      expect(await storage.read('k')).toBeUndefined();
    });
  });
}

contract('MemoryStorage', () => new MemoryStorage());
contract('FileStorage', () => new FileStorage(path.join(tempDir(), 'store')));

describe('FileStorage', () => {
  it('stores one json file per key and leaves no temp files', async () => {
    const dir = path.join(tempDir(), 'store');
    const storage = new FileStorage(dir);
    await storage.write('project:/work/alpha', '{}');
    const digest = createHash('sha256').update('project:/work/alpha').digest('hex');
    expect(fs.readdirSync(dir)).toEqual([`${digest}.json`]);
    expect(JSON.parse(fs.readFileSync(path.join(dir, `${digest}.json`), 'utf8'))).toEqual({ key: 'project:/work/alpha', value: '{}' });
  });

  it('rejects a file that is not a storage entry', async () => {
    const dir = path.join(tempDir(), 'store');
    const storage = new FileStorage(dir);
    await storage.write('k', 'v');
    fs.writeFileSync(path.join(dir, `${createHash('sha256').update('k').digest('hex')}.json`), 'garbage');
    await expect(storage.read('k')).rejects.toBeInstanceOf(UnreadableConfig);
    expect(await storage.list('')).toEqual([]);
  });

  it('lists nothing before the directory exists', async () => {
    expect(await new FileStorage(path.join(tempDir(), 'absent')).list('')).toEqual([]);
  });

  it('expands the home directory', () => {
    expect(new FileStorage('~/.mcp-scan/projects').baseDir).toBe(path.join(os.homedir(), '.mcp-scan', 'projects'));
  });
});
