import { createHash, randomBytes } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { UnreadableConfig } from './errors.js';
import { expandHome, isMissing } from './paths.js';

/**
 * Key-value persistence behind the project registry. Values are opaque
 * strings; implementations choose the encoding on disk.
 */
export interface Storage {
  read(key: string): Promise<string | undefined>;
  write(key: string, value: string): Promise<void>;
  /** Resolves false when the key did not exist. */
  delete(key: string): Promise<boolean>;
  list(prefix: string): Promise<string[]>;
}

export class MemoryStorage implements Storage {
  private readonly data = new Map<string, string>();

  async read(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async write(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.data.keys()].filter((key) => key.startsWith(prefix));
  }
}

export function defaultStorageRoot(): string {
  if (process.platform === 'win32' && process.env.LOCALAPPDATA) return path.join(process.env.LOCALAPPDATA, 'mcp-scan', 'projects');
  return path.join(os.homedir(), '.mcp-scan', 'projects');
}

const suffix = '.json';

const entrySchema = z.object({ key: z.string(), value: z.string() });

/**
 * One file per key under `baseDir`, named by the key's SHA-256 digest so any
 * key length fits in a filename. Each file holds `{ key, value }`; writes go
 * through a temp file and a rename.
 */
export class FileStorage implements Storage {
  readonly baseDir: string;

  constructor(baseDir = defaultStorageRoot()) {
    this.baseDir = path.resolve(expandHome(baseDir));
  }

  private fileFor(key: string): string {
    return path.join(this.baseDir, `${createHash('sha256').update(key).digest('hex')}${suffix}`);
  }

  private async readEntry(file: string): Promise<z.infer<typeof entrySchema> | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new UnreadableConfig(file, { cause: error });
    }
    const entry = entrySchema.safeParse(parsed);
    if (!entry.success) throw new UnreadableConfig(file, { cause: 'not a storage entry' });
    return entry.data;
  }

  async read(key: string): Promise<string | undefined> {
    const entry = await this.readEntry(this.fileFor(key));
    return entry?.key === key ? entry.value : undefined;
  }

  async write(key: string, value: string): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const file = this.fileFor(key);
    const temp = `${file.slice(0, -suffix.length)}.${randomBytes(6).toString('hex')}.tmp`;
    await fs.writeFile(temp, JSON.stringify({ key, value }), 'utf8');
    try {
      await fs.rename(temp, file);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    const file = this.fileFor(key);
    try {
      await fs.unlink(file);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  /** Keys are read back from the files; files that are not storage entries are left out. */
  async list(prefix: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.baseDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    const keys: string[] = [];
    for (const name of names.filter((n) => n.endsWith(suffix))) {
      let raw: string;
      try {
        raw = await fs.readFile(path.join(this.baseDir, name), 'utf8');
      } catch (error) {
        // Removed between readdir and read.
        if (isMissing(error)) continue;
        throw error;
      }
      const entry = entrySchema.safeParse(safeJson(raw));
      if (entry.success && entry.data.key.startsWith(prefix)) keys.push(entry.data.key);
    }
    return keys.sort();
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
