import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { defaultStorageRoot } from './storage.js';
import { defaultScanSettings, type ScanSettings } from './types.js';

const scanningSchema = z.object({
  enabled: z.boolean().optional(),
  scanPaths: z.array(z.string()).optional(),
  excludePaths: z.array(z.string()).optional(),
  maxDepth: z.number().int().nonnegative().optional()
});

const configSchema = z.object({
  strictEnv: z.boolean().optional(),
  storageDir: z.string().optional(),
  scanning: scanningSchema.optional()
});

type FileConfig = z.infer<typeof configSchema>;

export type AppConfig = {
  strictEnv: boolean;
  storageDir: string;
  scanning: ScanSettings;
};

const configNames = ['config.json', 'config.yaml', 'config.yml'];

export function globalConfigDir(): string {
  return path.join(os.homedir(), '.mcp-scan');
}

function readConfigDir(dir: string): FileConfig {
  for (const name of configNames) {
    const file = path.join(dir, name);
    if (!fs.existsSync(file)) continue;
    const raw = fs.readFileSync(file, 'utf8');
    const parsed = name.endsWith('.json') ? JSON.parse(raw) : yaml.load(raw);
    const result = configSchema.safeParse(parsed ?? {});
    if (!result.success) throw new Error(`Invalid config ${file}: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    return result.data;
  }
  return {};
}

function expandValue(value: string, strictEnv: boolean): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (match: string, key: string) => {
    const got = process.env[key];
    if (got !== undefined) return got;
    if (strictEnv) throw new Error(`Missing environment variable: ${key}`);
    return match;
  });
}

function expandList(values: string[], strictEnv: boolean): string[] {
  return values.map((value) => expandValue(value, strictEnv));
}

/**
 * Reads `config.{json,yaml,yml}` from the global directory (`~/.mcp-scan`
 * unless given) and from `./mcp-scan`; local values override global ones.
 */
export function resolveConfig(configDir?: string, cwd = process.cwd()): AppConfig {
  const global = readConfigDir(configDir ?? globalConfigDir());
  const local = readConfigDir(path.join(cwd, 'mcp-scan'));
  const strictEnv = local.strictEnv ?? global.strictEnv ?? false;
  const scanning = { ...defaultScanSettings, ...(global.scanning ?? {}), ...(local.scanning ?? {}) };
  const storageDir = process.env.MCP_SCAN_STORAGE ?? local.storageDir ?? global.storageDir ?? defaultStorageRoot();

  return {
    strictEnv,
    storageDir: expandValue(storageDir, strictEnv),
    scanning: {
      ...scanning,
      scanPaths: expandList(scanning.scanPaths, strictEnv),
      excludePaths: expandList(scanning.excludePaths, strictEnv)
    }
  };
}
