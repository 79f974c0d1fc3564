import { z } from 'zod';
import { ProjectNotFound, UnreadableConfig } from './errors.js';
import { canonicalPathOrAbsolute } from './paths.js';
import type { Storage } from './storage.js';
import type { ProjectConfig, ProjectInfo } from './types.js';

const serverSchema = z.object({
  name: z.string(),
  transport: z.string(),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  url: z.string().optional(),
  env: z.record(z.string()).optional(),
  headers: z.record(z.string()).optional()
});

const projectSchema = z.object({
  name: z.string(),
  path: z.string(),
  servers: z.record(serverSchema),
  configFile: z.string().optional(),
  inputs: z
    .array(z.object({ type: z.string(), id: z.string(), description: z.string().optional(), default: z.string().optional(), password: z.boolean().optional() }))
    .optional(),
  detectedAt: z.string().optional(),
  detector: z.string().optional()
});

const recordSchema = z.object({
  registeredAt: z.number(),
  updatedAt: z.string(),
  project: projectSchema
});

type ProjectRecord = z.infer<typeof recordSchema>;

export type RegistryEvent = { type: 'registered'; path: string; project: ProjectConfig } | { type: 'removed'; path: string };

export type RegistryOptions = {
  onChange?: (event: RegistryEvent) => void;
  // Called for stored records that fail validation while listing.
  onError?: (error: Error) => void;
  now?: () => number;
};

const keyPrefix = 'project:';

export function projectKey(canonical: string): string {
  return `${keyPrefix}${canonical}`;
}

export function toProjectInfo(project: ProjectConfig): ProjectInfo {
  const servers = Object.keys(project.servers).sort();
  return { name: project.name, path: project.path, serverCount: servers.length, servers };
}

/**
 * Registered projects keyed by canonical path. Each operation reads or writes
 * only its own key, so calls on different paths are independent.
 */
export class ProjectRegistry {
  private lastStamp = 0;

  constructor(private readonly storage: Storage, private readonly options: RegistryOptions = {}) {}

  private stamp(): number {
    const now = (this.options.now ?? Date.now)();
    this.lastStamp = Math.max(now, this.lastStamp + 1);
    return this.lastStamp;
  }

  private async readRecord(key: string): Promise<ProjectRecord | undefined> {
    const raw = await this.storage.read(key);
    if (raw === undefined) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new UnreadableConfig(key, { cause: error });
    }
    const record = recordSchema.safeParse(parsed);
    if (!record.success) throw new UnreadableConfig(key, { cause: record.error.issues[0]?.message ?? 'invalid record' });
    return record.data;
  }

  /** Upsert: replaces any project at the same canonical path without merging servers. */
  async register(projectPath: string, config: ProjectConfig): Promise<ProjectConfig> {
    const canonical = await canonicalPathOrAbsolute(projectPath);
    const key = projectKey(canonical);
    const previous = await this.readRecord(key).catch((error: unknown) => {
      // A corrupt record is replaced.
      if (error instanceof UnreadableConfig) return undefined;
      throw error;
    });
    const project: ProjectConfig = structuredClone({ ...config, path: canonical });
    const record: ProjectRecord = {
      registeredAt: previous?.registeredAt ?? this.stamp(),
      updatedAt: new Date().toISOString(),
      project
    };
    await this.storage.write(key, JSON.stringify(record));
    this.options.onChange?.({ type: 'registered', path: canonical, project: structuredClone(project) });
    return structuredClone(project);
  }

  async get(projectPath: string): Promise<ProjectConfig> {
    const canonical = await canonicalPathOrAbsolute(projectPath);
    const record = await this.readRecord(projectKey(canonical));
    if (!record) throw new ProjectNotFound(canonical);
    return record.project;
  }

  async has(projectPath: string): Promise<boolean> {
    const canonical = await canonicalPathOrAbsolute(projectPath);
    return (await this.storage.read(projectKey(canonical))) !== undefined;
  }

  /** Registered projects in first-registration order. */
  async list(): Promise<ProjectInfo[]> {
    const keys = await this.storage.list(keyPrefix);
    const records: ProjectRecord[] = [];
    for (const key of keys) {
      try {
        const record = await this.readRecord(key);
        if (record) records.push(record);
      } catch (error) {
        if (!(error instanceof UnreadableConfig)) throw error;
        this.options.onError?.(error);
      }
    }
    return records
      .sort((a, b) => a.registeredAt - b.registeredAt || a.project.path.localeCompare(b.project.path))
      .map((record) => toProjectInfo(record.project));
  }

  async remove(projectPath: string): Promise<void> {
    const canonical = await canonicalPathOrAbsolute(projectPath);
    const removed = await this.storage.delete(projectKey(canonical));
    if (!removed) throw new ProjectNotFound(canonical);
    this.options.onChange?.({ type: 'removed', path: canonical });
  }
}
