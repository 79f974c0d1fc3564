import { InvalidArgumentError } from 'commander';
import type { ProjectConfig, ProjectInfo, ServerConfig } from './types.js';

export type OutputOptions = { output?: string; pretty?: boolean };

export function printResult(value: unknown, opts: OutputOptions): void {
  console.log(JSON.stringify(value, null, opts.pretty ? 2 : 0));
}

export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(depth)) throw new InvalidArgumentError('Not a non-negative integer.');
  return depth;
}

// Secrets can sit in server env and headers; never print them.
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (/authorization|token|secret|password|api[_-]?key/i.test(k)) out[k] = '***REDACTED***';
      else out[k] = redact(v);
    }
    return out;
  }
  return value;
}

export function formatServer(server: ServerConfig): string {
  const target = server.transport === 'stdio' ? [server.command ?? '', ...(server.args ?? [])].join(' ') : server.url ?? '';
  return `${server.name}\t${server.transport}\t${target}`;
}

export function formatProjectLine(project: ProjectConfig | ProjectInfo): string {
  const count = 'serverCount' in project ? project.serverCount : Object.keys(project.servers).length;
  return `${project.name}\t${count}\t${project.path}`;
}

export function formatProject(project: ProjectConfig): string[] {
  return [formatProjectLine(project), ...Object.values(project.servers).map((server) => `  ${formatServer(server)}`)];
}
