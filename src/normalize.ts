import fs from 'node:fs/promises';
import { z } from 'zod';
import { MalformedServerConfig, UnreadableConfig } from './errors.js';
import type { McpInput, ServerConfig, TransportType } from './types.js';

export type ConfigShape = 'mcpServers' | 'mcp.servers' | 'servers';

export type NormalizedConfig = {
  shape?: ConfigShape;
  servers: Record<string, ServerConfig>;
  inputs?: McpInput[];
  errors: MalformedServerConfig[];
};

export type NormalizeOptions = {
  substituteEnv?: boolean;
  env?: NodeJS.ProcessEnv;
};

const serverSchema = z.object({
  transport: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  url: z.string().optional(),
  env: z.record(z.string()).optional(),
  headers: z.record(z.string()).optional()
});

const inputsSchema = z.array(
  z.object({
    type: z.string(),
    id: z.string(),
    description: z.string().optional(),
    default: z.string().optional(),
    password: z.boolean().optional()
  })
);

// zod's record parse drops `__proto__`; a plain guard keeps every own key visible.
function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const reservedNames = new Set(['__proto__']);

// Spellings used by common MCP clients for network transports.
const urlTransportAliases = new Set(['url', 'sse', 'http', 'streamable-http', 'streamableHttp']);

export function canonicalTransport(value: string): TransportType {
  if (urlTransportAliases.has(value)) return 'url';
  return value;
}

function expandValue(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (match: string, key: string) => env[key] ?? match);
}

function expandRecord(record: Record<string, string> | undefined, env: NodeJS.ProcessEnv): Record<string, string> | undefined {
  if (!record) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(record)) out[k] = expandValue(v, env);
  return out;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

function toServerConfig(name: string, raw: unknown, source: string, options: NormalizeOptions): ServerConfig | MalformedServerConfig {
  const parsed = serverSchema.safeParse(raw);
  if (!parsed.success) return new MalformedServerConfig(name, source, describeIssues(parsed.error));

  const env: NodeJS.ProcessEnv = options.substituteEnv === false ? {} : options.env ?? process.env;
  const entry = parsed.data;
  const command = entry.command ? expandValue(entry.command, env) : undefined;
  const url = entry.url ? expandValue(entry.url, env) : undefined;
  if (!command && !url) return new MalformedServerConfig(name, source, 'missing both command and url');

  const declared = entry.transport ?? entry.type;
  const transport = declared ? canonicalTransport(declared) : command ? 'stdio' : 'url';

  if (transport === 'stdio') {
    if (!command) return new MalformedServerConfig(name, source, 'stdio transport requires command');
    return {
      name,
      transport,
      command,
      args: (entry.args ?? []).map((arg) => expandValue(arg, env)),
      ...(entry.env ? { env: expandRecord(entry.env, env) } : {})
    };
  }

  if (!url) return new MalformedServerConfig(name, source, `${transport} transport requires url`);
  return {
    name,
    transport,
    url,
    ...(entry.headers ? { headers: expandRecord(entry.headers, env) } : {})
  };
}

function selectShape(doc: Record<string, unknown>): { shape: ConfigShape; entries: Record<string, unknown>; inputs?: unknown } | undefined {
  const claude = doc.mcpServers;
  if (isMapping(claude)) return { shape: 'mcpServers', entries: claude };
  const nested = doc.mcp;
  const nestedServers = isMapping(nested) ? nested.servers : undefined;
  if (isMapping(nested) && isMapping(nestedServers)) return { shape: 'mcp.servers', entries: nestedServers, inputs: nested.inputs };
  const flat = doc.servers;
  if (isMapping(flat)) return { shape: 'servers', entries: flat };
  return undefined;
}

/**
 * Normalises an already-parsed document. The first recognised shape wins:
 * `mcpServers`, then `mcp.servers`, then `servers`. Malformed entries are
 * skipped and reported in `errors`.
 */
export function normalizeMcpConfig(doc: Record<string, unknown>, source: string, options: NormalizeOptions = {}): NormalizedConfig {
  const selected = selectShape(doc);
  if (!selected) return { servers: {}, errors: [] };

  const servers: Record<string, ServerConfig> = {};
  const errors: MalformedServerConfig[] = [];
  for (const [name, raw] of Object.entries(selected.entries)) {
    if (reservedNames.has(name)) {
      errors.push(new MalformedServerConfig(name, source, 'reserved server name'));
      continue;
    }
    const result = toServerConfig(name, raw, source, options);
    if (result instanceof MalformedServerConfig) errors.push(result);
    else servers[name] = result;
  }

  const inputs = inputsSchema.safeParse(selected.inputs);
  return {
    shape: selected.shape,
    servers,
    ...(inputs.success && inputs.data.length ? { inputs: inputs.data } : {}),
    errors
  };
}

export function parseMcpConfig(text: string, source: string, options: NormalizeOptions = {}): NormalizedConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new UnreadableConfig(source, { cause: error });
  }
  if (!isMapping(parsed)) throw new UnreadableConfig(source, { cause: 'top-level value is not an object' });
  return normalizeMcpConfig(parsed, source, options);
}

export async function readMcpConfigFile(file: string, options: NormalizeOptions = {}): Promise<NormalizedConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new UnreadableConfig(file, { cause: error });
  }
  return parseMcpConfig(text, file, options);
}
