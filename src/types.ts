// Open set: transports other than these are kept as written.
export type TransportType = 'stdio' | 'url' | (string & {});

export type ServerConfig = {
  name: string;
  transport: TransportType;
  command?: string;
  args?: string[];
  url?: string;
  env?: Record<string, string>;
  headers?: Record<string, string>;
};

export type McpInput = {
  type: string;
  id: string;
  description?: string;
  default?: string;
  password?: boolean;
};

export type ProjectConfig = {
  name: string;
  path: string;
  servers: Record<string, ServerConfig>;
  configFile?: string;
  inputs?: McpInput[];
  detectedAt?: string;
  detector?: string;
};

export type ProjectInfo = {
  name: string;
  path: string;
  serverCount: number;
  servers: string[];
};

export type ScanSettings = {
  enabled: boolean;
  scanPaths: string[];
  excludePaths: string[];
  maxDepth: number;
};

export const defaultScanSettings: ScanSettings = {
  enabled: true,
  scanPaths: ['~/code', '~/projects', '~/dev', '.'],
  excludePaths: ['.git', 'node_modules', '.vscode', '.idea', 'target', 'build', 'dist'],
  maxDepth: 3
};
