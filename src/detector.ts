import fs from 'node:fs/promises';
import path from 'node:path';
import { isMissing, canonicalPath } from './paths.js';
import { readMcpConfigFile, type NormalizeOptions } from './normalize.js';
import type { ProjectConfig } from './types.js';

export type DetectionResult = {
  project: ProjectConfig;
  // File- and entry-level failures; the project is still valid.
  errors: Error[];
};

/**
 * Decides whether a directory is a project root and builds its config.
 * `detectProject` is only called for directories where `isProjectRoot` resolved true.
 */
export interface ProjectDetector {
  readonly name: string;
  isProjectRoot(dir: string): Promise<boolean>;
  detectProject(dir: string): Promise<DetectionResult>;
}

export const defaultMarkers = [
  'package.json',
  'go.mod',
  'Cargo.toml',
  'pyproject.toml',
  'requirements.txt',
  'pom.xml',
  'build.gradle',
  '.project',
  'mcp.json',
  'mcp-config.json',
  '.mcp'
];

export const mcpConfigFiles = ['mcp.json', 'mcp-config.json', path.join('.mcp', 'config.json')];

async function exists(file: string): Promise<boolean> {
  try {
    await fs.stat(file);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

export type DefaultDetectorOptions = NormalizeOptions & {
  markers?: string[];
  configFiles?: string[];
  now?: () => Date;
};

export class DefaultProjectDetector implements ProjectDetector {
  readonly name = 'DefaultProjectDetector';
  private readonly markers: string[];
  private readonly configFiles: string[];

  constructor(private readonly options: DefaultDetectorOptions = {}) {
    this.markers = options.markers ?? defaultMarkers;
    this.configFiles = options.configFiles ?? mcpConfigFiles;
  }

  async isProjectRoot(dir: string): Promise<boolean> {
    for (const marker of this.markers) {
      if (await exists(path.join(dir, marker))) return true;
    }
    return false;
  }

  async detectProject(dir: string): Promise<DetectionResult> {
    const projectPath = await canonicalPath(dir);
    const project: ProjectConfig = {
      name: path.basename(projectPath),
      path: projectPath,
      servers: {},
      detectedAt: (this.options.now ?? (() => new Date()))().toISOString(),
      detector: this.name
    };
    const errors: Error[] = [];

    // First config file present wins, even when it fails to parse.
    for (const name of this.configFiles) {
      const file = path.join(projectPath, name);
      if (!(await exists(file))) continue;
      project.configFile = file;
      try {
        const config = await readMcpConfigFile(file, this.options);
        project.servers = config.servers;
        if (config.inputs) project.inputs = config.inputs;
        errors.push(...config.errors);
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
      break;
    }

    return { project, errors };
  }
}
