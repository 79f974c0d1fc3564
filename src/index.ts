#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from './config.js';
import { DefaultProjectDetector } from './detector.js';
import { errorCode } from './errors.js';
import { formatProject, formatProjectLine, parseDepth, printResult, redact } from './io.js';
import { ProjectRegistry } from './registry.js';
import { scanForProjects } from './scan.js';
import { FileStorage } from './storage.js';

type GlobalOptions = {
  output?: string;
  pretty?: boolean;
  configDir?: string;
  storageDir?: string;
  verbose?: boolean;
};

type ScanCommandOptions = {
  maxDepth?: number;
  exclude?: string[];
  register?: boolean;
};

const program = new Command();
program
  .name('mcp-scan')
  .description('Discover projects and their MCP server configuration')
  .option('--output <format>', 'json|text', 'text')
  .option('--pretty')
  .option('--config-dir <path>')
  .option('--storage-dir <path>')
  .option('--verbose', 'print every scan error');

function openRegistry(options: GlobalOptions): ProjectRegistry {
  const config = resolveConfig(options.configDir);
  const storage = new FileStorage(options.storageDir ?? config.storageDir);
  return new ProjectRegistry(storage, { onError: (error) => console.error(`warning: ${error.message}`) });
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

program
  .command('scan [roots...]')
  .description('Scan directories for projects; roots default to the configured scan paths')
  .option('--max-depth <n>', 'directory levels below each root', parseDepth)
  .option('--exclude <name>', 'directory name or path fragment to skip (repeatable)', collect)
  .option('--register', 'register every detected project')
  .action(async (roots: string[], cmdOpts: ScanCommandOptions) => {
    const options = program.opts<GlobalOptions>();
    const config = resolveConfig(options.configDir);
    if (!roots.length && !config.scanning.enabled) {
      console.error('Project scanning is disabled in config.');
      return;
    }
    const { projects, error } = await scanForProjects(roots.length ? roots : config.scanning.scanPaths, new DefaultProjectDetector(), {
      settings: {
        maxDepth: cmdOpts.maxDepth ?? config.scanning.maxDepth,
        excludePaths: [...config.scanning.excludePaths, ...(cmdOpts.exclude ?? [])]
      }
    });

    if (cmdOpts.register) {
      const registry = openRegistry(options);
      for (const project of projects) await registry.register(project.path, project);
    }

    if (options.output === 'json') printResult(redact({ projects, errors: error?.errors.map(String) ?? [] }), options);
    else projects.forEach((project) => formatProject(project).forEach((line) => console.log(line)));

    if (error) {
      if (options.verbose) error.errors.forEach((e) => console.error(`warning: ${e instanceof Error ? e.message : String(e)}`));
      else console.error(`${error.message} (use --verbose for details)`);
    }
  });

program
  .command('register <path>')
  .description('Detect a single project directory and register it')
  .action(async (dir: string) => {
    const options = program.opts<GlobalOptions>();
    const detector = new DefaultProjectDetector();
    if (!(await detector.isProjectRoot(dir))) {
      process.exitCode = 2;
      throw new Error(`Not a project root: ${dir}`);
    }
    const { project, errors } = await detector.detectProject(dir);
    errors.forEach((e) => console.error(`warning: ${e.message}`));
    const stored = await openRegistry(options).register(project.path, project);
    if (options.output === 'json') printResult(redact(stored), options);
    else console.log(formatProjectLine(stored));
  });

program
  .command('projects')
  .description('List registered projects')
  .action(async () => {
    const options = program.opts<GlobalOptions>();
    const projects = await openRegistry(options).list();
    if (options.output === 'json') printResult({ projects }, options);
    else projects.forEach((project) => console.log(formatProjectLine(project)));
  });

program
  .command('project <path>')
  .description('Show a registered project')
  .action(async (dir: string) => {
    const options = program.opts<GlobalOptions>();
    const project = await openRegistry(options).get(dir);
    if (options.output === 'json') printResult(redact(project), options);
    else formatProject(project).forEach((line) => console.log(line));
  });

program
  .command('remove <path>')
  .description('Unregister a project')
  .action(async (dir: string) => {
    const options = program.opts<GlobalOptions>();
    await openRegistry(options).remove(dir);
  });

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  if (errorCode(error) === 'PROJECT_NOT_FOUND') process.exitCode = 2;
  if (process.exitCode === undefined || process.exitCode === 0) process.exitCode = 1;
});
