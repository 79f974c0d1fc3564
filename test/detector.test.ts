import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DefaultProjectDetector } from '../src/detector.js';
import { MalformedServerConfig, UnreadableConfig } from '../src/errors.js';
import { makeDirs, tempDir, writeFiles } from './helpers.js';

const fixedClock = () => new Date('2026-01-02T03:04:05.000Z');

describe('DefaultProjectDetector', () => {
  it('treats a directory with only go.mod as a project without servers', async () => {
    const dir = path.join(tempDir(), 'service');
    writeFiles(dir, { 'go.mod': 'module example.test/service\n' });
    const detector = new DefaultProjectDetector({ now: fixedClock });

    expect(await detector.isProjectRoot(dir)).toBe(true);
    expect(await detector.detectProject(dir)).toEqual({
      project: { name: 'service', path: dir, servers: {}, detectedAt: '2026-01-02T03:04:05.000Z', detector: 'DefaultProjectDetector' },
      errors: []
    });
  });

  it('does not accept a directory without markers', async () => {
    const dir = tempDir();
    writeFiles(dir, { 'README.md': '# notes\n' });
    expect(await new DefaultProjectDetector().isProjectRoot(dir)).toBe(false);
  });

  it('accepts an .mcp directory as a marker', async () => {
    const dir = tempDir();
    makeDirs(dir, '.mcp');
    expect(await new DefaultProjectDetector().isProjectRoot(dir)).toBe(true);
  });

  it('reads servers only from mcp.json when mcp-config.json also exists', async () => {
    const dir = tempDir();
    writeFiles(dir, {
      'mcp.json': '{"mcpServers":{"x":{"transport":"stdio","command":"npx"}}}',
      'mcp-config.json': '{"servers":{"y":{"transport":"url","url":"http://localhost:9000"}}}'
    });
    const { project, errors } = await new DefaultProjectDetector().detectProject(dir);

    expect(project.servers).toEqual({ x: { name: 'x', transport: 'stdio', command: 'npx', args: [] } });
    expect(project.configFile).toBe(path.join(dir, 'mcp.json'));
    expect(errors).toEqual([]);
  });

  it('falls back to .mcp/config.json', async () => {
    const dir = tempDir();
    writeFiles(dir, { 'package.json': '{}', '.mcp/config.json': '{"mcp":{"servers":{"docs":{"url":"https://docs.example.test/mcp"}}}}' });
    const { project } = await new DefaultProjectDetector().detectProject(dir);

    expect(project.configFile).toBe(path.join(dir, '.mcp', 'config.json'));
    expect(project.servers).toEqual({ docs: { name: 'docs', transport: 'url', url: 'https://docs.example.test/mcp' } });
  });

  it('keeps the project when its config file is unreadable', async () => {
    const dir = tempDir();
    writeFiles(dir, { 'mcp.json': 'not json', 'mcp-config.json': '{"servers":{"y":{"command":"node"}}}' });
    const { project, errors } = await new DefaultProjectDetector().detectProject(dir);

    expect(project.servers).toEqual({});
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(UnreadableConfig);
  });

  it('returns malformed entries alongside the valid servers', async () => {
    const dir = tempDir();
    writeFiles(dir, { 'mcp.json': '{"servers":{"good":{"command":"node"},"bad":{"args":["x"]}}}' });
    const { project, errors } = await new DefaultProjectDetector().detectProject(dir);

    expect(Object.keys(project.servers)).toEqual(['good']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(MalformedServerConfig);
    expect(errors[0].message).toBe(`Malformed server "bad" in ${path.join(dir, 'mcp.json')}: missing both command and url`);
  });

  it('copies inputs from the nested shape', async () => {
    const dir = tempDir();
    writeFiles(dir, { 'mcp.json': '{"mcp":{"inputs":[{"type":"promptString","id":"key"}],"servers":{"a":{"command":"node"}}}}' });
    const { project } = await new DefaultProjectDetector().detectProject(dir);
    expect(project.inputs).toEqual([{ type: 'promptString', id: 'key' }]);
  });

  it('accepts custom marker sets', async () => {
    const dir = tempDir();
    writeFiles(dir, { 'deno.json': '{}', 'package.json': '{}' });
    const detector = new DefaultProjectDetector({ markers: ['deno.json'] });
    const other = new DefaultProjectDetector({ markers: ['Gemfile'] });

    expect(await detector.isProjectRoot(dir)).toBe(true);
    expect(await other.isProjectRoot(dir)).toBe(false);
  });
});
