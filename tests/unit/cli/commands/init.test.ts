/**
 * Tests for the init command.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile, mkdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createInitCommand, runInit } from '../../../../src/cli/commands/init.js';
import { getDefaultConfig, loadConfig } from '../../../../src/core/config/loader.js';

describe('init command', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `promptsmith-init-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    configPath = join(testDir, '.promptsmith', 'config.yaml');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('defines the command', () => {
    const command = createInitCommand();

    expect(command.name()).toBe('init');
    expect(command.options.map(o => o.long)).toEqual(['--force']);
  });

  it('writes the default config and creates the project directories', async () => {
    const result = await runInit(testDir, {});

    expect(result).toEqual({
      created: [
        configPath,
        join(testDir, '.promptsmith', 'templates'),
        join(testDir, '.promptsmith', 'checklists'),
      ],
      skipped: [],
    });
    expect((await stat(join(testDir, '.promptsmith', 'templates'))).isDirectory()).toBe(true);
    expect((await readFile(configPath, 'utf-8')).startsWith('# promptsmith configuration\n')).toBe(true);
    await expect(loadConfig(testDir)).resolves.toEqual(getDefaultConfig());
  });

  it('keeps an existing config', async () => {
    await mkdir(join(testDir, '.promptsmith'), { recursive: true });
    await writeFile(configPath, 'templates:\n  max_depth: 4\n');

    const result = await runInit(testDir, {});

    expect(result.skipped).toEqual([configPath]);
    expect(result.created).not.toContain(configPath);
    expect((await loadConfig(testDir)).templates.max_depth).toBe(4);
  });

  it('overwrites an existing config with --force', async () => {
    await mkdir(join(testDir, '.promptsmith'), { recursive: true });
    await writeFile(configPath, 'templates:\n  max_depth: 4\n');

    const result = await runInit(testDir, { force: true });

    expect(result.created[0]).toBe(configPath);
    expect((await loadConfig(testDir)).templates.max_depth).toBe(16);
  });
});
