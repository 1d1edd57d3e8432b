/**
 * Unit tests for FileSystemAdapter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSystemAdapter } from '../../../src/platform/FileSystemAdapter.js';
import { ConfigLoader } from '../../../src/shared/config/ConfigLoader.js';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

describe('FileSystemAdapter', () => {
  let fs: FileSystemAdapter;
  let testDir: string;

  beforeEach(async () => {
    fs = new FileSystemAdapter();
    testDir = await mkdtemp(join(tmpdir(), 'switchboard-test-'));
  });

  afterEach(async () => {
    if (testDir) {
      await rm(testDir, { recursive: true, force: true });
    }
  });

  describe('readFile', () => {
    it('should read UTF-8 content', async () => {
      const filePath = join(testDir, 'utf8.txt');
      await writeFile(filePath, 'Grüße, 世界', 'utf-8');

      expect(await fs.readFile(filePath)).toBe('Grüße, 世界');
    });

    it('should reject for a missing file', async () => {
      await expect(fs.readFile(join(testDir, 'missing.txt'))).rejects.toThrow(/ENOENT/);
    });
  });

  describe('exists', () => {
    it('should return true for existing file', async () => {
      const filePath = join(testDir, 'exists.txt');
      await writeFile(filePath, 'content');

      expect(await fs.exists(filePath)).toBe(true);
    });

    it('should return true for existing directory', async () => {
      expect(await fs.exists(testDir)).toBe(true);
    });

    it('should return false for non-existing file', async () => {
      expect(await fs.exists(join(testDir, 'nonexistent.txt'))).toBe(false);
    });
  });

  it('should let ConfigLoader read a project config from disk', async () => {
    const projectRoot = join(testDir, 'project');
    await mkdir(join(projectRoot, '.switchboard'), { recursive: true });
    await writeFile(
      join(projectRoot, '.switchboard', 'config.yml'),
      'agents:\n  ums:\n    endpoint: http://users-agent:8042\n'
    );

    const config = await new ConfigLoader(fs, { homeDir: join(testDir, 'home'), env: {} }).load({
      projectRoot,
    });

    expect(config.agents.ums.endpoint).toBe('http://users-agent:8042');
  });
});
