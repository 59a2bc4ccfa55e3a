import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_CONFIG,
  getConfigPaths,
  loadConfig,
  loadEnvConfig,
  loadJsonFile,
} from '../loader.js';
import { ToolSearchConfigError } from '../../shared/errors.js';

describe('config loader', () => {
  let root: string;
  let projectDir: string;
  let userDir: string;
  let env: NodeJS.ProcessEnv;

  function writeProjectConfig(content: string): void {
    mkdirSync(join(projectDir, '.tool-search'), { recursive: true });
    writeFileSync(join(projectDir, '.tool-search', 'config.json'), content);
  }

  function writeUserConfig(content: string): void {
    writeFileSync(join(userDir, 'config.json'), content);
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'tool-search-config-'));
    projectDir = join(root, 'project');
    userDir = join(root, 'user');
    mkdirSync(projectDir);
    mkdirSync(userDir);
    env = { TOOL_SEARCH_CONFIG_DIR: userDir };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('getConfigPaths', () => {
    it('uses TOOL_SEARCH_CONFIG_DIR for the user file', () => {
      expect(getConfigPaths('/work', { TOOL_SEARCH_CONFIG_DIR: '/cfg' })).toEqual({
        user: join('/cfg', 'config.json'),
        project: join('/work', '.tool-search', 'config.json'),
      });
    });
  });

  describe('loadJsonFile', () => {
    it('returns null for a missing file', () => {
      expect(loadJsonFile(join(root, 'nope.json'))).toBeNull();
    });

    it('resolves a relative catalogPath against the file directory', () => {
      writeUserConfig(JSON.stringify({ catalogPath: 'tools.json' }));
      expect(loadJsonFile(join(userDir, 'config.json'))).toEqual({
        catalogPath: join(userDir, 'tools.json'),
      });
    });

    it('throws on invalid JSON', () => {
      writeUserConfig('{ nope');
      expect(() => loadJsonFile(join(userDir, 'config.json'))).toThrow(ToolSearchConfigError);
    });

    it('throws on a schema violation', () => {
      writeUserConfig(JSON.stringify({ defaultTopK: -1 }));
      expect(() => loadJsonFile(join(userDir, 'config.json'))).toThrow(
        'defaultTopK: Number must be greater than 0',
      );
    });
  });

  describe('loadEnvConfig', () => {
    it('reads top-k and catalog', () => {
      expect(loadEnvConfig({ TOOL_SEARCH_TOP_K: '9', TOOL_SEARCH_CATALOG: '/tmp/tools.json' })).toEqual({
        defaultTopK: 9,
        catalogPath: '/tmp/tools.json',
      });
    });

    it('ignores unset and empty values', () => {
      expect(loadEnvConfig({ TOOL_SEARCH_TOP_K: '' })).toEqual({});
    });

    it.each(['0', '-3', '2.5', 'abc'])('rejects TOOL_SEARCH_TOP_K=%s', (value) => {
      expect(() => loadEnvConfig({ TOOL_SEARCH_TOP_K: value })).toThrow(ToolSearchConfigError);
    });
  });

  describe('loadConfig', () => {
    it('returns defaults when nothing is configured', () => {
      expect(loadConfig({ cwd: projectDir, env })).toEqual(DEFAULT_CONFIG);
    });

    it('applies user config', () => {
      writeUserConfig(JSON.stringify({ defaultTopK: 3 }));
      expect(loadConfig({ cwd: projectDir, env }).defaultTopK).toBe(3);
    });

    it('lets project config override user config', () => {
      writeUserConfig(JSON.stringify({ defaultTopK: 3 }));
      writeProjectConfig(JSON.stringify({ defaultTopK: 7, catalogPath: 'tools.json' }));
      expect(loadConfig({ cwd: projectDir, env })).toEqual({
        defaultTopK: 7,
        catalogPath: join(projectDir, 'tools.json'),
      });
    });

    it('lets the environment override files', () => {
      writeProjectConfig(JSON.stringify({ defaultTopK: 7 }));
      expect(loadConfig({ cwd: projectDir, env: { ...env, TOOL_SEARCH_TOP_K: '9' } }).defaultTopK).toBe(9);
    });

    it('keeps values a later source does not set', () => {
      writeUserConfig(JSON.stringify({ catalogPath: '/abs/tools.json' }));
      writeProjectConfig(JSON.stringify({ defaultTopK: 2 }));
      expect(loadConfig({ cwd: projectDir, env })).toEqual({
        defaultTopK: 2,
        catalogPath: '/abs/tools.json',
      });
    });
  });
});
