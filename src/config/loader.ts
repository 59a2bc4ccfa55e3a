/**
 * Configuration Loader
 *
 * Handles loading and merging configuration from multiple sources:
 * - Defaults
 * - User config: $TOOL_SEARCH_CONFIG_DIR/config.json (~/.config/tool-search/config.json)
 * - Project config: .tool-search/config.json
 * - Environment variables (TOOL_SEARCH_TOP_K, TOOL_SEARCH_CATALOG)
 *
 * Later sources win.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ToolSearchConfigError } from '../shared/errors.js';
import { formatIssues } from '../utils/validation.js';
import { DEFAULT_TOP_K } from '../search/tool-search.js';

export interface SearchConfig {
  defaultTopK: number;
  /** Tool catalog used when the CLI is not given one */
  catalogPath?: string;
}

export const DEFAULT_CONFIG: SearchConfig = {
  defaultTopK: DEFAULT_TOP_K,
};

const configFileSchema = z
  .object({
    defaultTopK: z.number().int().positive(),
    catalogPath: z.string().min(1),
  })
  .partial();

export type PartialSearchConfig = z.infer<typeof configFileSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration file locations
 */
export function getConfigPaths(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { user: string; project: string } {
  const userDir = env.TOOL_SEARCH_CONFIG_DIR || join(homedir(), '.config', 'tool-search');
  return {
    user: join(userDir, 'config.json'),
    project: join(cwd, '.tool-search', 'config.json'),
  };
}

/**
 * Load and validate one config file. Returns null when the file is absent.
 * A relative catalogPath is resolved against baseDir (the project root for
 * project config).
 */
export function loadJsonFile(path: string, baseDir: string = dirname(path)): PartialSearchConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ToolSearchConfigError(
      `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ToolSearchConfigError(`Invalid config in ${path}:\n${formatIssues(result.error)}`);
  }

  const config = result.data;
  if (config.catalogPath !== undefined) {
    config.catalogPath = resolve(baseDir, config.catalogPath);
  }
  return config;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialSearchConfig {
  const config: PartialSearchConfig = {};

  const rawTopK = env.TOOL_SEARCH_TOP_K;
  if (rawTopK !== undefined && rawTopK !== '') {
    const topK = Number(rawTopK);
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ToolSearchConfigError(`TOOL_SEARCH_TOP_K must be a positive integer, got "${rawTopK}"`);
    }
    config.defaultTopK = topK;
  }

  if (env.TOOL_SEARCH_CATALOG) {
    config.catalogPath = env.TOOL_SEARCH_CATALOG;
  }

  return config;
}

function merge(target: SearchConfig, source: PartialSearchConfig | null): SearchConfig {
  if (!source) return target;
  return {
    defaultTopK: source.defaultTopK ?? target.defaultTopK,
    catalogPath: source.catalogPath ?? target.catalogPath,
  };
}

/**
 * Load and merge all configuration sources
 */
export function loadConfig(options: LoadConfigOptions = {}): SearchConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const paths = getConfigPaths(cwd, env);

  let config: SearchConfig = { ...DEFAULT_CONFIG };
  config = merge(config, loadJsonFile(paths.user));
  config = merge(config, loadJsonFile(paths.project, cwd));
  config = merge(config, loadEnvConfig(env));
  return config;
}
