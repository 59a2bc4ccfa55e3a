import chalk, { type ChalkInstance } from 'chalk';
import { loadConfig, type LoadConfigOptions } from '../../config/loader.js';
import { loadToolCatalog } from '../../catalog/loader.js';
import { createToolSearch } from '../../search/tool-search.js';
import { ToolSearchConfigError } from '../../shared/errors.js';
import type { ScoreExplanation } from '../../shared/types.js';
import { createDebugLogger } from '../../utils/debug.js';
import { formatResults, formatResultsJson } from '../format.js';

export interface SearchCommandOptions extends LoadConfigOptions {
  catalog?: string;
  topK?: string;
  json?: boolean;
  explain?: boolean;
  colors?: ChalkInstance;
}

export function parseTopK(value: string): number {
  const topK = Number(value);
  if (!Number.isInteger(topK)) {
    throw new ToolSearchConfigError(`--top-k must be an integer, got "${value}"`);
  }
  return topK;
}

/**
 * Run a search and return the text to print.
 */
export async function searchCommand(queryParts: string[], options: SearchCommandOptions = {}): Promise<string> {
  const config = loadConfig({ cwd: options.cwd, env: options.env });
  const catalogPath = options.catalog ?? config.catalogPath;
  if (!catalogPath) {
    throw new ToolSearchConfigError(
      'No tool catalog given. Pass --catalog <path> or set catalogPath / TOOL_SEARCH_CATALOG.',
    );
  }

  const tools = loadToolCatalog(catalogPath);
  const index = createToolSearch(tools, {
    defaultTopK: config.defaultTopK,
    logger: createDebugLogger('search'),
  });

  const query = queryParts.join(' ');
  const topK = options.topK !== undefined ? parseTopK(options.topK) : undefined;
  const results = await index.search(query, topK);

  if (options.json) {
    return formatResultsJson(results);
  }

  let explanations: Map<string, ScoreExplanation> | undefined;
  if (options.explain) {
    explanations = new Map();
    for (const { tool } of results) {
      const explanation = index.explain(query, tool.name);
      if (explanation) explanations.set(tool.name, explanation);
    }
  }

  return formatResults(results, { colors: options.colors ?? chalk, explanations });
}
