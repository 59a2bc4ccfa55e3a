/**
 * Keyword Tool Search
 *
 * Ranks a fixed tool list against a free-text query by keyword overlap.
 * Keywords for every tool are computed once at construction; there is no
 * add/remove API, so the index never goes stale.
 */

import { z } from 'zod';
import { extractKeywords, toolText } from './keywords.js';
import { calculateScore, explainScore } from './scoring.js';
import { ToolSearchConfigError } from '../shared/errors.js';
import type {
  ScoreExplanation,
  SearchResult,
  Tool,
  ToolSearch,
  ToolSearchOptions,
} from '../shared/types.js';
import type { DebugLogger } from '../utils/debug.js';

export const DEFAULT_TOP_K = 5;

const topKSchema = z.number().int();

interface IndexedTool<T extends Tool> {
  readonly tool: T;
  readonly keywords: ReadonlySet<string>;
}

export class KeywordToolSearch<T extends Tool = Tool> implements ToolSearch<T> {
  private readonly entries: readonly IndexedTool<T>[];
  private readonly defaultTopK: number;
  private readonly log: DebugLogger | undefined;

  constructor(tools: readonly T[], options: ToolSearchOptions = {}) {
    const defaultTopK = options.defaultTopK ?? DEFAULT_TOP_K;
    const parsed = topKSchema.safeParse(defaultTopK);
    if (!parsed.success) {
      throw new ToolSearchConfigError(`defaultTopK must be an integer, got ${String(defaultTopK)}`);
    }

    this.defaultTopK = parsed.data;
    this.log = options.logger;
    this.entries = tools.map((tool) => ({
      tool,
      keywords: extractKeywords(toolText(tool)),
    }));
    this.log?.('indexed tools', { count: this.entries.length });
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Ranked matches with score > 0, best first. Equal scores keep the
   * order the tools were given in.
   */
  searchSync(query: string, topK: number = this.defaultTopK): SearchResult<T>[] {
    const queryKeywords = extractKeywords(query);

    const scored: SearchResult<T>[] = [];
    for (const { tool, keywords } of this.entries) {
      const score = calculateScore(queryKeywords, keywords);
      if (score > 0) {
        scored.push({ tool, score });
      }
    }

    // Array.prototype.sort is stable
    const results = scored.sort((a, b) => b.score - a.score).slice(0, Math.max(topK, 0));
    this.log?.('search', { query, topK, matched: scored.length, returned: results.length });
    return results;
  }

  search(query: string, topK?: number): Promise<SearchResult<T>[]> {
    return Promise.resolve(this.searchSync(query, topK));
  }

  /**
   * Per-keyword breakdown for the first indexed tool with this name.
   */
  explain(query: string, toolName: string): ScoreExplanation | undefined {
    const entry = this.entries.find((e) => e.tool.name === toolName);
    if (!entry) return undefined;
    return explainScore(extractKeywords(query), entry.keywords);
  }
}

export function createToolSearch<T extends Tool>(
  tools: readonly T[],
  options?: ToolSearchOptions,
): KeywordToolSearch<T> {
  return new KeywordToolSearch(tools, options);
}
