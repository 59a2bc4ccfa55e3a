/**
 * Shared types for mcp-tool-search
 */

import type { DebugLogger } from '../utils/debug.js';

/**
 * Invocation callback an MCP server binds to a tool.
 * Carried on the record only; search never calls it.
 */
export type ToolHandler = (
  args: Record<string, unknown>,
  workspacePath: string,
) => Promise<unknown>;

export interface Tool {
  name: string;
  description: string;
  /** JSON Schema for the tool arguments (passthrough) */
  inputSchema: Record<string, unknown>;
  handler?: ToolHandler;
}

export interface SearchResult<T extends Tool = Tool> {
  tool: T;
  score: number;
}

/**
 * Anything that can rank tools for a query.
 * Keyword overlap is one backend; an embeddings backend would be another.
 */
export interface ToolSearch<T extends Tool = Tool> {
  search(query: string, topK?: number): Promise<SearchResult<T>[]>;
}

export interface ToolSearchOptions {
  /** topK used when a search call omits it (default: 5) */
  defaultTopK?: number;
  logger?: DebugLogger;
}

export type MatchKind = 'exact' | 'partial' | 'none';

export interface KeywordMatch {
  keyword: string;
  kind: MatchKind;
  /** Tool keyword that produced a partial match */
  matchedKeyword?: string;
  weight: number;
}

export interface ScoreExplanation {
  score: number;
  matches: KeywordMatch[];
}
