/**
 * mcp-tool-search
 * Keyword-overlap search over MCP tool descriptors.
 */

// Core types
export type {
  Tool,
  ToolHandler,
  SearchResult,
  ToolSearch,
  ToolSearchOptions,
  MatchKind,
  KeywordMatch,
  ScoreExplanation,
} from './shared/types.js';

// Search
export { createToolSearch, KeywordToolSearch, DEFAULT_TOP_K } from './search/tool-search.js';
export { extractKeywords, toolText, MIN_KEYWORD_LENGTH } from './search/keywords.js';
export {
  calculateScore,
  explainScore,
  EXACT_MATCH_WEIGHT,
  PARTIAL_MATCH_WEIGHT,
} from './search/scoring.js';

// Catalog & config
export { parseToolCatalog, loadToolCatalog } from './catalog/loader.js';
export { loadConfig, loadEnvConfig, getConfigPaths, DEFAULT_CONFIG } from './config/loader.js';
export type { SearchConfig, LoadConfigOptions } from './config/loader.js';

// Errors & logging
export {
  ToolSearchError,
  ToolSearchConfigError,
  CatalogLoadError,
  InvalidCatalogError,
} from './shared/errors.js';
export { createDebugLogger } from './utils/debug.js';
export type { DebugLogger, DebugLoggerOptions } from './utils/debug.js';
