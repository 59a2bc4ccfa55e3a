/**
 * Keyword extraction
 *
 * Lowercases, turns punctuation into spaces ("real-time" -> "real time"),
 * splits on whitespace and drops tokens of two characters or fewer.
 */

import type { Tool } from '../shared/types.js';

/** Tokens at or below this length are dropped */
export const MIN_KEYWORD_LENGTH = 3;

export function extractKeywords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .replace(/[^a-z0-9\s]/g, ' ')
      .split(/\s+/)
      .filter((word) => word.length >= MIN_KEYWORD_LENGTH),
  );
}

/** Text a tool is indexed under */
export function toolText(tool: Pick<Tool, 'name' | 'description'>): string {
  return tool.name + ' ' + tool.description;
}
