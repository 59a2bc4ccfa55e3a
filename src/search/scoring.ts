/**
 * Keyword overlap scoring
 *
 * Each query keyword earns EXACT_MATCH_WEIGHT when the tool has it, or
 * PARTIAL_MATCH_WEIGHT for the first tool keyword that contains it or is
 * contained by it. The total is divided by the query keyword count, so a
 * score always lies in [0, 1].
 */

import type { KeywordMatch, ScoreExplanation } from '../shared/types.js';

export const EXACT_MATCH_WEIGHT = 1;
export const PARTIAL_MATCH_WEIGHT = 0.5;

function matchKeyword(keyword: string, toolKeywords: ReadonlySet<string>): KeywordMatch {
  if (toolKeywords.has(keyword)) {
    return { keyword, kind: 'exact', weight: EXACT_MATCH_WEIGHT };
  }
  for (const toolKeyword of toolKeywords) {
    if (toolKeyword.includes(keyword) || keyword.includes(toolKeyword)) {
      return { keyword, kind: 'partial', matchedKeyword: toolKeyword, weight: PARTIAL_MATCH_WEIGHT };
    }
  }
  return { keyword, kind: 'none', weight: 0 };
}

export function calculateScore(queryKeywords: ReadonlySet<string>, toolKeywords: ReadonlySet<string>): number {
  let matches = 0;
  for (const keyword of queryKeywords) {
    matches += matchKeyword(keyword, toolKeywords).weight;
  }
  return matches / Math.max(queryKeywords.size, 1);
}

/**
 * Same score as calculateScore, with the per-keyword breakdown.
 */
export function explainScore(queryKeywords: ReadonlySet<string>, toolKeywords: ReadonlySet<string>): ScoreExplanation {
  const matches = [...queryKeywords].map((keyword) => matchKeyword(keyword, toolKeywords));
  const total = matches.reduce((sum, m) => sum + m.weight, 0);
  return { score: total / Math.max(queryKeywords.size, 1), matches };
}
