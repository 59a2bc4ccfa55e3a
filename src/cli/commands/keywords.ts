import { extractKeywords } from '../../search/keywords.js';

/** Extracted keywords, sorted, one per line */
export function keywordsCommand(textParts: string[]): string {
  return [...extractKeywords(textParts.join(' '))].sort().join('\n');
}
