/**
 * Output formatting for the tool-search CLI.
 * Pure functions; colour comes from the Chalk instance passed in.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { ScoreExplanation, SearchResult } from '../shared/types.js';

/** Chalk with colour disabled */
export const plain: ChalkInstance = new Chalk({ level: 0 });

export function formatScore(score: number): string {
  return score.toFixed(2);
}

export function formatExplanation(explanation: ScoreExplanation, colors: ChalkInstance = plain): string[] {
  return explanation.matches.map((match) => {
    const detail = match.matchedKeyword ? ` (${match.matchedKeyword})` : '';
    const kind =
      match.kind === 'exact' ? colors.green(match.kind)
        : match.kind === 'partial' ? colors.yellow(match.kind)
          : colors.gray(match.kind);
    return `   - ${match.keyword}: ${kind}${detail} +${match.weight}`;
  });
}

export interface FormatResultsOptions {
  colors?: ChalkInstance;
  /** Breakdown per tool name, printed under each result */
  explanations?: Map<string, ScoreExplanation>;
}

export function formatResults(results: SearchResult[], options: FormatResultsOptions = {}): string {
  const colors = options.colors ?? plain;
  if (results.length === 0) {
    return colors.yellow('No matching tools.');
  }

  const lines: string[] = [];
  results.forEach(({ tool, score }, index) => {
    lines.push(
      `${index + 1}. ${colors.bold(tool.name)} ${colors.cyan(`(${formatScore(score)})`)} ${colors.gray(tool.description)}`,
    );
    const explanation = options.explanations?.get(tool.name);
    if (explanation) {
      lines.push(...formatExplanation(explanation, colors));
    }
  });
  return lines.join('\n');
}

export function formatResultsJson(results: SearchResult[]): string {
  return JSON.stringify(
    results.map(({ tool, score }) => ({ name: tool.name, score })),
    null,
    2,
  );
}
