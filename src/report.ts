/**
 * Text and JSON renderings of a finished search.
 */

import type { PatternSearch } from './search.js';

export interface SearchReport {
  matches: number;
  results: Array<Array<{ line: number; column: number; fragment: number }>>;
}

export function formatReport(search: PatternSearch): string {
  const lines = [`Number of patterns found: ${search.matchCount}`];
  search.matches.forEach((match, i) => {
    lines.push(`Match ${i + 1}: line ${match.line}, column ${match.column}`);
  });
  return lines.join('\n');
}

export function reportToJSON(search: PatternSearch): SearchReport {
  return {
    matches: search.matchCount,
    results: search.matches.map((match) => match.toJSON()),
  };
}
