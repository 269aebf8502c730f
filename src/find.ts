/**
 * One-call entry points: load, scan and detect on a fresh session.
 */

import { PatternSearch, type PatternSearchOptions } from './search.js';
import { readLandscapeFile, readPatternFile, type TextInput } from './sources.js';

export function findPattern(pattern: TextInput, landscape: TextInput, options?: PatternSearchOptions): PatternSearch {
  const search = new PatternSearch(options);
  search.loadPattern(pattern).scanLandscape(landscape).detectMatches();
  return search;
}

/** Both files are read completely before scanning starts. */
export function findPatternInFiles(
  patternPath: string,
  landscapePath: string,
  options?: PatternSearchOptions,
): PatternSearch {
  const pattern = readPatternFile(patternPath);
  const landscape = readLandscapeFile(landscapePath);
  return findPattern(pattern, landscape, options);
}
