/**
 * FragmentMatcher: one pattern line compiled into a literal-with-wildcards
 * matcher that records every (overlapping) occurrence in landscape lines.
 */

import type { Fragment, Occurrence } from './types.js';

const WILDCARD = ' ';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/**
 * Compile a fragment into a sticky RegExp. Spaces match any single
 * character (dotAll), everything else matches literally.
 */
export function compileFragment(text: string): RegExp {
  let source = '';
  for (const ch of text) {
    source += ch === WILDCARD ? '.' : escapeRegExp(ch);
  }
  return new RegExp(source, 'sy');
}

export function computeFootprint(text: string): number[] {
  const footprint: number[] = [];
  for (let i = 0; i < text.length; i++) {
    if (text[i] !== WILDCARD) footprint.push(i);
  }
  return footprint;
}

export class FragmentMatcher implements Fragment {
  readonly index: number;
  readonly text: string;
  readonly footprint: readonly number[];
  private _regex: RegExp;
  private _occurrences: Occurrence[] = [];

  constructor(text: string, index: number = 0) {
    this.index = index;
    this.text = text;
    this.footprint = Object.freeze(computeFootprint(text));
    this._regex = compileFragment(text);
  }

  /** Occurrences recorded so far, in discovery order. */
  get occurrences(): readonly Occurrence[] {
    return this._occurrences;
  }

  /**
   * Record every start column (1-based) of the fragment in `lineText`.
   * The matcher is tried at each position so overlapping hits are kept.
   */
  findOccurrences(lineNumber: number, lineText: string): Occurrence[] {
    const found: Occurrence[] = [];
    if (this.text.length === 0) return found;

    const lastStart = lineText.length - this.text.length;
    for (let start = 0; start <= lastStart; start++) {
      this._regex.lastIndex = start;
      if (this._regex.test(lineText)) {
        const occurrence: Occurrence = Object.freeze({ line: lineNumber, column: start + 1, fragment: this });
        found.push(occurrence);
        this._occurrences.push(occurrence);
      }
    }
    return found;
  }

  reset(): void {
    this._occurrences = [];
  }
}
