/**
 * PatternAssembler: chains one occurrence per fragment down consecutive lines.
 *
 * The search is greedy. At each depth it commits to the first unblocked
 * occurrence (in discovery order) that follows the previous one and never
 * revisits that choice. Combined with sequential commitment of matches this
 * makes the result deterministic, but it does not maximise the number of
 * disjoint matches: an early match may consume characters that two later
 * ones would have needed.
 */

import type { ExclusionSet } from './exclusion-set.js';
import { follows, type Occurrence } from './types.js';

export class PatternAssembler {
  private _occurrences: readonly (readonly Occurrence[])[];
  private _exclusions: ExclusionSet;

  /**
   * @param occurrences - occurrence lists indexed by fragment, each in discovery order
   */
  constructor(occurrences: readonly (readonly Occurrence[])[], exclusions: ExclusionSet) {
    this._occurrences = occurrences;
    this._exclusions = exclusions;
  }

  private _isBlocked(occurrence: Occurrence): boolean {
    return this._exclusions.isBlocked(occurrence.line, occurrence.column, occurrence.fragment.footprint);
  }

  /**
   * Extend `start` into a full chain, or return null when some fragment has
   * no unblocked follower.
   */
  extend(start: Occurrence): Occurrence[] | null {
    if (this._isBlocked(start)) return null;

    const chain: Occurrence[] = [start];
    for (let depth = 1; depth < this._occurrences.length; depth++) {
      const previous = chain[chain.length - 1];
      const candidates = this._occurrences[depth] ?? [];
      const next = candidates.find((candidate) => follows(candidate, previous) && !this._isBlocked(candidate));
      if (next === undefined) return null;
      chain.push(next);
    }
    return chain;
  }

  /**
   * Seed from every occurrence of the first fragment. `onMatch` runs before
   * the next seed is tried, so the caller can commit the chain to the
   * exclusion set and later seeds see it.
   */
  assemble(onMatch: (chain: Occurrence[]) => void): void {
    const seeds = this._occurrences[0] ?? [];
    for (const seed of seeds) {
      const chain = this.extend(seed);
      if (chain !== null) onMatch(chain);
    }
  }
}
