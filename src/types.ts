/**
 * Shared types for fragments, occurrences and match results.
 */

export interface Fragment {
  /** 0-based position of the fragment within the pattern. */
  readonly index: number;
  readonly text: string;
  /** Offsets of the non-space characters, in ascending order. */
  readonly footprint: readonly number[];
}

export interface Occurrence {
  readonly line: number;
  readonly column: number;
  readonly fragment: Fragment;
}

export interface Position {
  readonly line: number;
  readonly column: number;
}

export type SearchPhase = 'empty' | 'pattern-loaded' | 'scanned' | 'detected';

/** True when `next` starts at the same column as `previous`, one line below. */
export function follows(next: Occurrence, previous: Occurrence): boolean {
  return next.line === previous.line + 1 && next.column === previous.column;
}

export class MatchResult {
  readonly occurrences: readonly Occurrence[];

  constructor(occurrences: readonly Occurrence[]) {
    this.occurrences = Object.freeze([...occurrences]);
  }

  get length(): number {
    return this.occurrences.length;
  }

  /** Line of the first fragment's occurrence. */
  get line(): number {
    return this.occurrences[0]?.line ?? 0;
  }

  /** Column shared by every occurrence of the match. */
  get column(): number {
    return this.occurrences[0]?.column ?? 0;
  }

  /** Every landscape position the match consumes, fragment by fragment. */
  positions(): Position[] {
    const result: Position[] = [];
    for (const occurrence of this.occurrences) {
      for (const offset of occurrence.fragment.footprint) {
        result.push({ line: occurrence.line, column: occurrence.column + offset });
      }
    }
    return result;
  }

  toJSON(): Array<{ line: number; column: number; fragment: number }> {
    return this.occurrences.map((o) => ({ line: o.line, column: o.column, fragment: o.fragment.index }));
  }
}
