import { describe, it, expect } from 'vitest';
import { FragmentMatcher, compileFragment, computeFootprint } from '../src/fragment.js';

function columns(fragment: FragmentMatcher, line: string): number[] {
  return fragment.findOccurrences(1, line).map((o) => o.column);
}

function countOverlapping(needle: string, haystack: string): number {
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + 1);
  }
  return count;
}

describe('computeFootprint', () => {
  it('lists the offsets of non-space characters', () => {
    expect(computeFootprint(' a b')).toEqual([1, 3]);
    expect(computeFootprint('abc')).toEqual([0, 1, 2]);
    expect(computeFootprint('')).toEqual([]);
  });
});

describe('compileFragment', () => {
  it('turns spaces into any-character wildcards', () => {
    const re = compileFragment('a b');
    expect(re.source).toBe('a.b');
    expect(re.flags).toBe('sy');
  });

  it('escapes regex metacharacters', () => {
    const re = compileFragment('a.b');
    expect(re.source).toBe('a\\.b');
  });
});

describe('FragmentMatcher', () => {
  it('builds an immutable footprint', () => {
    const fragment = new FragmentMatcher('  x y', 2);
    expect(fragment.index).toBe(2);
    expect(fragment.footprint).toEqual([2, 4]);
    expect(Object.isFrozen(fragment.footprint)).toBe(true);
  });

  it('finds overlapping occurrences', () => {
    expect(columns(new FragmentMatcher('aa'), 'aaa')).toEqual([1, 2]);
  });

  it('reports 1-based columns', () => {
    expect(columns(new FragmentMatcher('ab'), 'xaby')).toEqual([2]);
  });

  it('matches any character where the fragment has a space', () => {
    expect(columns(new FragmentMatcher('a c'), 'abcaxc')).toEqual([1, 4]);
    expect(columns(new FragmentMatcher('a b'), 'a\tb')).toEqual([1]);
    expect(columns(new FragmentMatcher('a b'), 'a b')).toEqual([1]);
  });

  it('treats other characters literally', () => {
    expect(columns(new FragmentMatcher('a.b'), 'axb a.b')).toEqual([5]);
    expect(columns(new FragmentMatcher('(*)'), '(*)(x)')).toEqual([1]);
  });

  it('is case-sensitive', () => {
    expect(columns(new FragmentMatcher('Ab'), 'ab Ab')).toEqual([4]);
  });

  it('yields nothing for an empty fragment', () => {
    expect(columns(new FragmentMatcher(''), 'anything')).toEqual([]);
  });

  it('yields nothing when the line is shorter than the fragment', () => {
    expect(columns(new FragmentMatcher('abcd'), 'abc')).toEqual([]);
  });

  it('records occurrences across lines in discovery order', () => {
    const fragment = new FragmentMatcher('o');
    fragment.findOccurrences(1, 'oxo');
    fragment.findOccurrences(2, 'xox');
    expect(fragment.occurrences.map((o) => [o.line, o.column])).toEqual([
      [1, 1],
      [1, 3],
      [2, 2],
    ]);
    expect(fragment.occurrences[0].fragment).toBe(fragment);
  });

  it('records every hit on a very long line', () => {
    const fragment = new FragmentMatcher('a');
    const found = fragment.findOccurrences(1, 'a'.repeat(1_000_000));
    expect(found).toHaveLength(1_000_000);
    expect(fragment.occurrences).toHaveLength(1_000_000);
    expect(fragment.occurrences[999_999].column).toBe(1_000_000);
  });

  it('reset clears recorded occurrences', () => {
    const fragment = new FragmentMatcher('o');
    fragment.findOccurrences(1, 'ooo');
    fragment.reset();
    expect(fragment.occurrences).toEqual([]);
  });

  it('finds as many occurrences as an overlapping literal scan', () => {
    const cases: Array<[string, string]> = [
      ['aa', 'aaaaa'],
      ['aba', 'ababababa'],
      ['xyz', 'xyzxyzxy'],
      ['q', 'no match here'],
    ];
    for (const [needle, haystack] of cases) {
      const fragment = new FragmentMatcher(needle);
      expect(fragment.findOccurrences(1, haystack)).toHaveLength(countOverlapping(needle, haystack));
    }
  });
});
