/**
 * PatternSearch: one search session from pattern load to match detection.
 */

import { v4 as uuidv4 } from 'uuid';
import { PatternAssembler } from './assembler.js';
import { Config } from './config.js';
import { InvalidLandscapeError, InvalidPatternError, PatternNotSetError } from './errors.js';
import { ExclusionSet } from './exclusion-set.js';
import { FragmentMatcher } from './fragment.js';
import { ContextLogger } from './observability/context-logger.js';
import { toLines, type TextInput } from './sources.js';
import { MatchResult, type SearchPhase } from './types.js';

export interface PatternSearchOptions {
  config?: Config;
  logger?: ContextLogger;
}

/** Remove the leading spaces shared by every non-empty line. */
export function dedentLines(lines: readonly string[]): string[] {
  let common = Infinity;
  for (const line of lines) {
    if (line.length === 0) continue;
    const indent = line.length - line.replace(/^ +/, '').length;
    common = Math.min(common, indent);
  }
  if (common === Infinity || common === 0) return [...lines];
  return lines.map((line) => line.slice(common));
}

export class PatternSearch {
  readonly sessionId: string;
  private _config: Config;
  private _logger: ContextLogger;
  private _phase: SearchPhase = 'empty';
  private _fragments: FragmentMatcher[] = [];
  private _exclusions: ExclusionSet = new ExclusionSet();
  private _matches: MatchResult[] = [];
  private _lineCount = 0;

  constructor(options?: PatternSearchOptions) {
    this.sessionId = uuidv4();
    this._config = options?.config ?? new Config();
    const logger = options?.logger ?? ContextLogger.fromConfig(this._config, 'pattern-search');
    this._logger = logger.withTrace(this.sessionId);
  }

  get phase(): SearchPhase {
    return this._phase;
  }

  get fragments(): readonly FragmentMatcher[] {
    return this._fragments;
  }

  get matchCount(): number {
    return this._matches.length;
  }

  get matches(): readonly MatchResult[] {
    return this._matches;
  }

  get exclusions(): Pick<ExclusionSet, 'isBlocked' | 'isConsumed' | 'size'> {
    return this._exclusions;
  }

  /** Number of landscape lines seen by the last scan. */
  get lineCount(): number {
    return this._lineCount;
  }

  /**
   * Build one fragment per pattern line. Trailing whitespace is stripped,
   * leading spaces are kept as wildcards. Replaces any earlier pattern.
   *
   * Blank lines inside or after the pattern become empty fragments. An empty
   * fragment never matches, so such a pattern finds nothing.
   */
  loadPattern(input: TextInput): this {
    const raw = toLines(input);
    if (raw === null) {
      throw new InvalidPatternError('Pattern must be a string or an array of strings', { traceId: this.sessionId });
    }

    let lines = raw.map((line) => line.trimEnd());
    if (this._config.get('pattern.dedent', false) === true) {
      lines = dedentLines(lines);
    }
    if (lines.every((line) => line.length === 0)) {
      throw new InvalidPatternError('Pattern is empty', { traceId: this.sessionId });
    }

    this._fragments = lines.map((line, index) => new FragmentMatcher(line, index));
    this._resetResults();
    this._lineCount = 0;
    this._phase = 'pattern-loaded';
    this._logger.debug('Pattern loaded', { fragments: this._fragments.length });
    return this;
  }

  /** Record every fragment occurrence in every landscape line (1-based). */
  scanLandscape(input: TextInput): this {
    if (this._phase === 'empty') {
      throw new PatternNotSetError('scan the landscape', this._phase, { traceId: this.sessionId });
    }
    const lines = toLines(input);
    if (lines === null) {
      throw new InvalidLandscapeError('Landscape must be a string or an array of strings', {
        traceId: this.sessionId,
      });
    }

    for (const fragment of this._fragments) fragment.reset();
    this._resetResults();
    this._lineCount = 0;
    this._phase = 'pattern-loaded';

    lines.forEach((text, i) => {
      for (const fragment of this._fragments) {
        fragment.findOccurrences(i + 1, text);
      }
    });
    this._lineCount = lines.length;
    this._phase = 'scanned';
    this._logger.debug('Landscape scanned', {
      lines: lines.length,
      occurrences: this._fragments.map((f) => f.occurrences.length),
    });
    return this;
  }

  /**
   * Assemble complete matches seeded from the first fragment's occurrences.
   * Running it again for the same scan returns the stored results.
   */
  detectMatches(): readonly MatchResult[] {
    if (this._phase === 'detected') return this._matches;
    if (this._phase !== 'scanned') {
      throw new PatternNotSetError('detect matches', this._phase, { traceId: this.sessionId });
    }

    const assembler = new PatternAssembler(
      this._fragments.map((f) => f.occurrences),
      this._exclusions,
    );
    assembler.assemble((chain) => {
      for (const occurrence of chain) {
        this._exclusions.mark(occurrence.line, occurrence.column, occurrence.fragment.footprint);
      }
      this._matches.push(new MatchResult(chain));
    });

    this._phase = 'detected';
    this._logger.info('Matches detected', { matches: this._matches.length });
    return this._matches;
  }

  private _resetResults(): void {
    this._exclusions = new ExclusionSet();
    this._matches = [];
  }
}
