/**
 * multiline-pattern-search - find vertically aligned multiline patterns in text.
 */

// Core
export { PatternSearch, dedentLines } from './search.js';
export type { PatternSearchOptions } from './search.js';
export { FragmentMatcher, compileFragment, computeFootprint } from './fragment.js';
export { ExclusionSet } from './exclusion-set.js';
export { PatternAssembler } from './assembler.js';
export { MatchResult, follows } from './types.js';
export type { Fragment, Occurrence, Position, SearchPhase } from './types.js';

// Entry points
export { findPattern, findPatternInFiles } from './find.js';
export { splitLines, toLines, readPatternFile, readLandscapeFile } from './sources.js';
export type { TextInput } from './sources.js';
export { formatReport, reportToJSON } from './report.js';
export type { SearchReport } from './report.js';

// Config
export { Config, ConfigSchema } from './config.js';
export type { ConfigData } from './config.js';

// Errors
export {
  SearchError,
  InvalidPatternError,
  InvalidLandscapeError,
  PatternNotSetError,
  ConfigNotFoundError,
  ConfigError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Observability
export { ContextLogger } from './observability/context-logger.js';
export type { ContextLoggerOptions, WritableOutput } from './observability/context-logger.js';

export const VERSION = '0.1.0';
