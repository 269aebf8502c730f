/**
 * Reading pattern and landscape text into lines.
 */

import { readFileSync } from 'node:fs';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { InvalidLandscapeError, InvalidPatternError } from './errors.js';

export type TextInput = string | readonly string[];

const LinesSchema = Type.Array(Type.String());

/** Split text on LF or CRLF. A trailing newline does not add an empty line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Normalize a string or array of strings into lines; null when the input is not text. */
export function toLines(input: unknown): string[] | null {
  if (typeof input === 'string') return splitLines(input);
  if (Value.Check(LinesSchema, input)) return [...input];
  return null;
}

function readText(path: string): string {
  return readFileSync(path, 'utf-8');
}

export function readPatternFile(path: string): string[] {
  try {
    return splitLines(readText(path));
  } catch (e) {
    throw new InvalidPatternError(`Cannot read the pattern file '${path}'`, {
      cause: e instanceof Error ? e : undefined,
    });
  }
}

export function readLandscapeFile(path: string): string[] {
  try {
    return splitLines(readText(path));
  } catch (e) {
    throw new InvalidLandscapeError(`Cannot read the landscape file '${path}'`, {
      cause: e instanceof Error ? e : undefined,
    });
  }
}
