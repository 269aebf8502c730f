/**
 * Shared test fixtures and helpers.
 */

import { ContextLogger } from '../src/observability/context-logger.js';

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export function createSilentLogger(): ContextLogger {
  return new ContextLogger({ name: 'test', output: createBufferOutput().output });
}
