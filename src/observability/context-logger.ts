/**
 * Structured logging bound to a search session.
 */

import type { Config } from '../config.js';

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: string;
  level?: string;
  output?: WritableOutput;
}

export class ContextLogger {
  private _name: string;
  private _format: string;
  private _level: string;
  private _levelValue: number;
  private _output: WritableOutput;
  private _traceId: string | null = null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'pattern-search';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
  }

  /** Build a logger from the `logging.level` and `logging.format` keys. */
  static fromConfig(config: Config, name: string, output?: WritableOutput): ContextLogger {
    const level = config.get('logging.level', 'info');
    const format = config.get('logging.format', 'json');
    return new ContextLogger({
      name,
      level: typeof level === 'string' ? level : 'info',
      format: typeof format === 'string' ? format : 'json',
      output,
    });
  }

  get name(): string {
    return this._name;
  }

  get level(): string {
    return this._level;
  }

  get traceId(): string | null {
    return this._traceId;
  }

  /** Returns a copy of this logger that stamps every entry with `traceId`. */
  withTrace(traceId: string): ContextLogger {
    const logger = new ContextLogger({
      name: this._name,
      format: this._format,
      level: this._level,
      output: this._output,
    });
    logger._traceId = traceId;
    return logger;
  }

  private _emit(levelName: string, message: string, extra?: Record<string, unknown> | null): void {
    const levelValue = LEVELS[levelName] ?? 20;
    if (levelValue < this._levelValue) return;

    const now = new Date();
    const entry: Record<string, unknown> = {
      timestamp: now.toISOString(),
      level: levelName,
      message,
      trace_id: this._traceId,
      logger: this._name,
      extra: extra ?? null,
    };

    if (this._format === 'json') {
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      const trace = this._traceId ?? 'none';
      let extrasStr = '';
      if (extra) {
        extrasStr = ' ' + Object.entries(extra).map(([k, v]) => `${k}=${v}`).join(' ');
      }
      this._output.write(`${ts} [${lvl}] [trace=${trace}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}
