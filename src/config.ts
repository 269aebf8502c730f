/**
 * Configuration accessor with dot-path key support, loadable from YAML.
 */

import { existsSync, readFileSync } from 'node:fs';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';

export const ConfigSchema = Type.Object(
  {
    pattern: Type.Optional(
      Type.Object(
        {
          dedent: Type.Optional(Type.Boolean()),
        },
        { additionalProperties: false },
      ),
    ),
    logging: Type.Optional(
      Type.Object(
        {
          level: Type.Optional(
            Type.Union([
              Type.Literal('trace'),
              Type.Literal('debug'),
              Type.Literal('info'),
              Type.Literal('warn'),
              Type.Literal('error'),
              Type.Literal('fatal'),
            ]),
          ),
          format: Type.Optional(Type.Union([Type.Literal('json'), Type.Literal('text')])),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type ConfigData = Static<typeof ConfigSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class Config {
  private _data: ConfigData;

  constructor(data?: ConfigData) {
    this._data = data ?? {};
  }

  /** Validate an arbitrary value against {@link ConfigSchema}. */
  static fromObject(raw: unknown): Config {
    if (!Value.Check(ConfigSchema, raw)) {
      const errors: Array<Record<string, unknown>> = [];
      for (const error of Value.Errors(ConfigSchema, raw)) {
        errors.push({ path: error.path || '/', message: error.message });
      }
      const first = errors[0];
      const summary = first ? `${first['path']}: ${first['message']}` : 'unknown error';
      throw new ConfigError(`Invalid configuration (${summary})`, errors);
    }
    return new Config(raw);
  }

  static load(configPath: string): Config {
    if (!existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }

    let data: unknown;
    try {
      data = yaml.load(readFileSync(configPath, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in configuration file '${configPath}': ${e}`, undefined, {
        cause: e instanceof Error ? e : undefined,
      });
    }

    // An empty document parses to undefined.
    return Config.fromObject(data ?? {});
  }

  get data(): Readonly<ConfigData> {
    return this._data;
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }
}
