/**
 * Tool settings: YAML loading and schema validation.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'psmanifest.yaml';

const LogLevelSchema = Type.Union([
  Type.Literal('trace'),
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('fatal'),
], { default: 'info' });

export const SettingsSchema = Type.Object({
  root: Type.String({ minLength: 1 }),
  modules: Type.Array(Type.String({ minLength: 1 }), { default: [] }),
  extension: Type.String({ pattern: '^\\.[A-Za-z0-9]+$', default: '.ps1' }),
  wipSuffix: Type.String({ minLength: 1, default: '-wip' }),
  publicDir: Type.String({ minLength: 1, default: 'Public' }),
  privateDir: Type.String({ minLength: 1, default: 'Private' }),
  lineEnding: Type.Union([Type.Literal('lf'), Type.Literal('crlf')], { default: 'lf' }),
  logging: Type.Object(
    {
      level: LogLevelSchema,
      format: Type.Union([Type.Literal('json'), Type.Literal('text')], { default: 'text' }),
    },
    { default: {} },
  ),
});

export type ToolSettings = Static<typeof SettingsSchema>;

/** Settings that affect how a single module is scanned and rendered. */
export type LayoutSettings = Pick<ToolSettings, 'extension' | 'wipSuffix' | 'publicDir' | 'privateDir' | 'lineEnding'>;

export const DEFAULT_LAYOUT: Readonly<LayoutSettings> = Object.freeze({
  extension: '.ps1',
  wipSuffix: '-wip',
  publicDir: 'Public',
  privateDir: 'Private',
  lineEnding: 'lf',
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function mergeDeep(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return out;
}

/**
 * Validate a raw settings object and fill in defaults.
 *
 * Throws ConfigError listing every schema violation.
 */
export function resolveSettings(raw: Record<string, unknown>): ToolSettings {
  const candidate = Value.Default(SettingsSchema, Value.Clone(raw));
  if (Value.Check(SettingsSchema, candidate)) {
    return candidate;
  }
  const errors = [...Value.Errors(SettingsSchema, candidate)].map((e) => ({
    path: e.path || '/',
    message: e.message,
  }));
  const summary = errors.map((e) => `${e.path}: ${e.message}`).join('; ');
  throw new ConfigError(`Invalid settings: ${summary}`, { errors });
}

/**
 * Load settings from a YAML file, apply overrides, and validate.
 *
 * A relative `root` in the file is resolved against the file's directory;
 * a relative `root` override is resolved against the working directory.
 */
export function loadSettings(configPath: string, overrides?: Record<string, unknown>): ToolSettings {
  const fullPath = resolve(configPath);
  if (!existsSync(fullPath)) {
    throw new ConfigNotFoundError(fullPath);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(fullPath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in configuration file: ${fullPath}`, { configPath: fullPath }, {
      cause: e instanceof Error ? e : undefined,
    });
  }

  if (parsed === null || parsed === undefined) parsed = {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must be a YAML mapping: ${fullPath}`, { configPath: fullPath });
  }

  const fromFile = { ...parsed };
  if (typeof fromFile['root'] === 'string') {
    fromFile['root'] = resolve(dirname(fullPath), fromFile['root']);
  }
  const merged = mergeDeep(fromFile, overrides ?? {});
  if (typeof merged['root'] === 'string') {
    merged['root'] = resolve(merged['root']);
  }
  return resolveSettings(merged);
}
