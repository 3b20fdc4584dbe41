// Configuration for trellis, driven by schema.json
//
// Priority order (lowest to highest):
// 1. Schema defaults
// 2. File config ($XDG_CONFIG_HOME/trellis/config.json)
// 3. Env vars
// 4. CLI flags (explicit user intent)

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import schema from './schema.json' with { type: 'json' };
import { Env } from '../env.ts';
import { ConfigError, ensureError } from '../errors.ts';
import { isLogFormat, isLogLevel } from '../logging.ts';
import type { LogFormat, LogLevel } from '../logging.ts';
import { getConfigDir } from '../xdg.ts';

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  envInverted?: boolean;
  flag?: string;
  flagInverted?: boolean;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export const CONFIG_SCHEMA: ConfigSchema = schema;

export type ConfigSource = 'default' | 'file' | 'env' | 'cli';

export const OUTPUT_FORMATS = ['tree', 'json', 'dom', 'styles'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface ConfigInitOptions {
  // Flat `path -> value` map, as produced by parseCliFlags
  cliFlags?: Record<string, unknown>;
  // Defaults to getConfigFilePath()
  configFile?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function getConfigFilePath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Convert an env var or flag string to the property's type
 */
export function parseConfigValue(path: string, prop: ConfigProperty, raw: string): unknown {
  switch (prop.type) {
    case 'boolean':
      return raw === 'true' || raw === '1';
    case 'integer': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isInteger(value)) {
        throw new ConfigError(`Invalid integer value: ${raw}`, path);
      }
      return value;
    }
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new ConfigError(`Invalid number value: ${raw}`, path);
      }
      return value;
    }
    default:
      return raw;
  }
}

/**
 * Throws ConfigError unless the value fits the property's type, enum and range
 */
export function validateConfigValue(path: string, prop: ConfigProperty, value: unknown): void {
  switch (prop.type) {
    case 'string':
      if (typeof value !== 'string') {
        throw new ConfigError(`Expected a string, got ${JSON.stringify(value)}`, path);
      }
      if (prop.enum && !prop.enum.includes(value)) {
        throw new ConfigError(`Expected one of ${prop.enum.join('|')}, got "${value}"`, path);
      }
      return;
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new ConfigError(`Expected a boolean, got ${JSON.stringify(value)}`, path);
      }
      return;
    case 'integer':
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value) || (prop.type === 'integer' && !Number.isInteger(value))) {
        throw new ConfigError(`Expected ${prop.type === 'integer' ? 'an integer' : 'a number'}, got ${JSON.stringify(value)}`, path);
      }
      if (prop.minimum !== undefined && value < prop.minimum) {
        throw new ConfigError(`Must be at least ${prop.minimum}, got ${value}`, path);
      }
      if (prop.maximum !== undefined && value > prop.maximum) {
        throw new ConfigError(`Must be at most ${prop.maximum}, got ${value}`, path);
      }
      return;
  }
}

/**
 * Read a JSON config file. A missing file is an empty config.
 */
export function loadConfigFile(path: string): Record<string, unknown> {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read config file: ${ensureError(error).message}`, path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON: ${ensureError(error).message}`, path);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Config file must contain a JSON object', path);
  }
  return parsed;
}

/**
 * Look up a dotted path, first as a flat key then as nested objects
 */
function getPath(obj: Record<string, unknown>, path: string): unknown {
  if (path in obj) {
    return obj[path];
  }
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

// Module-level singleton
let instance: TrellisConfig | null = null;

export class TrellisConfig {
  private data: Record<string, unknown> = {};
  private sources: Record<string, ConfigSource> = {};

  private constructor(
    private readonly configFile: string,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, unknown>
  ) {
    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      const { value, source } = this.resolveValue(path, prop, fileConfig, cliFlags);
      validateConfigValue(path, prop, value);
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>,
    cliFlags: Record<string, unknown>
  ): { value: unknown; source: ConfigSource } {
    // 1. CLI flag; parseCliFlags has already applied flagInverted
    if (prop.flag && cliFlags[path] !== undefined) {
      return { value: cliFlags[path], source: 'cli' };
    }

    // 2. Env var
    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        const parsed = parseConfigValue(path, prop, envVal);
        return { value: prop.envInverted ? !parsed : parsed, source: 'env' };
      }
    }

    // 3. File config
    const fileVal = getPath(fileConfig, path);
    if (fileVal !== undefined) {
      return { value: fileVal, source: 'file' };
    }

    // 4. Default from schema
    return { value: prop.default, source: 'default' };
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options?: ConfigInitOptions): TrellisConfig {
    if (instance) {
      throw new Error('TrellisConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    const configFile = options?.configFile ?? getConfigFilePath();
    instance = new TrellisConfig(configFile, loadConfigFile(configFile), options?.cliFlags ?? {});
    return instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): TrellisConfig {
    return instance ?? this.init();
  }

  static isInitialized(): boolean {
    return instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    instance = null;
  }

  getValue(path: string): unknown {
    return this.data[path];
  }

  getSource(path: string): ConfigSource | undefined {
    return this.sources[path];
  }

  /**
   * Current config with sources, grouped by category
   */
  getConfigText(): string {
    const lines: string[] = [];
    lines.push(`Config file: ${this.configFile}`);
    lines.push('Priority: default < file < env < cli');
    lines.push('');

    const categories = new Map<string, string[]>();
    for (const [path, prop] of Object.entries(CONFIG_SCHEMA.properties)) {
      const category = path.split('.')[0];
      const value = this.data[path];
      const source = this.sources[path];

      let sourceStr = '';
      switch (source) {
        case 'env':
          sourceStr = ` <- ${prop.env}`;
          break;
        case 'cli':
          sourceStr = ` <- ${prop.flag}`;
          break;
        case 'file':
          sourceStr = ' <- config.json';
          break;
      }

      const entries = categories.get(category) ?? [];
      entries.push(`  ${path} = ${JSON.stringify(value)}${sourceStr}`);
      categories.set(category, entries);
    }

    for (const [category, entries] of [...categories.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`[${category.charAt(0).toUpperCase()}${category.slice(1)}]`);
      lines.push(...entries);
      lines.push('');
    }
    return lines.join('\n');
  }

  // Typed getters

  get logLevel(): LogLevel {
    const value = this.data['log.level'];
    return typeof value === 'string' && isLogLevel(value) ? value : 'INFO';
  }

  get logFile(): string {
    const value = this.data['log.file'];
    return typeof value === 'string' ? value : '';
  }

  get logFormat(): LogFormat {
    const value = this.data['log.format'];
    return isLogFormat(value) ? value : 'structured';
  }

  get viewportWidth(): number {
    const value = this.data['viewport.width'];
    return typeof value === 'number' ? value : 800;
  }

  get userAgentStylesheet(): boolean {
    return this.data['layout.userAgentStylesheet'] !== false;
  }

  get documentStyles(): boolean {
    return this.data['layout.documentStyles'] !== false;
  }

  get outputFormat(): OutputFormat {
    const value = this.data['output.format'];
    return isOutputFormat(value) ? value : 'tree';
  }
}
