/**
 * Layered configuration store.
 *
 * Lookup priority: overrides (set) > environment > config file > defaults (setDefault)
 *
 * Keys are dotted paths and case-insensitive; everything read into the store
 * is kept with lowercase keys. Environment variables are consulted only when
 * automatic env is enabled: `nested.fifthParam` with prefix `app` reads
 * `APP_NESTED_FIFTHPARAM`.
 */

import { existsSync } from 'node:fs';
import { extname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { BindableRecord, RecordSchema } from '../types/binding.js';
import { ExitCode } from '../types/exit-codes.js';
import { decodeOnto } from '../core/decode.js';
import { decodeError, FlagstackError } from '../core/errors.js';
import { isPlainRecord, unwrapSchema } from '../core/introspect.js';
import { deepMerge } from '../core/merge.js';
import { atomicWrite, safeReadFileSync } from './atomic.js';

/** Supported config file formats. */
export type ConfigFormat = 'yaml' | 'json';

/** Extensions probed, in order, when searching for a config file. */
export const CONFIG_EXTENSIONS: Readonly<Record<string, ConfigFormat>> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json',
};

export interface ConfigStoreOptions {
  /** Prefix for automatic environment variable names. */
  envPrefix?: string;
  automaticEnv?: boolean;
  /** Environment to read from. Default: process.env. */
  env?: NodeJS.ProcessEnv;
}

function splitKey(key: string): string[] {
  return key === '' ? [] : key.toLowerCase().split('.');
}

function joinKey(base: string, field: string): string {
  return base === '' ? field : `${base}.${field}`;
}

/**
 * Lowercase every key of every nested map. Lists are kept as they are.
 */
export function normalizeKeys(value: unknown): unknown {
  if (!isPlainRecord(value)) return value;
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    result[key.toLowerCase()] = normalizeKeys(inner);
  }
  return result;
}

function lookup(tree: Record<string, unknown>, parts: readonly string[]): unknown {
  let current: unknown = tree;
  for (const part of parts) {
    if (!isPlainRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, parts: readonly string[], value: unknown): void {
  let current = obj;
  const last = parts[parts.length - 1];
  if (last === undefined) return;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isPlainRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/** Format for a file path, from its extension. */
export function formatOf(filePath: string): ConfigFormat | undefined {
  return CONFIG_EXTENSIONS[extname(filePath).toLowerCase()];
}

function configError(message: string, options?: { fix?: string; cause?: unknown }): FlagstackError {
  return new FlagstackError(ExitCode.CONFIG_ERROR, message, options);
}

export class ConfigStore {
  private readonly searchPaths: string[] = [];
  private configName = 'config';
  private configFile: string | null = null;
  private configType: ConfigFormat | null = null;
  private usedFile: string | null = null;
  private envPrefix: string;
  private automaticEnv: boolean;
  private readonly env: NodeJS.ProcessEnv;

  private config: Record<string, unknown> = {};
  private defaults: Record<string, unknown> = {};
  private overrides: Record<string, unknown> = {};

  constructor(options: ConfigStoreOptions = {}) {
    this.envPrefix = options.envPrefix ?? '';
    this.automaticEnv = options.automaticEnv ?? false;
    this.env = options.env ?? process.env;
  }

  // ── Sources ────────────────────────────────────────────────────────

  /** Add a directory to search for the config file. Searched in insertion order. */
  addConfigPath(dir: string): void {
    if (!this.searchPaths.includes(dir)) {
      this.searchPaths.push(dir);
    }
  }

  getConfigPaths(): readonly string[] {
    return this.searchPaths;
  }

  /** Base name of the config file, without extension. */
  setConfigName(name: string): void {
    this.configName = name;
  }

  getConfigName(): string {
    return this.configName;
  }

  /** Use this file instead of searching the config paths. */
  setConfigFile(filePath: string): void {
    this.configFile = filePath;
  }

  getConfigFile(): string | null {
    return this.configFile;
  }

  /** Force a format instead of deriving it from the file extension. */
  setConfigType(format: ConfigFormat): void {
    this.configType = format;
  }

  setEnvPrefix(prefix: string): void {
    this.envPrefix = prefix;
  }

  enableAutomaticEnv(): void {
    this.automaticEnv = true;
  }

  /** Environment variable consulted for a key. */
  envVarName(key: string): string {
    const name = [this.envPrefix, key].filter((part) => part !== '').join('_');
    return name.toUpperCase().replace(/[.-]/g, '_');
  }

  /**
   * Locate the config file: the explicit file if one was set, else the first
   * `<dir>/<name><ext>` that exists across the search paths.
   */
  findConfigFile(): string | null {
    if (this.configFile) return this.configFile;
    for (const dir of this.searchPaths) {
      for (const ext of Object.keys(CONFIG_EXTENSIONS)) {
        const candidate = join(dir, `${this.configName}${ext}`);
        if (existsSync(candidate)) return candidate;
      }
    }
    return null;
  }

  /**
   * Read the config file into the store.
   *
   * @returns false when there is no config file to read
   * @throws FlagstackError CONFIG_ERROR for malformed content, FILE_ERROR for unreadable files
   */
  readInConfig(): boolean {
    const filePath = this.findConfigFile();
    if (!filePath) return false;

    const content = safeReadFileSync(filePath);
    if (content === null) return false;

    const format = this.configType ?? formatOf(filePath);
    if (!format) {
      throw configError(`Unsupported config file type: ${filePath}`, {
        fix: `Use one of ${Object.keys(CONFIG_EXTENSIONS).join(', ')} or call setConfigType()`,
      });
    }
    this.readConfig(content, format, filePath);
    this.usedFile = filePath;
    return true;
  }

  /**
   * Replace the config layer with a parsed document.
   *
   * @param source - Where the content came from, for error messages
   */
  readConfig(content: string, format: ConfigFormat, source = '<memory>'): void {
    let parsed: unknown;
    try {
      parsed = format === 'yaml' ? parseYaml(content) : JSON.parse(content);
    } catch (err) {
      throw configError(`Invalid ${format.toUpperCase()} in: ${source}`, { cause: err });
    }
    if (parsed === null || parsed === undefined) {
      parsed = {};
    }
    if (!isPlainRecord(parsed)) {
      throw configError(`Config root must be a map in: ${source}`);
    }
    const normalized = normalizeKeys(parsed);
    this.config = isPlainRecord(normalized) ? normalized : {};
  }

  /** Path of the config file read by readInConfig(), if any. */
  configFileUsed(): string | null {
    return this.usedFile;
  }

  // ── Lookups ────────────────────────────────────────────────────────

  private envValue(key: string): string | undefined {
    if (!this.automaticEnv || key === '') return undefined;
    return this.env[this.envVarName(key)];
  }

  /**
   * Resolve a key across all layers. When the winning layer and lower layers
   * hold maps, the result is their deep merge.
   */
  get(key: string): unknown {
    const parts = splitKey(key);
    if (parts.length === 0) return this.settings();

    let result: unknown;
    const apply = (value: unknown): void => {
      if (value === undefined) return;
      result = isPlainRecord(value) && isPlainRecord(result) ? deepMerge(result, value) : value;
    };
    apply(lookup(this.defaults, parts));
    apply(lookup(this.config, parts));
    apply(this.envValue(key));
    apply(lookup(this.overrides, parts));
    return result;
  }

  isSet(key: string): boolean {
    return this.get(key) !== undefined;
  }

  getString(key: string): string {
    const value = this.get(key);
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return '';
  }

  getFloat(key: string): number {
    const value = this.get(key);
    const num = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
    return Number.isFinite(num) ? num : 0;
  }

  getInt(key: string): number {
    return Math.trunc(this.getFloat(key));
  }

  getBool(key: string): boolean {
    const value = this.get(key);
    if (typeof value === 'string') {
      const s = value.trim().toLowerCase();
      return s === 'true' || s === '1';
    }
    return value === true || value === 1;
  }

  /**
   * Raw ordered collection at a key.
   *
   * @returns undefined when the key is not set
   * @throws FlagstackError DECODE_ERROR when the key holds something other than a list
   */
  getList(key: string): unknown[] | undefined {
    const value = this.get(key);
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value)) {
      throw decodeError(key, `expected a list, got ${typeof value}`);
    }
    return [...value];
  }

  /** Copy of the map at a key, or undefined when the key holds no map. */
  sub(key: string): Record<string, unknown> | undefined {
    const value = this.get(key);
    return isPlainRecord(value) ? structuredClone(value) : undefined;
  }

  /** Merged tree of defaults, config file and overrides. Environment is not included. */
  settings(): Record<string, unknown> {
    return deepMerge(deepMerge(this.defaults, this.config), this.overrides);
  }

  // ── Writes ─────────────────────────────────────────────────────────

  /** Set a value in the override layer (in memory only). */
  set(key: string, value: unknown): void {
    const parts = splitKey(key);
    if (parts.length === 0) {
      throw new FlagstackError(ExitCode.INVALID_INPUT, 'Cannot set the empty key');
    }
    setNestedValue(this.overrides, parts, normalizeKeys(value));
  }

  /** Set a value in the default layer (in memory only). */
  setDefault(key: string, value: unknown): void {
    const parts = splitKey(key);
    if (parts.length === 0) {
      throw new FlagstackError(ExitCode.INVALID_INPUT, 'Cannot set a default for the empty key');
    }
    setNestedValue(this.defaults, parts, normalizeKeys(value));
  }

  // ── Decoding ───────────────────────────────────────────────────────

  /**
   * Build the map a record at `key` decodes from: one lookup per schema field,
   * so environment variables and overrides apply field by field.
   */
  resolveTree(key: string, schema: RecordSchema): Record<string, unknown> {
    const tree: Record<string, unknown> = {};
    for (const [field, fieldSchema] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      const path = joinKey(key, field);
      const inner = unwrapSchema(fieldSchema);
      if (inner instanceof z.ZodObject) {
        const nested = this.resolveTree(path, inner);
        const raw = this.get(path);
        if (Object.keys(nested).length > 0) {
          tree[field] = nested;
        } else if (raw !== undefined) {
          tree[field] = raw;
        }
        continue;
      }
      const value = this.get(path);
      if (value !== undefined) {
        tree[field] = value;
      }
    }
    return tree;
  }

  /** Decode the whole store onto a record. */
  unmarshal(schema: RecordSchema, target: BindableRecord): BindableRecord {
    return this.unmarshalKey('', schema, target);
  }

  /** Decode the sub-tree at `key` onto a record. */
  unmarshalKey(key: string, schema: RecordSchema, target: BindableRecord): BindableRecord {
    const current = this.get(key);
    if (key !== '' && current !== undefined && !isPlainRecord(current)) {
      throw decodeError(key, `expected a map, got ${Array.isArray(current) ? 'a list' : typeof current}`);
    }
    return decodeOnto(this.resolveTree(key, schema), schema, target, key);
  }

  /**
   * Write the merged settings back to the config file in use.
   *
   * @returns The path written
   */
  async writeConfig(): Promise<string> {
    const filePath = this.usedFile ?? this.configFile;
    if (!filePath) {
      throw configError('No config file in use', {
        fix: 'Call writeConfigAs(path) or set a config file first',
      });
    }
    return this.writeConfigAs(filePath);
  }

  /**
   * Write the merged settings to a file, as YAML or JSON by extension.
   *
   * @returns The path written
   */
  async writeConfigAs(filePath: string): Promise<string> {
    const format = formatOf(filePath) ?? this.configType;
    if (!format) {
      throw configError(`Unsupported config file type: ${filePath}`);
    }
    const data = this.settings();
    const content = format === 'yaml' ? stringifyYaml(data) : JSON.stringify(data, null, 2) + '\n';
    await atomicWrite(filePath, content);
    return filePath;
  }
}
