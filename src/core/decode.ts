/**
 * Decode open maps from the config store onto typed records.
 *
 * Keys match field names case-insensitively (config files and environment
 * bindings rarely agree on case). Values are weakly coerced to the field's
 * kind; anything that cannot be coerced fails with DECODE_ERROR.
 */

import { z } from 'zod';
import type { BindableRecord, FieldKind, RecordSchema } from '../types/binding.js';
import { decodeError } from './errors.js';
import { fieldKindOf, isPlainRecord, unwrapSchema } from './introspect.js';

/**
 * Find the key of `map` matching `name` case-insensitively.
 * An exact match wins over a case-folded one.
 */
export function findKey(map: Record<string, unknown>, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(map, name)) return name;
  const folded = name.toLowerCase();
  return Object.keys(map).find((key) => key.toLowerCase() === folded);
}

function joinPath(base: string, field: string): string {
  return base === '' ? field : `${base}.${field}`;
}

/**
 * Coerce a raw value to a primitive field kind.
 * Returns undefined when the value cannot represent that kind.
 */
export function coerceValue(kind: FieldKind, value: unknown): boolean | string | number | undefined {
  switch (kind) {
    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 0 || value === 1) return value === 1;
      if (typeof value === 'string') {
        const s = value.trim().toLowerCase();
        if (s === 'true' || s === '1') return true;
        if (s === 'false' || s === '0') return false;
      }
      return undefined;
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      return undefined;
    case 'integer':
      if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
      if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return parseInt(value, 10);
      return undefined;
    case 'float':
      if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
      if (typeof value === 'string' && value.trim() !== '') {
        const num = Number(value);
        return Number.isFinite(num) ? num : undefined;
      }
      return undefined;
  }
}

function decodeField(fieldSchema: z.ZodTypeAny, raw: unknown, current: unknown, path: string): unknown {
  const base = unwrapSchema(fieldSchema);

  if (base instanceof z.ZodObject) {
    if (raw === null && fieldSchema.isNullable()) return null;
    if (!isPlainRecord(raw)) {
      throw decodeError(path, `expected a map, got ${Array.isArray(raw) ? 'a list' : typeof raw}`);
    }
    const nested: BindableRecord = isPlainRecord(current) ? current : {};
    decodeMap(raw, base, nested, path);
    return nested;
  }

  const kind = fieldKindOf(base);
  let value: unknown = raw;
  if (kind) {
    if (raw === null && fieldSchema.isNullable()) return null;
    value = coerceValue(kind, raw);
    if (value === undefined) {
      throw decodeError(path, `expected ${kind}, got ${JSON.stringify(raw)}`);
    }
  }

  const parsed = fieldSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw decodeError(path, issue ? issue.message : 'invalid value', parsed.error);
  }
  return parsed.data;
}

function decodeMap(map: Record<string, unknown>, schema: RecordSchema, target: BindableRecord, base: string): void {
  for (const [field, fieldSchema] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const key = findKey(map, field);
    if (key === undefined) continue;
    const raw = map[key];
    if (raw === undefined) continue;
    target[field] = decodeField(fieldSchema, raw, target[field], joinPath(base, field));
  }
}

/**
 * Decode `map` onto `target` in place.
 * Fields absent from the map keep their current values.
 *
 * @param path - Store key the map came from, used in error messages
 */
export function decodeOnto(
  map: Record<string, unknown>,
  schema: RecordSchema,
  target: BindableRecord,
  path = '',
): BindableRecord {
  decodeMap(map, schema, target, path);
  return target;
}

/**
 * Decode `map` onto a fresh record and validate it against the schema,
 * which also fills in schema defaults.
 */
export function decodeRecord(map: Record<string, unknown>, schema: RecordSchema, path = ''): BindableRecord {
  const decoded = decodeOnto(map, schema, {}, path);
  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? joinPath(path, issue.path.join('.')) : path;
    throw decodeError(where, issue ? issue.message : 'invalid record', parsed.error);
  }
  const data: unknown = parsed.data;
  if (!isPlainRecord(data)) {
    throw decodeError(path, 'schema did not produce a record');
  }
  return data;
}
