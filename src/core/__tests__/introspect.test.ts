/**
 * Tests for record field introspection.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ExitCode } from '../../types/exit-codes.js';
import { describe as describeTarget, describeFields, fieldKindOf, isPlainRecord, unwrapSchema } from '../introspect.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('fieldKindOf', () => {
  it('maps primitive schemas to flag kinds', () => {
    expect(fieldKindOf(z.boolean())).toBe('boolean');
    expect(fieldKindOf(z.string())).toBe('string');
    expect(fieldKindOf(z.enum(['json', 'text']))).toBe('string');
    expect(fieldKindOf(z.number().int())).toBe('integer');
    expect(fieldKindOf(z.number())).toBe('float');
  });

  it('looks through optional, nullable and default wrappers', () => {
    expect(fieldKindOf(z.string().optional())).toBe('string');
    expect(fieldKindOf(z.number().int().nullable())).toBe('integer');
    expect(fieldKindOf(z.boolean().default(true))).toBe('boolean');
  });

  it('returns undefined for kinds flags cannot carry', () => {
    expect(fieldKindOf(z.array(z.string()))).toBeUndefined();
    expect(fieldKindOf(z.object({ a: z.string() }))).toBeUndefined();
  });
});

describe('unwrapSchema', () => {
  it('strips nested wrappers', () => {
    const inner = z.string();
    expect(unwrapSchema(inner.optional().default('x'))).toBe(inner);
  });
});

describe('isPlainRecord', () => {
  it('accepts objects only', () => {
    expect(isPlainRecord({})).toBe(true);
    expect(isPlainRecord([])).toBe(false);
    expect(isPlainRecord(null)).toBe(false);
    expect(isPlainRecord('x')).toBe(false);
  });
});

describe('describeFields', () => {
  const schema = z.object({
    firstParam: z.string().describe('the first parameter'),
    count: z.number().int(),
    nested: z.object({ inner: z.string() }),
    tags: z.array(z.string()),
  });

  it('lists flaggable fields in declaration order', () => {
    expect(describeFields(schema)).toEqual([
      { field: 'firstParam', flagName: 'first-param', kind: 'string', usage: 'the first parameter' },
      { field: 'count', flagName: 'count', kind: 'integer', usage: '' },
    ]);
  });

  it('caches by schema identity', () => {
    expect(describeFields(schema)).toBe(describeFields(schema));
  });

  it('rejects two fields mapping to the same flag', () => {
    const clash = z.object({ fooBar: z.string(), foo_bar: z.string() });
    expect(thrownBy(() => describeFields(clash))).toMatchObject({
      code: ExitCode.INVALID_TARGET_KIND,
      message: "Fields 'fooBar' and 'foo_bar' both map to flag --foo-bar",
      fix: 'Rename one of the fields',
    });
  });
});

describe('describe', () => {
  const schema = z.object({ host: z.string(), port: z.number().int(), debug: z.boolean() });

  it('pairs fields with the current record values', () => {
    const descriptors = describeTarget(schema, { host: 'localhost', port: 8080 });
    expect(descriptors.map((d) => [d.field, d.defaultValue])).toEqual([
      ['host', 'localhost'],
      ['port', 8080],
      ['debug', undefined],
    ]);
  });

  it('describes element fields for list targets', () => {
    const descriptors = describeTarget(z.array(schema), []);
    expect(descriptors.map((d) => d.flagName)).toEqual(['host', 'port', 'debug']);
    expect(descriptors.every((d) => d.defaultValue === undefined)).toBe(true);
  });

  it('rejects a non-object target', () => {
    expect(thrownBy(() => describeTarget(schema, null))).toMatchObject({
      code: ExitCode.INVALID_TARGET_KIND,
      message: 'Binding target must be an object, got null',
    });
    expect(thrownBy(() => describeTarget(schema, 42))).toMatchObject({
      message: 'Binding target must be an object, got number',
    });
  });

  it('rejects a schema that does not describe a record', () => {
    expect(thrownBy(() => describeTarget(z.string(), {}))).toMatchObject({
      code: ExitCode.INVALID_TARGET_KIND,
      message: 'A record target needs a z.object(...) schema',
    });
  });

  it('rejects a list target without a list-of-records schema', () => {
    expect(thrownBy(() => describeTarget(schema, []))).toMatchObject({
      code: ExitCode.INVALID_TARGET_KIND,
      message: 'A list target needs a z.array(z.object(...)) schema',
    });
    expect(thrownBy(() => describeTarget(z.array(z.string()), []))).toMatchObject({
      code: ExitCode.INVALID_TARGET_KIND,
    });
  });
});
