/**
 * Tests for decoding store maps onto records.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ExitCode } from '../../types/exit-codes.js';
import { coerceValue, decodeOnto, decodeRecord, findKey } from '../decode.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('findKey', () => {
  it('matches case-insensitively', () => {
    expect(findKey({ FIRSTPARAM: 1 }, 'firstParam')).toBe('FIRSTPARAM');
  });

  it('prefers an exact match', () => {
    expect(findKey({ name: 'a', NAME: 'b' }, 'NAME')).toBe('NAME');
  });

  it('returns undefined when nothing matches', () => {
    expect(findKey({ other: 1 }, 'name')).toBeUndefined();
  });
});

describe('coerceValue', () => {
  it('coerces booleans', () => {
    expect(coerceValue('boolean', true)).toBe(true);
    expect(coerceValue('boolean', 'TRUE')).toBe(true);
    expect(coerceValue('boolean', '0')).toBe(false);
    expect(coerceValue('boolean', 1)).toBe(true);
    expect(coerceValue('boolean', 'yes')).toBeUndefined();
  });

  it('coerces strings', () => {
    expect(coerceValue('string', 'x')).toBe('x');
    expect(coerceValue('string', 42)).toBe('42');
    expect(coerceValue('string', false)).toBe('false');
    expect(coerceValue('string', { a: 1 })).toBeUndefined();
  });

  it('coerces integers', () => {
    expect(coerceValue('integer', 7)).toBe(7);
    expect(coerceValue('integer', ' -12 ')).toBe(-12);
    expect(coerceValue('integer', 1.5)).toBeUndefined();
    expect(coerceValue('integer', '1.5')).toBeUndefined();
  });

  it('coerces floats', () => {
    expect(coerceValue('float', 1.5)).toBe(1.5);
    expect(coerceValue('float', '2.25')).toBe(2.25);
    expect(coerceValue('float', '')).toBeUndefined();
    expect(coerceValue('float', 'abc')).toBeUndefined();
  });
});

describe('decodeOnto', () => {
  const schema = z.object({
    name: z.string(),
    port: z.number().int(),
    server: z.object({ host: z.string(), tls: z.boolean() }),
    mode: z.enum(['fast', 'safe']).optional(),
  });

  it('decodes matching keys and leaves other fields alone', () => {
    const target: Record<string, unknown> = { name: 'kept', port: 1 };
    decodeOnto({ PORT: '8080', Server: { HOST: 'example.test', tls: 'true' } }, schema, target);
    expect(target).toEqual({ name: 'kept', port: 8080, server: { host: 'example.test', tls: true } });
  });

  it('merges into an existing nested record', () => {
    const target: Record<string, unknown> = { server: { host: 'old', tls: false } };
    decodeOnto({ server: { tls: true } }, schema, target);
    expect(target).toEqual({ server: { host: 'old', tls: true } });
  });

  it('reports the dotted path of a bad value', () => {
    expect(thrownBy(() => decodeOnto({ server: { tls: 'maybe' } }, schema, {}, 'app'))).toMatchObject({
      code: ExitCode.DECODE_ERROR,
      message: `Cannot decode 'app.server.tls': expected boolean, got "maybe"`,
    });
  });

  it('rejects a scalar where a nested record is expected', () => {
    expect(thrownBy(() => decodeOnto({ server: 'x' }, schema, {}))).toMatchObject({
      code: ExitCode.DECODE_ERROR,
      message: `Cannot decode 'server': expected a map, got string`,
    });
  });

  it('validates values against the field schema', () => {
    const err = thrownBy(() => decodeOnto({ mode: 'slow' }, schema, {}));
    expect(err).toMatchObject({ code: ExitCode.DECODE_ERROR });
    expect(err instanceof Error ? err.message : '').toMatch(/^Cannot decode 'mode': /);
  });
});

describe('decodeRecord', () => {
  const schema = z.object({ host: z.string(), port: z.number().int().default(80) });

  it('fills schema defaults', () => {
    expect(decodeRecord({ host: 'a' }, schema)).toEqual({ host: 'a', port: 80 });
  });

  it('fails when a required field is missing', () => {
    expect(thrownBy(() => decodeRecord({ port: 1 }, schema, 'servers[2]'))).toMatchObject({
      code: ExitCode.DECODE_ERROR,
      message: `Cannot decode 'servers[2].host': Required`,
    });
  });
});
