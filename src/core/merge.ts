/**
 * Precedence merging of flag-set values with store-sourced values.
 *
 * Resolution priority: explicit flags > environment > config file > published defaults > record defaults
 */

import type { BindableRecord, PrecedencePolicy } from '../types/binding.js';
import { isPlainRecord } from './introspect.js';

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged). Returns a new object.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainRecord(sourceVal) && isPlainRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/** Zero values: `false`, `''`, `0`, `null`, `undefined`, and empty lists. */
export function isZeroValue(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === '' || value === 0) return true;
  return Array.isArray(value) && value.length === 0;
}

/**
 * Merge `src` into `dst` in place: every non-zero value of `src` overwrites
 * `dst`, recursing into nested records. Zero values in `src` never overwrite.
 */
export function mergeNonZero(dst: BindableRecord, src: BindableRecord): BindableRecord {
  for (const key of Object.keys(src)) {
    const srcVal = src[key];
    const dstVal = dst[key];
    if (isPlainRecord(srcVal) && isPlainRecord(dstVal)) {
      mergeNonZero(dstVal, srcVal);
    } else if (!isZeroValue(srcVal)) {
      dst[key] = srcVal;
    }
  }
  return dst;
}

export interface PrecedenceOptions {
  policy: PrecedencePolicy;
  /** Fields given on the command line; used by the `explicit` policy. */
  explicit?: ReadonlySet<string>;
}

/**
 * Apply a store decode to a flag-mutated record without letting the store
 * overwrite values the flags own.
 *
 * The record is snapshotted, `decode` overwrites it from the store, then the
 * flag values are put back according to the policy.
 */
export function mergePrecedence(
  target: BindableRecord,
  decode: (target: BindableRecord) => void,
  options: PrecedenceOptions,
): BindableRecord {
  const snapshot = structuredClone(target);
  decode(target);

  if (options.policy === 'non-zero') {
    return mergeNonZero(target, snapshot);
  }
  for (const field of options.explicit ?? []) {
    if (Object.prototype.hasOwnProperty.call(snapshot, field)) {
      target[field] = snapshot[field];
    }
  }
  return target;
}
