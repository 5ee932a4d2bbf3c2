/**
 * Binding type definitions for flagstack.
 * Covers field descriptors, record shapes, and precedence policy.
 */

import type { z } from 'zod';

/** Primitive field kinds that can be exposed as flags. */
export type FieldKind = 'boolean' | 'string' | 'integer' | 'float';

/** A value one flag can carry. */
export type FieldValue = boolean | string | number;

/** A caller-owned record; mutated in place by flag parsing and resolution. */
export type BindableRecord = Record<string, unknown>;

/** Zod schema describing the shape of a bindable record. */
export type RecordSchema = z.AnyZodObject;

/** Zod schema describing a sequence of bindable records. */
export type RecordListSchema = z.ZodArray<z.AnyZodObject>;

/** Cached, per-schema view of one flaggable field. */
export interface FieldSpec {
  /** Property name on the record. */
  readonly field: string;
  /** Canonical external name, e.g. `first-param`. */
  readonly flagName: string;
  readonly kind: FieldKind;
  /** Usage hint from the schema's description. */
  readonly usage: string;
}

/** A FieldSpec paired with the record's value at describe time. */
export interface FieldDescriptor extends FieldSpec {
  readonly defaultValue: FieldValue | undefined;
}

/**
 * How flag values are reconciled with store values.
 *
 * - `explicit`: a field keeps its flag value only when the flag was given on
 *   the command line (commander value source `cli`).
 * - `non-zero`: a field keeps its pre-decode value whenever that value is not
 *   zero (`false`, `''`, `0`). A flag can then never set a field back to zero
 *   over a non-zero config value.
 */
export type PrecedencePolicy = 'explicit' | 'non-zero';

/** Selects one element of a stored collection for binding. */
export interface CollectionSelection {
  /** Store key holding the ordered list of elements. */
  collectionKey: string;
  /** Store key whose resolved value names the element to pick. */
  selectorKey: string;
  /** Element field compared against the selector. Default: `name`. */
  identifyingKey?: string;
  /** In-memory collection used instead of the store's. */
  collection?: readonly unknown[];
}
