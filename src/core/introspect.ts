/**
 * Field introspection for bindable records.
 *
 * A record's shape comes from its zod object schema. The flaggable fields of
 * each schema are worked out once and cached by schema identity, so repeated
 * bindings of the same record type walk a plain descriptor table.
 */

import { z } from 'zod';
import type {
  BindableRecord,
  FieldDescriptor,
  FieldKind,
  FieldSpec,
  FieldValue,
  RecordSchema,
} from '../types/binding.js';
import { invalidTargetKind } from './errors.js';
import { toFlagName } from './naming.js';

const specCache = new WeakMap<RecordSchema, readonly FieldSpec[]>();

/**
 * Strip optional, nullable and default wrappers down to the value schema.
 */
export function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else {
      return current;
    }
  }
}

/**
 * Map a field schema to its flag kind, or undefined for kinds flags cannot carry.
 */
export function fieldKindOf(schema: z.ZodTypeAny): FieldKind | undefined {
  const base = unwrapSchema(schema);
  if (base instanceof z.ZodBoolean) return 'boolean';
  if (base instanceof z.ZodString || base instanceof z.ZodEnum) return 'string';
  if (base instanceof z.ZodNumber) return base.isInt ? 'integer' : 'float';
  return undefined;
}

/** True for a non-null, non-array object. */
export function isPlainRecord(value: unknown): value is BindableRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Flaggable fields of a record schema, in declaration order.
 * Nested objects and unsupported kinds are left out.
 */
export function describeFields(schema: RecordSchema): readonly FieldSpec[] {
  const cached = specCache.get(schema);
  if (cached) return cached;

  const specs: FieldSpec[] = [];
  const owners = new Map<string, string>();

  for (const [field, fieldSchema] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const kind = fieldKindOf(fieldSchema);
    if (!kind) continue;

    const flagName = toFlagName(field);
    const owner = owners.get(flagName);
    if (owner !== undefined) {
      throw invalidTargetKind(
        `Fields '${owner}' and '${field}' both map to flag --${flagName}`,
        'Rename one of the fields',
      );
    }
    owners.set(flagName, field);
    specs.push({ field, flagName, kind, usage: fieldSchema.description ?? '' });
  }

  specCache.set(schema, specs);
  return specs;
}

function currentValue(target: BindableRecord, field: string): FieldValue | undefined {
  const value = target[field];
  if (typeof value === 'boolean' || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  return undefined;
}

/**
 * Describe a record binding target.
 *
 * The target must be a plain object with a `z.object` schema, or an array
 * with a `z.array(z.object(...))` schema (element fields are described).
 * Anything else is a programmer error and fails with INVALID_TARGET_KIND.
 */
export function describe(schema: z.ZodTypeAny, target: unknown): FieldDescriptor[] {
  if (Array.isArray(target)) {
    if (!(schema instanceof z.ZodArray) || !(schema.element instanceof z.ZodObject)) {
      throw invalidTargetKind('A list target needs a z.array(z.object(...)) schema');
    }
    return describeFields(schema.element).map((spec) => ({ ...spec, defaultValue: undefined }));
  }

  if (!isPlainRecord(target)) {
    throw invalidTargetKind(
      `Binding target must be an object, got ${target === null ? 'null' : typeof target}`,
      'Pass the record object itself, not one of its values',
    );
  }
  if (!(schema instanceof z.ZodObject)) {
    throw invalidTargetKind('A record target needs a z.object(...) schema');
  }

  return describeFields(schema).map((spec) => ({
    ...spec,
    defaultValue: currentValue(target, spec.field),
  }));
}
