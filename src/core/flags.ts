/**
 * Flag registration: one commander option per flaggable record field.
 *
 * Parsing writes straight into the record: each option's parse event assigns
 * the parsed value to the field and marks the field as explicitly set.
 * Flag arguments are checked against the field schema first, so a flag can
 * only set values a config source could also set.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import type { BindableRecord, FieldDescriptor, FieldKind, RecordSchema } from '../types/binding.js';
import { describe, unwrapSchema } from './introspect.js';

/** Flags registered for one record on one command. */
export interface FlagBinding {
  readonly command: Command;
  readonly descriptors: readonly FieldDescriptor[];
  /** Fields whose flag was given on the command line. */
  readonly explicit: ReadonlySet<string>;
  /**
   * Copy resolved record values into option defaults (what help shows) and
   * into the command's option values, except for explicitly set fields.
   */
  refreshDefaults(): void;
}

interface RegisteredFlag {
  readonly descriptor: FieldDescriptor;
  readonly option: Option;
}

function parseInteger(value: string): number {
  if (!/^\s*-?\d+\s*$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

function parseFloatValue(value: string): number {
  const num = Number(value);
  if (value.trim() === '' || !Number.isFinite(num)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return num;
}

function parseKind(kind: FieldKind, value: string): string | number {
  if (kind === 'integer') return parseInteger(value);
  if (kind === 'float') return parseFloatValue(value);
  return value;
}

/** Parse a flag argument to the field's kind, then check it against the field schema. */
function schemaParser(kind: FieldKind, fieldSchema: z.ZodTypeAny): (value: string) => unknown {
  return (value) => {
    const parsed = fieldSchema.safeParse(parseKind(kind, value));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidArgumentError(issue ? `${issue.message}.` : 'Invalid value.');
    }
    return parsed.data;
  };
}

function createOption(descriptor: FieldDescriptor, fieldSchema: z.ZodTypeAny | undefined): Option {
  const { flagName, kind, usage, defaultValue } = descriptor;
  const option =
    kind === 'boolean'
      ? new Option(`--${flagName}`, usage)
      : new Option(`--${flagName} <value>`, usage);

  const base = fieldSchema ? unwrapSchema(fieldSchema) : undefined;
  if (base instanceof z.ZodEnum) {
    option.choices(base.options);
  } else if (kind !== 'boolean' && fieldSchema) {
    option.argParser(schemaParser(kind, fieldSchema));
  } else if (kind === 'integer') {
    option.argParser(parseInteger);
  } else if (kind === 'float') {
    option.argParser(parseFloatValue);
  }
  if (defaultValue !== undefined) option.default(defaultValue);
  return option;
}

/**
 * Register a flag for every flaggable field of `target` on `command`.
 * The field's current value becomes the flag default. Boolean fields also
 * get a `--no-<name>` negation so they can be switched off explicitly.
 *
 * @throws FlagstackError INVALID_TARGET_KIND when target or schema is not a record
 */
export function registerFlags(command: Command, schema: RecordSchema, target: BindableRecord): FlagBinding {
  const descriptors = describe(schema, target);
  const explicit = new Set<string>();
  const registered: RegisteredFlag[] = [];

  const markParsed = (option: Option, field: string) => () => {
    target[field] = command.getOptionValue(option.attributeName());
    explicit.add(field);
  };

  for (const descriptor of descriptors) {
    const fieldSchema: z.ZodTypeAny | undefined = schema.shape[descriptor.field];
    const option = createOption(descriptor, fieldSchema);
    command.addOption(option);
    command.on(`option:${option.name()}`, markParsed(option, descriptor.field));

    if (descriptor.kind === 'boolean') {
      const negation = new Option(`--no-${descriptor.flagName}`, `Disable --${descriptor.flagName}`);
      command.addOption(negation);
      command.on(`option:${negation.name()}`, markParsed(negation, descriptor.field));
    }

    registered.push({ descriptor, option });
  }

  return {
    command,
    descriptors,
    explicit,
    refreshDefaults(): void {
      for (const { descriptor, option } of registered) {
        const value = target[descriptor.field];
        if (typeof value !== 'boolean' && typeof value !== 'string' && typeof value !== 'number') continue;
        option.default(value);
        if (!explicit.has(descriptor.field)) {
          command.setOptionValueWithSource(option.attributeName(), value, 'config');
        }
      }
    },
  };
}
