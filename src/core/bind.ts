/**
 * Binding records to commands.
 *
 * A binding registers flags for a record on a command and attaches a resolve
 * operation to the hook chain. When the command (or a descendant) runs, the
 * operation loads the config once, merges store values under the flag values,
 * publishes the result back to the store for bindings further down the tree,
 * and refreshes the flag defaults shown in help.
 */

import { Command } from 'commander';
import type {
  BindableRecord,
  CollectionSelection,
  PrecedencePolicy,
  RecordListSchema,
  RecordSchema,
} from '../types/binding.js';
import { ConfigStore } from '../store/config-store.js';
import { getHookChain, getLoader, getStore, loaderFor } from './config.js';
import { decodeRecord } from './decode.js';
import { decodeError } from './errors.js';
import { registerFlags, type FlagBinding } from './flags.js';
import { HookChain } from './hook-chain.js';
import { describe, isPlainRecord } from './introspect.js';
import { ConfigLoader } from './loader.js';
import { getLogger } from './logger.js';
import { mergePrecedence } from './merge.js';
import { selectAndBind } from './select.js';

export interface BindOptions {
  /** Store to resolve from. Default: the process-wide store (or the loader's). */
  store?: ConfigStore;
  /** Loader run before resolving. Default: the store's loader. */
  loader?: ConfigLoader;
  /** Hook chain to attach to. Default: the process-wide chain. */
  chain?: HookChain;
  /** Default: `explicit`. */
  policy?: PrecedencePolicy;
  /**
   * Write resolved values back to the store (explicit flags as overrides,
   * everything else as defaults) so later bindings and selectors see them.
   * Default: true.
   */
  publish?: boolean;
}

interface BindContext {
  store: ConfigStore;
  loader: ConfigLoader;
  chain: HookChain;
  policy: PrecedencePolicy;
  publish: boolean;
}

function resolveContext(options: BindOptions = {}): BindContext {
  let store: ConfigStore;
  let loader: ConfigLoader;
  if (options.loader) {
    loader = options.loader;
    store = options.store ?? loader.getStore();
  } else if (options.store) {
    store = options.store;
    loader = loaderFor(store);
  } else {
    store = getStore();
    loader = getLoader();
  }
  return {
    store,
    loader,
    chain: options.chain ?? getHookChain(),
    policy: options.policy ?? 'explicit',
    publish: options.publish ?? true,
  };
}

function joinKey(base: string, field: string): string {
  return base === '' ? field : `${base}.${field}`;
}

function publishValues(store: ConfigStore, key: string, binding: FlagBinding, target: BindableRecord): void {
  for (const { field } of binding.descriptors) {
    const value = target[field];
    if (value === undefined) continue;
    if (binding.explicit.has(field)) {
      store.set(joinKey(key, field), value);
    } else {
      store.setDefault(joinKey(key, field), value);
    }
  }
}

/**
 * Bind a record to the whole config store.
 *
 * @throws FlagstackError INVALID_TARGET_KIND when target or schema is not a record
 */
export function bindFlags(
  command: Command,
  schema: RecordSchema,
  target: BindableRecord,
  options?: BindOptions,
): FlagBinding {
  return bindFlagsKey('', command, schema, target, options);
}

/**
 * Bind a record to the store sub-tree at `key`.
 *
 * @throws FlagstackError INVALID_TARGET_KIND when target or schema is not a record
 */
export function bindFlagsKey(
  key: string,
  command: Command,
  schema: RecordSchema,
  target: BindableRecord,
  options?: BindOptions,
): FlagBinding {
  const ctx = resolveContext(options);
  const binding = registerFlags(command, schema, target);

  ctx.chain.bind(command, () => {
    ctx.loader.ensureLoaded();
    mergePrecedence(target, (record) => ctx.store.unmarshalKey(key, schema, record), {
      policy: ctx.policy,
      explicit: binding.explicit,
    });
    if (ctx.publish) {
      publishValues(ctx.store, key, binding, target);
    }
    binding.refreshDefaults();
    getLogger('bind').debug({ command: command.name(), key }, 'Resolved record');
  });

  return binding;
}

/**
 * Bind a record to the element of a stored collection named by a selector.
 * The selector is read from the store after ancestor bindings have published
 * their values, so it can come from a flag on a parent command.
 *
 * @throws FlagstackError INVALID_TARGET_KIND when target or schema is not a record
 */
export function bindFlagsSelection(
  selection: CollectionSelection,
  command: Command,
  schema: RecordSchema,
  target: BindableRecord,
  options?: BindOptions,
): FlagBinding {
  const ctx = resolveContext(options);
  const binding = registerFlags(command, schema, target);

  ctx.chain.bind(command, () => {
    ctx.loader.ensureLoaded();
    const result = selectAndBind(ctx.store, selection, schema, target, {
      policy: ctx.policy,
      explicit: binding.explicit,
    });
    binding.refreshDefaults();
    getLogger('bind').debug({ command: command.name(), ...result }, 'Resolved selection');
  });

  return binding;
}

/**
 * Bind a list of records to the collection at `key`. Each resolve replaces the
 * list's contents with the decoded elements; no flags are registered.
 *
 * @throws FlagstackError INVALID_TARGET_KIND when target is not an array or schema not a list of records
 */
export function bindList(
  key: string,
  command: Command,
  schema: RecordListSchema,
  target: BindableRecord[],
  options?: BindOptions,
): void {
  describe(schema, target);
  const ctx = resolveContext(options);

  ctx.chain.bind(command, () => {
    ctx.loader.ensureLoaded();
    const raw = ctx.store.getList(key);
    if (raw === undefined) return;
    const decoded = raw.map((element, index) => {
      const path = `${key}[${index}]`;
      if (!isPlainRecord(element)) {
        throw decodeError(path, `expected a map, got ${typeof element}`);
      }
      return decodeRecord(element, schema.element, path);
    });
    target.splice(0, target.length, ...decoded);
  });
}
