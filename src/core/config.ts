/**
 * Process-wide config engine for flagstack.
 *
 * Holds the default store, its loader and the default hook chain, and exposes
 * read helpers that make sure the config has been loaded first.
 */

import type { BindableRecord, RecordSchema } from '../types/binding.js';
import { ConfigStore } from '../store/config-store.js';
import { HookChain } from './hook-chain.js';
import { ConfigLoader, type ConfigLoaderOptions } from './loader.js';

let store = new ConfigStore();
let loader = new ConfigLoader(store);
let hookChain = new HookChain();
let loaders = new WeakMap<ConfigStore, ConfigLoader>([[store, loader]]);

/** The process-wide config store. */
export function getStore(): ConfigStore {
  return store;
}

/** The loader of the process-wide store. */
export function getLoader(): ConfigLoader {
  return loader;
}

/** The process-wide hook chain. */
export function getHookChain(): HookChain {
  return hookChain;
}

/**
 * The loader for a store, created on first request.
 * One loader per store keeps loading once per store.
 */
export function loaderFor(target: ConfigStore, options?: ConfigLoaderOptions): ConfigLoader {
  const existing = loaders.get(target);
  if (existing) return existing;
  const created = new ConfigLoader(target, options);
  loaders.set(target, created);
  return created;
}

/**
 * Replace the process-wide store, loader and hook chain with fresh ones.
 * Commands bound before the reset stay attached to the old chain.
 */
export function resetConfig(options?: ConfigLoaderOptions): void {
  store = new ConfigStore();
  loader = new ConfigLoader(store, options);
  hookChain = new HookChain();
  loaders = new WeakMap([[store, loader]]);
}

/** Load the process-wide config now (no-op after the first load). */
export function readInConfig(): void {
  loader.ensureLoaded();
}

export function unmarshal<T extends BindableRecord>(schema: RecordSchema, target: T): T {
  loader.ensureLoaded();
  store.unmarshal(schema, target);
  return target;
}

export function unmarshalKey<T extends BindableRecord>(key: string, schema: RecordSchema, target: T): T {
  loader.ensureLoaded();
  store.unmarshalKey(key, schema, target);
  return target;
}

export function get(key: string): unknown {
  loader.ensureLoaded();
  return store.get(key);
}

export function getInt(key: string): number {
  loader.ensureLoaded();
  return store.getInt(key);
}

export function getString(key: string): string {
  loader.ensureLoaded();
  return store.getString(key);
}

export function set(key: string, value: unknown): void {
  store.set(key, value);
}

/** Write the process-wide config back to the file it was read from. */
export async function writeConfig(): Promise<string> {
  loader.ensureLoaded();
  return store.writeConfig();
}
