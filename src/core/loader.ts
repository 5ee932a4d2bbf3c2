/**
 * One-shot config loading.
 *
 * The first ensureLoaded() call locates and reads the config file and turns
 * on environment lookups; every later call is a no-op. A missing config file
 * is a normal state. Not knowing where to search is fatal.
 */

import { Command, Option } from 'commander';
import { ConfigStore } from '../store/config-store.js';
import { ExitCode } from '../types/exit-codes.js';
import { hasExitCode } from './errors.js';
import { getLogger } from './logger.js';
import { getConfigName, getExecutableName, getHomeDir } from './paths.js';

/** Populates a store. Replaceable so tests can load from memory. */
export type LoadFunction = (store: ConfigStore) => void;

export interface ConfigLoaderOptions {
  load?: LoadFunction;
  /** Called on fatal load errors. Default: process.exit. */
  exit?: (code: number) => void;
}

/**
 * Default load step: search `~/.<executable>.{yaml,yml,json}` then
 * `./.<executable>.*` (or read the explicit config file), with automatic
 * environment lookups.
 */
export function loadFromEnvironment(store: ConfigStore): void {
  const log = getLogger('loader');

  if (!store.getConfigFile()) {
    store.addConfigPath(getHomeDir());
    store.addConfigPath(process.cwd());
    store.setConfigName(getConfigName(getExecutableName()));
  }
  store.enableAutomaticEnv();

  try {
    if (store.readInConfig()) {
      log.debug({ file: store.configFileUsed() }, 'Using config file');
    } else {
      log.debug({ name: store.getConfigName(), paths: store.getConfigPaths() }, 'No config file found');
    }
  } catch (err) {
    log.warn({ err }, 'Config file could not be read; continuing without it');
  }
}

export class ConfigLoader {
  private loaded = false;
  private load: LoadFunction;
  private readonly exit: (code: number) => void;

  constructor(
    private readonly store: ConfigStore,
    options: ConfigLoaderOptions = {},
  ) {
    this.load = options.load ?? loadFromEnvironment;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  getStore(): ConfigStore {
    return this.store;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  /** Replace the load step. Has no effect once loading has happened. */
  setLoadFunction(load: LoadFunction): void {
    this.load = load;
  }

  /** Reopen the gate so the next ensureLoaded() loads again. */
  reset(): void {
    this.loaded = false;
  }

  /**
   * Load the store on first call; no-op afterwards.
   * The gate closes before loading, so re-entrant calls are no-ops too.
   */
  ensureLoaded(): void {
    if (this.loaded) return;
    this.loaded = true;

    try {
      this.load(this.store);
    } catch (err) {
      if (hasExitCode(err, ExitCode.PATH_UNRESOLVABLE)) {
        getLogger('loader').fatal({ err }, 'Cannot establish config search roots');
        this.exit(ExitCode.PATH_UNRESOLVABLE);
      }
      throw err;
    }
  }
}

/**
 * Register `--config <file>` on a command. Parsing it points the store at
 * that file before any resolve hook runs.
 */
export function configFileOption(command: Command, store: ConfigStore, description = 'config file'): Command {
  const option = new Option('--config <file>', description);
  command.addOption(option);
  command.on(`option:${option.name()}`, () => {
    const value: unknown = command.getOptionValue(option.attributeName());
    if (typeof value === 'string' && value !== '') {
      store.setConfigFile(value);
    }
  });
  return command;
}
