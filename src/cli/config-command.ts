/**
 * CLI config command - inspect and edit the layered config from a host CLI.
 *
 * flagstack mounts no commands of its own; a host CLI opts in by calling
 * registerConfigCommand(). Each CLI invocation is a separate process, so
 * `config set` saves immediately. Library callers keep the store API split:
 * ConfigStore.set() changes memory only and writeConfig() persists.
 */

import { Command } from 'commander';
import { ConfigStore } from '../store/config-store.js';
import { getLoader, getStore, loaderFor } from '../core/config.js';
import { ConfigLoader } from '../core/loader.js';

export interface ConfigCommandOptions {
  store?: ConfigStore;
  loader?: ConfigLoader;
  /** Output sink. Default: stdout. */
  write?: (text: string) => void;
}

/**
 * Parse a string value to its appropriate type.
 * Handles booleans, null, integers, floats, and JSON.
 */
export function parseValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Mount `config get|set|list|write` under `program`.
 *
 * @returns The `config` command
 */
export function registerConfigCommand(program: Command, options: ConfigCommandOptions = {}): Command {
  const loader = options.loader ?? (options.store ? loaderFor(options.store) : getLoader());
  const store = options.store ?? (options.loader ? options.loader.getStore() : getStore());
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  const output = (data: Record<string, unknown>): void => {
    write(JSON.stringify(data) + '\n');
  };

  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string) => {
      loader.ensureLoaded();
      output({ key, value: store.get(key) ?? null, env: store.envVarName(key) });
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value and save it to the config file')
    .option('--file <path>', 'Write to this file instead of the one in use')
    .action(async (key: string, value: string, opts: { file?: string }) => {
      loader.ensureLoaded();
      const parsedValue = parseValue(value);
      store.set(key, parsedValue);
      const written = opts.file ? await store.writeConfigAs(opts.file) : await store.writeConfig();
      output({ key, value: parsedValue, written });
    });

  config
    .command('list')
    .description('Show all resolved configuration')
    .action(() => {
      loader.ensureLoaded();
      output({ file: store.configFileUsed(), config: store.settings() });
    });

  config
    .command('write [file]')
    .description('Write the configuration back to its file, or to [file]')
    .action(async (file: string | undefined) => {
      loader.ensureLoaded();
      const written = file ? await store.writeConfigAs(file) : await store.writeConfig();
      output({ written });
    });

  return config;
}
