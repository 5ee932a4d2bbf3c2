/**
 * Search-root discovery for the config loader.
 */

import { homedir } from 'node:os';
import { basename, extname } from 'node:path';
import { FlagstackError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

function unresolvable(what: string, cause?: unknown): FlagstackError {
  return new FlagstackError(ExitCode.PATH_UNRESOLVABLE, `Cannot determine ${what}`, { cause });
}

/**
 * Get the user's home directory.
 *
 * @throws FlagstackError PATH_UNRESOLVABLE
 */
export function getHomeDir(): string {
  let home: string;
  try {
    home = homedir();
  } catch (err) {
    throw unresolvable('the home directory', err);
  }
  if (!home) {
    throw unresolvable('the home directory');
  }
  return home;
}

/**
 * Name of the running executable: the entry script without directory or extension.
 *
 * @param argv - Process arguments. Default: process.argv
 * @throws FlagstackError PATH_UNRESOLVABLE
 */
export function getExecutableName(argv: readonly string[] = process.argv): string {
  const entry = argv[1] ?? argv[0];
  if (!entry) {
    throw unresolvable('the executable path');
  }
  const name = basename(entry, extname(entry));
  if (!name) {
    throw unresolvable(`the executable name from '${entry}'`);
  }
  return name;
}

/** Config file base name for an executable, e.g. `.mytool`. */
export function getConfigName(executable: string): string {
  return `.${executable}`;
}
