/**
 * flagstack - bind typed config records to commander flags, config files and environment.
 */

// Types
export { ExitCode, getExitCodeName, isErrorCode } from './types/exit-codes.js';
export type {
  BindableRecord,
  CollectionSelection,
  FieldDescriptor,
  FieldKind,
  FieldSpec,
  FieldValue,
  PrecedencePolicy,
  RecordListSchema,
  RecordSchema,
} from './types/binding.js';

// Core
export { FlagstackError, decodeError, invalidTargetKind, hasExitCode } from './core/errors.js';
export { getLogger, initLogger, closeLogger, LOG_LEVEL_ENV } from './core/logger.js';
export type { LoggerConfig } from './core/logger.js';

// Introspection and flags
export { toFlagName } from './core/naming.js';
export { describe, describeFields, fieldKindOf } from './core/introspect.js';
export { registerFlags } from './core/flags.js';
export type { FlagBinding } from './core/flags.js';

// Resolution
export { decodeOnto, decodeRecord, coerceValue } from './core/decode.js';
export { deepMerge, mergeNonZero, mergePrecedence, isZeroValue } from './core/merge.js';
export type { PrecedenceOptions } from './core/merge.js';
export { selectElement, selectAndBind, DEFAULT_IDENTIFYING_KEY } from './core/select.js';
export type { SelectedElement, SelectionResult } from './core/select.js';

// Hooks and binding
export { HookChain } from './core/hook-chain.js';
export type { ResolveOperation } from './core/hook-chain.js';
export { bindFlags, bindFlagsKey, bindFlagsSelection, bindList } from './core/bind.js';
export type { BindOptions } from './core/bind.js';

// Loading
export { ConfigLoader, loadFromEnvironment, configFileOption } from './core/loader.js';
export type { ConfigLoaderOptions, LoadFunction } from './core/loader.js';
export { getHomeDir, getExecutableName, getConfigName } from './core/paths.js';

// Process-wide config
export {
  getStore,
  getLoader,
  getHookChain,
  loaderFor,
  resetConfig,
  readInConfig,
  unmarshal,
  unmarshalKey,
  get,
  getInt,
  getString,
  set,
  writeConfig,
} from './core/config.js';

// Store
export { ConfigStore, CONFIG_EXTENSIONS, formatOf, normalizeKeys } from './store/config-store.js';
export type { ConfigFormat, ConfigStoreOptions } from './store/config-store.js';

// CLI
export { registerConfigCommand, parseValue } from './cli/config-command.js';
export type { ConfigCommandOptions } from './cli/config-command.js';
