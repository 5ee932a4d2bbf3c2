/**
 * flagstack error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for binding and resolution failures.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class FlagstackError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'FlagstackError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Binding was called with a target or schema that is not a record. */
export function invalidTargetKind(message: string, fix?: string): FlagstackError {
  return new FlagstackError(ExitCode.INVALID_TARGET_KIND, message, { fix });
}

/** A config-sourced value could not be coerced onto the target's field kinds. */
export function decodeError(path: string, message: string, cause?: unknown): FlagstackError {
  const where = path === '' ? '<root>' : path;
  return new FlagstackError(ExitCode.DECODE_ERROR, `Cannot decode '${where}': ${message}`, { cause });
}

/** Check for a specific exit code without caring about the error class. */
export function hasExitCode(err: unknown, code: ExitCode): boolean {
  return err instanceof FlagstackError && err.code === code;
}
