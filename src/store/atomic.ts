/**
 * File access for config files.
 * Writes are crash-safe through write-file-atomic (temp file -> rename);
 * reads are synchronous because resolution runs inside command hooks.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFileSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FlagstackError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new FlagstackError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}

function isMissingFile(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export function safeReadFileSync(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return null;
    }
    throw new FlagstackError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}
