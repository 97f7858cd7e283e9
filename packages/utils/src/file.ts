/**
 * File Operations
 * 
 * File operations for workspace directories and cleanup.
 */

import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Whether a filesystem error means the path does not exist
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Check whether a path exists without throwing
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export type TempDirRunner = <T>(prefix: string, fn: (dir: string) => Promise<T>) => Promise<T>;

/**
 * Run `fn` inside a fresh, uniquely named directory under the OS temp dir.
 * The directory is removed recursively afterwards, whatever `fn` does.
 */
export const withTempDir: TempDirRunner = async (prefix, fn) => {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};
