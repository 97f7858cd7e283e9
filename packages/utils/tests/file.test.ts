import { describe, it, expect } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { pathExists, withTempDir } from '../src/file.js';

describe('withTempDir', () => {
  it('creates a prefixed directory and removes it afterwards', async () => {
    let seen = '';
    const result = await withTempDir('v2a-', async (dir) => {
      seen = dir;
      await writeFile(join(dir, 'out.mp3'), 'data');
      expect(await pathExists(join(dir, 'out.mp3'))).toBe(true);
      return 42;
    });

    expect(result).toBe(42);
    expect(basename(seen).startsWith('v2a-')).toBe(true);
    expect(await pathExists(seen)).toBe(false);
  });

  it('removes the directory when the callback throws', async () => {
    let seen = '';
    await expect(withTempDir('v2a-', async (dir) => {
      seen = dir;
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await pathExists(seen)).toBe(false);
  });
});

describe('pathExists', () => {
  it('reports a missing file as absent', async () => {
    await withTempDir('v2a-', async (dir) => {
      expect(await pathExists(join(dir, 'missing'))).toBe(false);
    });
  });
});
