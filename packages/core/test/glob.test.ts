import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { expandFiles, hasGlobMagic, segmentToRegExp } from '../src/util/glob.js';

async function writeTree(root: string, files: string[]): Promise<void> {
  for (const file of files) {
    const target = path.join(root, file);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, '', 'utf8');
  }
}

describe('glob expansion', () => {
  it('compiles single segments', () => {
    expect(segmentToRegExp('*.scd').test('kick.scd')).toBe(true);
    expect(segmentToRegExp('*.scd').test('kick.sc')).toBe(false);
    expect(segmentToRegExp('v?.txt').test('v1.txt')).toBe(true);
    expect(segmentToRegExp('[ab].js').test('b.js')).toBe(true);
    expect(segmentToRegExp('[!ab].js').test('b.js')).toBe(false);
    expect(hasGlobMagic('src/*.ts')).toBe(true);
    expect(hasGlobMagic('src/a.ts')).toBe(false);
  });

  it('expands recursive patterns into sorted absolute paths', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-glob-'));
    try {
      await writeTree(root, ['src/a.ts', 'src/sub/b.ts', 'src/sub/c.js', 'src/.hidden/d.ts']);

      const files = await expandFiles('src/**/*.ts', root);
      expect(files).toEqual([path.join(root, 'src', 'a.ts'), path.join(root, 'src', 'sub', 'b.ts')]);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it('interpolates variables, follows .. segments and de-duplicates', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-glob-'));
    try {
      await writeTree(root, ['lib/kick.scd', 'lib/snare.scd', 'contracts/x.yaml']);
      const contractsDir = path.join(root, 'contracts');

      const files = await expandFiles(['../lib/{name}.scd', '../lib/*.scd'], contractsDir, { name: 'kick' });
      expect(files).toEqual([path.join(root, 'lib', 'kick.scd'), path.join(root, 'lib', 'snare.scd')]);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it('matches hidden entries only through a dot-leading segment', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-glob-'));
    try {
      await writeTree(root, ['.env', 'visible.txt']);
      expect(await expandFiles('*', root)).toEqual([path.join(root, 'visible.txt')]);
      expect(await expandFiles('.*', root)).toEqual([path.join(root, '.env')]);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it('returns nothing for patterns without matches', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'cdd-glob-'));
    try {
      expect(await expandFiles('missing/**/*.ts', root)).toEqual([]);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
