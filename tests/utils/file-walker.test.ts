import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { expandGlob, isGlobPattern } from '../../src/utils/file-walker.js';
import { createProjectDir, removeDir } from '../test-helpers.js';

describe('file walker', () => {
  let root: string;

  before(async () => {
    root = await createProjectDir({
      'src/b.c': '',
      'src/a.c': '',
      'src/sub/c.c': '',
      'src/notes.txt': '',
      'src/.DS_Store': '',
      'build/gen.c': ''
    });
  });

  after(async () => {
    await removeDir(root);
  });

  it('should expand globs in sorted order', async () => {
    assert.deepStrictEqual(await expandGlob(root, 'src/*.c'), ['src/a.c', 'src/b.c']);
  });

  it('should descend with globstar', async () => {
    assert.deepStrictEqual(await expandGlob(root, 'src/**/*.c'), ['src/a.c', 'src/b.c', 'src/sub/c.c']);
  });

  it('should skip junk files', async () => {
    assert.deepStrictEqual(await expandGlob(root, 'src/*'), ['src/a.c', 'src/b.c', 'src/notes.txt']);
  });

  it('should prune excluded directories', async () => {
    assert.deepStrictEqual(await expandGlob(root, '**/*.c', ['build', 'build/**']), ['src/a.c', 'src/b.c', 'src/sub/c.c']);
  });

  it('should recognise glob patterns', () => {
    assert.strictEqual(isGlobPattern('src/*.c'), true);
    assert.strictEqual(isGlobPattern('src/{a,b}.c'), true);
    assert.strictEqual(isGlobPattern('src/a.c'), false);
  });
});
