import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { canonicalPath, flattenForOutput, relativeTo, replaceSuffix } from '../../src/utils/paths.js';

describe('paths', () => {
  describe('canonicalPath', () => {
    it('should normalize relative paths', () => {
      assert.strictEqual(canonicalPath('./src//a.c', '/proj'), 'src/a.c');
      assert.strictEqual(canonicalPath('src/lib/../a.c', '/proj'), 'src/a.c');
      assert.strictEqual(canonicalPath('include/', '/proj'), 'include');
    });

    it('should make absolute paths inside the root relative', () => {
      assert.strictEqual(canonicalPath('/proj/src/a.c', '/proj'), 'src/a.c');
    });

    it('should keep absolute paths outside the root absolute', () => {
      assert.strictEqual(canonicalPath('/usr/include/stdio.h', '/proj'), '/usr/include/stdio.h');
    });
  });

  describe('relativeTo', () => {
    it('should express canonical paths from the output directory', () => {
      assert.strictEqual(relativeTo('src/a.c', '/proj', '/proj'), 'src/a.c');
      assert.strictEqual(relativeTo('src/a.c', '/proj', '/proj/build'), '../src/a.c');
      assert.strictEqual(relativeTo('build', '/proj', '/proj/build'), '.');
    });
  });

  it('should replace the last suffix only', () => {
    assert.strictEqual(replaceSuffix('src/a.test.c', '.o'), 'src/a.test.o');
    assert.strictEqual(replaceSuffix('src/Makefile', '.o'), 'src/Makefile.o');
  });

  it('should flatten parent references and roots for output paths', () => {
    assert.strictEqual(flattenForOutput('../shared/x.c'), '__/shared/x.c');
    assert.strictEqual(flattenForOutput('/opt/src/y.c'), 'opt/src/y.c');
    assert.strictEqual(flattenForOutput('./a/./b.c'), 'a/b.c');
  });
});
