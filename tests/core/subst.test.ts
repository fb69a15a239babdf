import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  EMPTY_NAMESPACE,
  expand,
  expandToSequence,
  LayeredNamespace,
  namespaceFrom,
  PathToken,
  quoteForShell,
  toShellCommand
} from '../../src/core/subst.js';
import { CircularReferenceError, MissingVariableError, SubstitutionError } from '../../src/utils/errors.js';

describe('substitution', () => {
  const ns = namespaceFrom({
    opt: '-O2',
    dirs: ['a', 'b'],
    frameworks: ['Cocoa', 'Metal'],
    cc: { cmd: 'gcc', flags: ['-O2', '-Wall'], objcmd: '$cc.cmd $cc.flags -c' },
    cxx: { flags: ['-std=c++17'] }
  });

  describe('expand', () => {
    it('should return a template without references unchanged', () => {
      assert.strictEqual(expand('gcc -c main.c', EMPTY_NAMESPACE), 'gcc -c main.c');
    });

    it('should resolve namespaced references within their tool', () => {
      const single = namespaceFrom({ cc: { flags: ['-O2'] } });
      assert.strictEqual(expand('$cc.flags -c', single), '-O2 -c');
      assert.strictEqual(expand('${cxx.flags}', ns), '-std=c++17');
    });

    it('should join lists with one space in scalar context', () => {
      assert.strictEqual(expand('[$dirs]', ns), '[a b]');
    });

    it('should expand recursively', () => {
      assert.strictEqual(expand('$cc.objcmd', ns), 'gcc -O2 -Wall -c');
    });

    it('should turn $$ into a literal dollar that is never expanded', () => {
      assert.strictEqual(expand('echo $$opt $opt', ns), 'echo $opt -O2');
    });

    it('should name the missing variable', () => {
      assert.throws(
        () => expand('$missing.var', ns),
        (error: unknown) => error instanceof MissingVariableError && error.variable === 'missing.var'
      );
    });

    it('should report the chain of a circular reference', () => {
      const cyclic = namespaceFrom({ a: '$b', b: '$a' });
      assert.throws(
        () => expand('$a', cyclic),
        (error: unknown) => error instanceof CircularReferenceError && error.chain.join(' ') === 'a b a'
      );
    });

    it('should let earlier layers win', () => {
      const layered = new LayeredNamespace([namespaceFrom({ opt: '-O0' }), ns]);
      assert.strictEqual(expand('$opt $cc.cmd', layered), '-O0 gcc');
    });
  });

  describe('expandToSequence', () => {
    it('should keep one token per list element', () => {
      assert.deepStrictEqual(expandToSequence('$cc.cmd $cc.flags -c', ns), ['gcc', '-O2', '-Wall', '-c']);
    });

    it('should not split list elements holding spaces', () => {
      const spaced = namespaceFrom({ defs: ['-DNAME=a b', '-DX'] });
      assert.deepStrictEqual(expandToSequence('$defs', spaced), ['-DNAME=a b', '-DX']);
    });

    it('should drop empty lists', () => {
      const empty = namespaceFrom({ flags: [] });
      assert.deepStrictEqual(expandToSequence('gcc $flags -c', empty), ['gcc', '-c']);
    });

    it('should keep path tokens and fold surrounding text into their affixes', () => {
      const paths = namespaceFrom({ inc: [new PathToken('include')] });
      const [token] = expandToSequence('-I$inc', paths);
      assert.ok(token instanceof PathToken);
      assert.strictEqual(token.path, 'include');
      assert.strictEqual(token.prefix, '-I');
      assert.strictEqual(token.suffix, '');
    });

    it('should pass explicit token lists through', () => {
      const tokens = expandToSequence(['$cc.cmd', new PathToken('src/a.c', '-c ')], ns);
      assert.strictEqual(tokens[0], 'gcc');
      assert.ok(tokens[1] instanceof PathToken);
      assert.strictEqual(tokens[1].toString(), '-c src/a.c');
    });
  });

  describe('list functions', () => {
    it('should prefix every element', () => {
      assert.deepStrictEqual(expandToSequence('${prefix(-I, $dirs)}', ns), ['-Ia', '-Ib']);
    });

    it('should suffix and wrap elements', () => {
      assert.deepStrictEqual(expandToSequence('${suffix($dirs, /lib)}', ns), ['a/lib', 'b/lib']);
      assert.deepStrictEqual(expandToSequence('${wrap(<, $dirs, >)}', ns), ['<a>', '<b>']);
    });

    it('should join elements with a quoted separator', () => {
      assert.strictEqual(expand('${join(",", $dirs)}', ns), 'a,b');
    });

    it('should interleave a flag before each element', () => {
      assert.deepStrictEqual(expandToSequence('${pairwise(-framework, $frameworks)}', ns), [
        '-framework',
        'Cocoa',
        '-framework',
        'Metal'
      ]);
    });

    it('should accept bare variable names as arguments', () => {
      assert.deepStrictEqual(expandToSequence('${prefix(-L, dirs)}', ns), ['-La', '-Lb']);
    });

    it('should reject unknown functions', () => {
      assert.throws(
        () => expand('${nope($dirs)}', ns),
        (error: unknown) => error instanceof SubstitutionError && error.message === "unknown function 'nope' in ${nope($dirs)}"
      );
    });

    it('should reject calls with the wrong number of arguments', () => {
      assert.throws(
        () => expand('${prefix(-I)}', ns),
        (error: unknown) => error instanceof SubstitutionError && error.message === 'prefix() takes 2 arguments, got 1'
      );
    });
  });

  describe('shell quoting', () => {
    it('should leave safe tokens alone', () => {
      assert.strictEqual(quoteForShell('-DVERSION=1.2'), '-DVERSION=1.2');
    });

    it('should single-quote tokens for posix shells', () => {
      assert.strictEqual(quoteForShell('a b'), "'a b'");
      assert.strictEqual(quoteForShell("it's"), "'it'\\''s'");
      assert.strictEqual(quoteForShell(''), "''");
    });

    it('should double-quote tokens for cmd', () => {
      assert.strictEqual(quoteForShell('a b', 'cmd'), '"a b"');
      assert.strictEqual(quoteForShell('plain', 'cmd'), 'plain');
    });

    it('should quote each token of a command independently', () => {
      assert.strictEqual(toShellCommand(['gcc', '-Imy dir', new PathToken('src/a.c')]), "gcc '-Imy dir' src/a.c");
    });
  });
});
