import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Project } from '../../src/core/project.js';
import { createGccToolchain } from '../../src/toolchains/index.js';
import { ConfigError } from '../../src/utils/errors.js';

function setup() {
  const project = new Project('env-test', { rootDir: '/work/proj' });
  const env = project.environment({ toolchain: createGccToolchain({ platform: 'linux' }) });
  return { project, env };
}

describe('Environment', () => {
  it('should set up every toolchain tool with its defaults', () => {
    const { env } = setup();
    assert.deepStrictEqual(env.toolNames(), ['cc', 'cxx', 'ar', 'link']);
    assert.strictEqual(env.tool('cc').cmd, 'gcc');
    assert.deepStrictEqual(env.tool('ar').flags, ['rcs']);
  });

  it('should only set up enabled tools', () => {
    const project = new Project('env-test', { rootDir: '/work/proj' });
    const env = project.environment({ toolchain: createGccToolchain({ platform: 'linux' }), enableTools: ['cc'] });
    assert.deepStrictEqual(env.toolNames(), ['cc']);
    assert.throws(() => env.tool('link'), ConfigError);
  });

  it('should apply config variables before its own', () => {
    const project = new Project('env-test', { rootDir: '/work/proj', config: { vars: { mode: 'release', arch: 'x64' } } });
    const env = project.environment({ vars: { mode: 'debug' } });
    assert.strictEqual(env.get('mode'), 'debug');
    assert.strictEqual(env.get('arch'), 'x64');
  });

  it('should give environments unique names', () => {
    const { project, env } = setup();
    const second = project.environment();
    assert.strictEqual(env.name, 'default');
    assert.strictEqual(second.name, 'default_2');
    assert.strictEqual(project.getEnvironment('default_2'), second);
  });

  it('should deep-copy tools on clone', () => {
    const { project, env } = setup();
    env.tool('cc').flags = ['-O2'];
    const debug = env.clone('debug');
    debug.tool('cc').append('flags', '-g');

    assert.deepStrictEqual(env.tool('cc').flags, ['-O2']);
    assert.deepStrictEqual(debug.tool('cc').flags, ['-O2', '-g']);
    assert.strictEqual(debug.toolchain, env.toolchain);
    assert.strictEqual(debug.tool('cc').environment, debug);
    assert.deepStrictEqual(
      project.getEnvironments().map(e => e.name),
      ['default', 'debug']
    );
  });

  it('should name unnamed clones after their base', () => {
    const { env } = setup();
    assert.strictEqual(env.clone().name, 'default_clone');
    assert.strictEqual(env.clone().name, 'default_clone_2');
  });

  it('should apply overrides to a clone only', () => {
    const { env } = setup();
    const tuned = env.override({ vars: { opt: '-O3' }, tools: { cc: { flags: ['-march=native'] } } }, 'tuned');
    assert.strictEqual(tuned.subst('$cc.flags $opt'), '-march=native -O3');
    assert.deepStrictEqual(env.tool('cc').flags, []);
    assert.strictEqual(env.has('opt'), false);
  });

  it('should substitute with call-site overrides', () => {
    const { env } = setup();
    assert.strictEqual(env.subst('$cc.cmd $extra', { extra: '-v' }), 'gcc -v');
    assert.deepStrictEqual(env.substToSequence('$cc.cmd $cc.depflags'), ['gcc', '-MMD', '-MF', '$out.d']);
  });

  it('should hand out builders bound to the environment they come from', () => {
    const { env } = setup();
    const clone = env.clone('other');
    assert.strictEqual(env.builder('cc', 'Object').environment, env);
    assert.strictEqual(clone.builder('cc', 'Object').environment, clone);
    const moved = env.builder('cc', 'Object').rebind(clone);
    assert.strictEqual(moved.environment, clone);
  });

  it('should build one object per source under the build directory', () => {
    const { env } = setup();
    const outputs = env.builder('cc', 'Object').build(undefined, ['src/a.c', 'src/b.c']);
    assert.deepStrictEqual(
      outputs.map(node => node.path),
      ['build/env.default/src/a.o', 'build/env.default/src/b.o']
    );
    assert.strictEqual(outputs[0].producer?.commandVar, 'objcmd');
    assert.strictEqual(outputs[0].producer?.environment, env);
  });

  it('should keep default outputs of a clone apart from the original', () => {
    const { env } = setup();
    const clone = env.clone('debug');
    const [original] = env.builder('cc', 'Object').build(undefined, ['src/a.c']);
    const [copy] = clone.builder('cc', 'Object').build(undefined, ['src/a.c']);
    assert.strictEqual(original.path, 'build/env.default/src/a.o');
    assert.strictEqual(copy.path, 'build/env.debug/src/a.o');
  });

  it('should build one archive from all sources', () => {
    const { env } = setup();
    const [archive] = env.builder('ar', 'StaticLibrary').build('build/libutil.a', ['build/a.o', 'build/b.o']);
    assert.strictEqual(archive.path, 'build/libutil.a');
    assert.deepStrictEqual(
      archive.producer?.sources.map(node => node.identity),
      ['build/a.o', 'build/b.o']
    );
  });
});
