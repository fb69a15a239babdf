import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { createGccToolchain } from '../../src/toolchains/index.js';
import {
  DependencyCycleError,
  DuplicateTargetError,
  InvalidDescriptionError,
  MissingSourceError,
  MissingToolError,
  MissingVariableError,
  NoSourceHandlerError,
  TargetNotResolvedError
} from '../../src/utils/errors.js';
import type { Node } from '../../src/core/node.js';
import { createProjectDir, createTestProject, removeDir } from '../test-helpers.js';

function identities(nodes: readonly Node[]): string[] {
  return nodes.map(node => node.identity);
}

function producerOf(node: Node) {
  const step = node.producer;
  assert.ok(step, `${node.identity} has no producer`);
  return step;
}

describe('resolver', () => {
  let root: string;

  before(async () => {
    root = await createProjectDir({
      'src/main.c': 'int main(void) { return 0; }\n',
      'src/main.cpp': 'int main() { return 0; }\n',
      'src/one.c': '',
      'src/two.c': '',
      'src/util.c': '',
      'src/net.c': '',
      'src/core.c': '',
      'src/widget.cpp': '',
      'src/data.xyz': '',
      'include/api.h': ''
    });
  });

  after(async () => {
    await removeDir(root);
  });

  it('should create object and program nodes for a program', () => {
    const { project, env } = createTestProject(root);
    const app = project.program('app', env, ['src/main.c']);

    const report = project.resolve();

    assert.deepStrictEqual(report.resolvedTargets, ['app']);
    assert.deepStrictEqual(identities(app.objectNodes), ['build/obj.app/src/main.o']);
    assert.deepStrictEqual(identities(app.outputNodes), ['build/app']);
    const link = producerOf(app.outputNodes[0]);
    assert.strictEqual(link.tool, 'link');
    assert.strictEqual(link.commandVar, 'progcmd');
    assert.deepStrictEqual(identities(link.sources), ['build/obj.app/src/main.o']);
  });

  it('should be idempotent', () => {
    const { project, env } = createTestProject(root);
    project.program('app', env, ['src/main.c']);

    project.resolve();
    const size = project.registry.size;
    const again = project.resolve();

    assert.deepStrictEqual(again.resolvedTargets, []);
    assert.strictEqual(project.registry.size, size);
  });

  it('should resolve only targets declared since the previous call', () => {
    const { project, env } = createTestProject(root);
    project.program('one', env, ['src/one.c']);
    project.resolve();
    project.program('two', env, ['src/two.c']);

    assert.deepStrictEqual(project.resolve().resolvedTargets, ['two']);
  });

  it('should refuse output access before resolution', () => {
    const { project, env } = createTestProject(root);
    const app = project.program('app', env, ['src/main.c']);

    assert.throws(() => app.outputNodes, TargetNotResolvedError);
  });

  it('should report a link cycle with its full path', () => {
    const { project, env } = createTestProject(root);
    const a = project.staticLibrary('a', env, ['src/one.c']);
    const b = project.staticLibrary('b', env, ['src/two.c']);
    a.link(b);
    b.link(a);

    assert.throws(
      () => project.resolve(),
      (error: unknown) => error instanceof DependencyCycleError && error.cycle.join(' ') === 'a b a'
    );
  });

  it('should fail on a missing source file', () => {
    const { project, env } = createTestProject(root);
    project.program('app', env, ['src/missing.c']);

    assert.throws(
      () => project.resolve(),
      (error: unknown) => error instanceof MissingSourceError && error.path === 'src/missing.c'
    );
  });

  it('should fail when the environment lacks the compiling tool', () => {
    const { project } = createTestProject(root);
    const env = project.environment({
      name: 'linkonly',
      toolchain: createGccToolchain({ platform: 'linux' }),
      enableTools: ['link']
    });
    project.program('app', env, ['src/main.c']);

    assert.throws(
      () => project.resolve(),
      (error: unknown) => error instanceof MissingToolError && error.tool === 'cc' && error.suffix === '.c'
    );
  });

  it('should fail on a suffix no tool handles', () => {
    const { project, env } = createTestProject(root);
    project.program('app', env, ['src/data.xyz']);

    assert.throws(
      () => project.resolve(),
      (error: unknown) => error instanceof NoSourceHandlerError && error.suffix === '.xyz'
    );
  });

  it('should rename a duplicate target name with a warning', () => {
    const { project, env } = createTestProject(root);
    project.program('app', env, ['src/one.c']);
    const second = project.program('app', env, ['src/two.c'], { file: 'build.yml' });

    assert.strictEqual(second.name, 'app_2');
    assert.deepStrictEqual(project.warnings, ["build.yml: target 'app' already exists; renamed to 'app_2'"]);
  });

  it('should reject a duplicate target name when configured to', () => {
    const { project, env } = createTestProject(root, { duplicateNames: 'error' });
    project.program('app', env, ['src/one.c']);

    assert.throws(() => project.program('app', env, ['src/two.c']), DuplicateTargetError);
  });

  it('should share an object compiled identically by two targets', () => {
    const { project, env } = createTestProject(root);
    const one = project.program('one', env, ['src/one.c', 'src/util.c']);
    const two = project.program('two', env, ['src/two.c', 'src/util.c']);
    const tuned = project.program('tuned', env, ['src/util.c']).privateDefines('TUNED');

    project.resolve();

    assert.strictEqual(one.objectNodes[1], two.objectNodes[1]);
    assert.strictEqual(one.objectNodes[1].identity, 'build/obj.one/src/util.o');
    assert.strictEqual(tuned.objectNodes[0].identity, 'build/obj.tuned/src/util.o');
  });

  it('should warn about a library with only headers', () => {
    const { project, env } = createTestProject(root);
    const headers = project.staticLibrary('headers', env, ['include/api.h'], { file: 'build.yml' });

    const report = project.resolve();

    assert.deepStrictEqual(headers.outputNodes, []);
    assert.deepStrictEqual(report.warnings, [
      "build.yml: static_library 'headers' has no compilable sources; nothing will be built"
    ]);
  });

  it('should link a program with C++ sources through the C++ driver', () => {
    const { project, env } = createTestProject(root);
    const app = project.program('app', env, ['src/main.cpp']);

    project.resolve();

    assert.deepStrictEqual(app.languages, ['cxx']);
    assert.strictEqual(producerOf(app.objectNodes[0]).tool, 'cxx');
    assert.strictEqual(producerOf(app.outputNodes[0]).commandVar, 'cxxprogcmd');
  });

  it('should use the C++ driver when a linked library holds C++', () => {
    const { project, env } = createTestProject(root);
    const widgets = project.staticLibrary('widgets', env, ['src/widget.cpp']);
    const app = project.program('app', env, ['src/main.c']).link(widgets);

    project.resolve();

    assert.deepStrictEqual(app.languages, ['c']);
    assert.strictEqual(producerOf(app.outputNodes[0]).commandVar, 'cxxprogcmd');
  });

  it('should compile shared library sources as position independent code', () => {
    const { project, env } = createTestProject(root);
    const plugin = project.sharedLibrary('plugin', env, ['src/util.c']);

    project.resolve();

    assert.deepStrictEqual(identities(plugin.outputNodes), ['build/libplugin.so']);
    assert.deepStrictEqual(producerOf(plugin.objectNodes[0]).variables.get('extra_flags'), ['-fPIC']);
    assert.strictEqual(producerOf(plugin.outputNodes[0]).commandVar, 'sharedcmd');
  });

  it('should pass libraries to the linker dependents first', () => {
    const { project, env } = createTestProject(root);
    const core = project.staticLibrary('core', env, ['src/core.c']).publicLinkLibs('m');
    const net = project.staticLibrary('net', env, ['src/net.c']).link(core);
    const app = project.program('app', env, ['src/main.c']).link(net);

    project.resolve();

    const link = producerOf(app.outputNodes[0]);
    assert.deepStrictEqual(identities(link.sources), ['build/obj.app/src/main.o', 'build/libnet.a', 'build/libcore.a']);
    assert.deepStrictEqual(link.variables.get('libs'), ['-lm']);
    assert.strictEqual(producerOf(core.outputNodes[0]).tool, 'ar');
  });

  it('should link the objects of an object library directly', () => {
    const { project, env } = createTestProject(root);
    const objs = project.objectLibrary('objs', env, ['src/one.c', 'src/two.c']);
    const app = project.program('app', env, ['src/main.c']).link(objs);

    project.resolve();

    assert.deepStrictEqual(identities(objs.outputNodes), ['build/obj.objs/src/one.o', 'build/obj.objs/src/two.o']);
    assert.deepStrictEqual(identities(producerOf(app.outputNodes[0]).sources), [
      'build/obj.app/src/main.o',
      'build/obj.objs/src/one.o',
      'build/obj.objs/src/two.o'
    ]);
  });

  it('should install target outputs after every build target resolves', () => {
    const { project, env } = createTestProject(root);
    const app = project.program('app', env, ['src/main.c']);
    const install = project.install('dist/bin', [app, 'include/api.h'], 'install_bin');

    const report = project.resolve();

    assert.deepStrictEqual(report.resolvedTargets, ['app', 'install_bin']);
    assert.deepStrictEqual(identities(install.outputNodes), ['dist/bin/app', 'dist/bin/api.h']);
    const copy = producerOf(install.outputNodes[0]);
    assert.strictEqual(copy.action, 'copy');
    assert.deepStrictEqual(identities(copy.sources), ['build/app']);
  });

  it('should refuse to install several files to one path', () => {
    const { project, env } = createTestProject(root);
    const objs = project.objectLibrary('objs', env, ['src/one.c', 'src/two.c']);
    project.installAs('dist/one.o', objs);

    assert.throws(() => project.resolve(), InvalidDescriptionError);
  });

  it('should order compilation after generated headers', () => {
    const { project, env } = createTestProject(root);
    project.command('gen', env, { command: 'gen-config $$out', outputs: ['gen/config.h'] });
    const app = project.program('app', env, ['gen/config.h', 'src/main.c']);

    project.resolve();

    assert.deepStrictEqual(identities(app.objectNodes[0].orderOnlyDeps), ['gen/config.h']);
  });

  it('should fill aliases with target outputs', () => {
    const { project, env } = createTestProject(root);
    const app = project.program('app', env, ['src/main.c']);
    const alias = project.alias('all', [app]);

    project.resolve();

    assert.deepStrictEqual(identities(alias.members), ['build/app']);
  });

  it('should report an undefined variable in a command during resolution', () => {
    const { project, env } = createTestProject(root);
    project.command('gen', env, { command: '$generator $$out', outputs: ['gen/out.txt'] }, { file: 'build.yml' });

    assert.throws(
      () => project.resolve(),
      (error: unknown) => error instanceof MissingVariableError && error.variable === 'generator'
    );
  });
});
