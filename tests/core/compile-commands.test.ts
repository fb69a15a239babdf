import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { CompileCommandsGenerator } from '../../src/core/generators/compile-commands.js';
import { renderTargetGraph } from '../../src/core/generators/mermaid.js';
import { createProjectDir, createTestProject, removeDir } from '../test-helpers.js';

describe('compile commands generator', () => {
  let root: string;

  before(async () => {
    root = await createProjectDir({ 'src/main.c': '', 'src/util.c': '' });
  });

  after(async () => {
    await removeDir(root);
  });

  it('should list one entry per compiled source with final arguments', () => {
    const { project, env } = createTestProject(root);
    project.program('app', env, ['src/main.c']).privateIncludes('include').privateDefines('DEBUG');
    project.resolve();

    const entries = new CompileCommandsGenerator().entries(project);

    assert.deepStrictEqual(entries, [
      {
        directory: root,
        file: 'src/main.c',
        arguments: [
          'gcc',
          '-Iinclude',
          '-DDEBUG',
          '-MMD',
          '-MF',
          'build/obj.app/src/main.o.d',
          '-c',
          '-o',
          'build/obj.app/src/main.o',
          'src/main.c'
        ],
        command: 'gcc -Iinclude -DDEBUG -MMD -MF build/obj.app/src/main.o.d -c -o build/obj.app/src/main.o src/main.c',
        output: 'build/obj.app/src/main.o'
      }
    ]);
  });

  it('should render the entries as JSON', () => {
    const { project, env } = createTestProject(root);
    project.staticLibrary('util', env, ['src/util.c']);
    project.resolve();

    const generator = new CompileCommandsGenerator();
    const [file] = generator.render(project);

    assert.strictEqual(file.path, 'compile_commands.json');
    assert.deepStrictEqual(JSON.parse(file.content), generator.entries(project));
    assert.ok(file.content.endsWith(']\n'));
  });
});

describe('target graph', () => {
  it('should draw targets and their links', () => {
    const { project, env } = createTestProject('/work/graph');
    const core = project.staticLibrary('core', env);
    const net = project.staticLibrary('net-io', env).link(core, 'private');
    project.program('app', env).link(net);

    assert.strictEqual(
      renderTargetGraph(project),
      [
        'flowchart LR',
        '  t_core["core (static_library)"]',
        '  t_net_io["net-io (static_library)"]',
        '  t_app["app (program)"]',
        '  t_net_io -.-> t_core',
        '  t_app --> t_net_io',
        ''
      ].join('\n')
    );
  });
});
