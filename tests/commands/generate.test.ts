import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { readFile, symlink } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { getVersion } from '../../src/utils/package.js';
import { createProjectDir, getCliPath, removeDir, runCli } from '../test-helpers.js';

const CLI_ENV = { NO_COLOR: '1', FORCE_COLOR: undefined, BUILDWEAVE_VERBOSE: undefined, NODE_ENV: 'test' };

const DESCRIPTION = `project: demo
targets:
  util:
    kind: static_library
    sources: [src/util.c]
  app:
    kind: program
    sources: [src/main.c]
    link:
      - target: util
        visibility: private
`;

describe('generate command', () => {
  let root: string;

  before(async () => {
    root = await createProjectDir({
      'buildweave.yml': DESCRIPTION,
      'src/main.c': 'int main(void) { return 0; }\n',
      'src/util.c': ''
    });
  });

  after(async () => {
    await removeDir(root);
  });

  it('should write build.ninja for the description in the working directory', async () => {
    const { code, stdout } = runCli(['generate'], root, CLI_ENV);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(stdout.split('\n'), ['wrote build.ninja', "2 target(s), 6 node(s) in project 'demo'"]);
    const content = await readFile(path.join(root, 'build.ninja'), 'utf8');
    assert.ok(content.includes('build build/app: link_progcmd_default build/obj.app/src/main.o build/libutil.a\n'));
  });

  it('should write extra files into the output directory', () => {
    const { code, stdout } = runCli(['gen', '--out', 'out', '--compile-commands', '--graph'], root, CLI_ENV);

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(stdout.split('\n').slice(0, 3), [
      'wrote out/build.ninja',
      'wrote out/compile_commands.json',
      'wrote out/targets.mmd'
    ]);
    assert.ok(existsSync(path.join(root, 'out', 'compile_commands.json')));
  });

  it('should print the target graph', () => {
    const { code, stdout } = runCli(['graph'], root, CLI_ENV);

    assert.strictEqual(code, 0);
    assert.strictEqual(
      stdout,
      ['flowchart LR', '  t_util["util (static_library)"]', '  t_app["app (program)"]', '  t_app -.-> t_util'].join('\n')
    );
  });

  it('should print resolution warnings to stderr', async () => {
    const dir = await createProjectDir({
      'buildweave.yml': 'project: headers\ntargets:\n  api:\n    kind: static_library\n    sources: [include/api.h]\n',
      'include/api.h': ''
    });
    try {
      const { code, stderr } = runCli(['generate'], dir, CLI_ENV);

      assert.strictEqual(code, 0);
      assert.ok(
        stderr.includes(
          `warning: ${path.join(dir, 'buildweave.yml')} (targets.api): static_library 'api' has no compilable sources; nothing will be built`
        )
      );
    } finally {
      await removeDir(dir);
    }
  });

  it('should fail without a build description', async () => {
    const dir = await createProjectDir({});
    try {
      const { code, stderr } = runCli(['generate'], dir, CLI_ENV);

      assert.strictEqual(code, 1);
      assert.ok(stderr.includes(`Invalid build description: no build description found in ${dir}`));
      assert.strictEqual(existsSync(path.join(dir, 'build.ninja')), false);
    } finally {
      await removeDir(dir);
    }
  });

  it('should fail on an invalid description', async () => {
    const dir = await createProjectDir({ 'buildweave.yml': 'project: bad\ntargets:\n  app:\n    kind: binary\n' });
    try {
      const { code, stderr } = runCli(['generate'], dir, CLI_ENV);

      assert.strictEqual(code, 1);
      assert.ok(stderr.includes('(targets.app.kind): Invalid build description: kind must be one of'));
    } finally {
      await removeDir(dir);
    }
  });

  it('should run when started through a symlink, as an installed bin is', async () => {
    const dir = await createProjectDir({});
    try {
      const link = path.join(dir, 'buildweave.ts');
      await symlink(getCliPath(), link);

      const version = runCli(['--version'], dir, CLI_ENV, link);
      assert.strictEqual(version.code, 0);
      assert.strictEqual(version.stdout, getVersion());

      const failed = runCli(['generate'], dir, CLI_ENV, link);
      assert.strictEqual(failed.code, 1);
      assert.ok(failed.stderr.includes(`Invalid build description: no build description found in ${dir}`));
    } finally {
      await removeDir(dir);
    }
  });
});
