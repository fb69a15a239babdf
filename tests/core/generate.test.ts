import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { readFile, stat } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { generate } from '../../src/core/generate.js';
import { MissingSourceError } from '../../src/utils/errors.js';
import { createProjectDir, createTestProject, removeDir } from '../test-helpers.js';

describe('generate', () => {
  let root: string;

  before(async () => {
    root = await createProjectDir({ 'src/main.c': 'int main(void) { return 0; }\n' });
  });

  after(async () => {
    await removeDir(root);
  });

  it('should write build.ninja into the project root by default', async () => {
    const dir = await createProjectDir({ 'src/main.c': '' });
    try {
      const { project, env } = createTestProject(dir);
      project.program('app', env, ['src/main.c']);

      const result = await generate(project);

      assert.deepStrictEqual(result.files, [path.join(dir, 'build.ninja')]);
      assert.deepStrictEqual(result.report.resolvedTargets, ['app']);
      const content = await readFile(path.join(dir, 'build.ninja'), 'utf8');
      assert.ok(content.includes('build build/app: link_progcmd_default build/obj.app/src/main.o\n'));
    } finally {
      await removeDir(dir);
    }
  });

  it('should resolve a relative output directory against the project root', async () => {
    const { project, env } = createTestProject(root);
    project.program('app', env, ['src/main.c']);

    const result = await generate(project, 'out', { compileCommands: true, graph: true });

    assert.deepStrictEqual(result.files, [
      path.join(root, 'out', 'build.ninja'),
      path.join(root, 'out', 'compile_commands.json'),
      path.join(root, 'out', 'targets.mmd')
    ]);
    const content = await readFile(path.join(root, 'out', 'build.ninja'), 'utf8');
    assert.ok(content.includes('build ../build/obj.app/src/main.o: cc_objcmd_default ../src/main.c\n'));
  });

  it('should write nothing when resolution fails', async () => {
    const dir = await createProjectDir({ 'src/main.c': '' });
    try {
      const { project, env } = createTestProject(dir);
      project.program('app', env, ['src/main.c']);
      project.program('broken', env, ['src/missing.c']);

      await assert.rejects(generate(project), MissingSourceError);
      assert.strictEqual(existsSync(path.join(dir, 'build.ninja')), false);
    } finally {
      await removeDir(dir);
    }
  });

  it('should leave an unchanged value file alone', async () => {
    const dir = await createProjectDir({});
    try {
      const { project } = createTestProject(dir);
      const version = project.value('version', '1.0.0');
      const valuePath = path.join(dir, '.buildweave', 'values', 'version');

      const first = await generate(project);
      assert.ok(first.files.includes(valuePath));
      const written = await stat(valuePath);

      const second = await generate(project);
      assert.deepStrictEqual(second.unchanged, [valuePath]);
      assert.deepStrictEqual(second.files, [path.join(dir, 'build.ninja')]);
      assert.strictEqual((await stat(valuePath)).mtimeMs, written.mtimeMs);

      version.value = '1.0.1';
      const third = await generate(project);
      assert.ok(third.files.includes(valuePath));
      assert.strictEqual(await readFile(valuePath, 'utf8'), '1.0.1');
    } finally {
      await removeDir(dir);
    }
  });
});
