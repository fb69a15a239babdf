import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { NodeRegistry } from '../../src/core/node-registry.js';
import { nodeInputs } from '../../src/core/node.js';
import { assertAcyclic, findNodeCycle } from '../../src/core/resolver/graph.js';
import { DependencyCycleError, DuplicateOutputError, NodeKindConflictError } from '../../src/utils/errors.js';

const ROOT = '/work/proj';

describe('NodeRegistry', () => {
  it('should return the same instance for the same path', () => {
    const registry = new NodeRegistry(ROOT);
    const a = registry.file('src/a.c');
    assert.strictEqual(registry.file('./src/a.c'), a);
    assert.strictEqual(registry.file(join(ROOT, 'src', 'a.c')), a);
    assert.strictEqual(registry.size, 1);
    assert.strictEqual(a.identity, 'src/a.c');
  });

  it('should namespace value and alias identities', () => {
    const registry = new NodeRegistry(ROOT);
    const value = registry.value('cfg', 'x');
    const alias = registry.alias('cfg');
    assert.strictEqual(value.identity, 'value:cfg');
    assert.strictEqual(alias.identity, 'alias:cfg');
    assert.strictEqual(registry.size, 2);
  });

  it('should update a value when one is given', () => {
    const registry = new NodeRegistry(ROOT);
    registry.value('hash', 'one');
    assert.strictEqual(registry.value('hash').value, 'one');
    assert.strictEqual(registry.value('hash', 'two').value, 'two');
  });

  it('should reject a path registered under another kind', () => {
    const registry = new NodeRegistry(ROOT);
    registry.file('src');
    assert.throws(() => registry.dir('src', 'source'), NodeKindConflictError);
  });

  it('should reject a directory requested with another role', () => {
    const registry = new NodeRegistry(ROOT);
    registry.dir('out', 'target');
    assert.throws(() => registry.dir('out', 'source'), NodeKindConflictError);
  });

  it('should add directory members idempotently', () => {
    const registry = new NodeRegistry(ROOT);
    const a = registry.file('inc/a.h');
    const b = registry.file('inc/b.h');
    registry.dir('inc', 'source', [a]);
    const dir = registry.dir('inc', 'source', [a, b]);
    assert.deepStrictEqual(dir.members, [a, b]);
  });

  it('should record dependencies once and never on the node itself', () => {
    const registry = new NodeRegistry(ROOT);
    const out = registry.file('build/a.o');
    const hdr = registry.file('gen/config.h');
    out.dependsOn(hdr, hdr, out).orderAfter(hdr).orderAfter(hdr);
    assert.deepStrictEqual(out.explicitDeps, [hdr]);
    assert.deepStrictEqual(out.orderOnlyDeps, [hdr]);
    assert.deepStrictEqual(nodeInputs(out), [hdr]);
  });

  it('should refuse a second producer for one output', () => {
    const registry = new NodeRegistry(ROOT);
    const out = registry.file('build/a.o');
    const step = (target: string) => ({
      action: 'command' as const,
      tool: 'command',
      sources: [],
      outputs: [out],
      variables: new Map(),
      target
    });
    const first = step('one');
    out.setProducer(first);
    out.setProducer(first);
    assert.throws(() => out.setProducer(step('two')), DuplicateOutputError);
  });

  it('should find a cycle through dependency edges', () => {
    const registry = new NodeRegistry(ROOT);
    const x = registry.file('gen/x.h');
    const y = registry.file('gen/y.h');
    const z = registry.file('gen/z.h');
    x.dependsOn(y);
    y.addImplicit(x);
    z.dependsOn(x);

    assert.deepStrictEqual(findNodeCycle([z]), [x, y, x]);
    assert.throws(
      () => assertAcyclic(registry.all()),
      (error: unknown) => error instanceof DependencyCycleError && error.cycle.join(' ') === 'gen/x.h gen/y.h gen/x.h'
    );
  });

  it('should accept a graph without cycles', () => {
    const registry = new NodeRegistry(ROOT);
    const a = registry.file('a');
    registry.file('b').dependsOn(a).orderAfter(a);

    assert.strictEqual(findNodeCycle(registry.all()), undefined);
  });
});
