import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { deduplicateFlags, groupFlags, mergeFlags, mergeUnique } from '../../src/utils/flags.js';

const SEPARATED = ['-F', '-framework', '-isystem'];

describe('flags', () => {
  it('should group separated-argument flags with their value', () => {
    assert.deepStrictEqual(groupFlags(['-O2', '-F', 'a', '-Wall', '-F'], SEPARATED), [['-O2'], ['-F', 'a'], ['-Wall'], ['-F']]);
  });

  it('should keep distinct flag pairs that share a flag', () => {
    assert.deepStrictEqual(deduplicateFlags(['-F', 'a', '-F', 'b'], SEPARATED), ['-F', 'a', '-F', 'b']);
  });

  it('should drop repeated flag pairs and plain flags', () => {
    assert.deepStrictEqual(
      deduplicateFlags(['-framework', 'Cocoa', '-O2', '-framework', 'Cocoa', '-O2'], SEPARATED),
      ['-framework', 'Cocoa', '-O2']
    );
  });

  it('should treat a value that looks like a flag as part of its pair', () => {
    assert.deepStrictEqual(deduplicateFlags(['-isystem', '-O2', '-O2'], SEPARATED), ['-isystem', '-O2', '-O2']);
  });

  it('should merge flag lists in first-seen order', () => {
    assert.deepStrictEqual(mergeFlags(['-F', 'a', '-g'], ['-F', 'b', '-F', 'a', '-g'], SEPARATED), ['-F', 'a', '-g', '-F', 'b']);
  });

  it('should merge plain values without duplicates', () => {
    assert.deepStrictEqual(mergeUnique(['inc_a', 'inc_b'], ['inc_b', 'inc_c', 'inc_a']), ['inc_a', 'inc_b', 'inc_c']);
  });
});
