import { mergeFlags, mergeUnique, type SeparatedArgFlags } from '../utils/flags.js';

export interface UsageRequirementsInit {
  includeDirs?: readonly string[];
  defines?: readonly string[];
  compileFlags?: readonly string[];
  linkFlags?: readonly string[];
  linkDirs?: readonly string[];
  /** External library names, e.g. `m` or `pthread` */
  linkLibs?: readonly string[];
}

/**
 * Build requirements a target uses itself or passes to its dependents.
 * Every list is ordered and free of duplicates.
 */
export class UsageRequirements {
  includeDirs: string[];
  defines: string[];
  compileFlags: string[];
  linkFlags: string[];
  linkDirs: string[];
  linkLibs: string[];

  /**
   * Flags are taken as given; repeated flags only collapse on merge, where
   * the toolchain's separated-argument flags are known.
   */
  constructor(init: UsageRequirementsInit = {}) {
    this.includeDirs = mergeUnique<string>([], init.includeDirs ?? []);
    this.defines = mergeUnique<string>([], init.defines ?? []);
    this.compileFlags = [...(init.compileFlags ?? [])];
    this.linkFlags = [...(init.linkFlags ?? [])];
    this.linkDirs = mergeUnique<string>([], init.linkDirs ?? []);
    this.linkLibs = mergeUnique<string>([], init.linkLibs ?? []);
  }

  /**
   * Merge `other` into this set, keeping first-seen order. Flags are merged
   * as flag units, so separated-argument pairs are never split.
   */
  merge(other: UsageRequirementsLike, separatedArgFlags: SeparatedArgFlags = []): this {
    this.includeDirs = mergeUnique(this.includeDirs, other.includeDirs);
    this.defines = mergeUnique(this.defines, other.defines);
    this.compileFlags = mergeFlags(this.compileFlags, other.compileFlags, separatedArgFlags);
    this.linkFlags = mergeFlags(this.linkFlags, other.linkFlags, separatedArgFlags);
    this.linkDirs = mergeUnique(this.linkDirs, other.linkDirs);
    this.linkLibs = mergeUnique(this.linkLibs, other.linkLibs);
    return this;
  }

  clone(): UsageRequirements {
    return new UsageRequirements(this);
  }

  isEmpty(): boolean {
    return (
      this.includeDirs.length === 0 &&
      this.defines.length === 0 &&
      this.compileFlags.length === 0 &&
      this.linkFlags.length === 0 &&
      this.linkDirs.length === 0 &&
      this.linkLibs.length === 0
    );
  }
}

export type UsageRequirementsLike = Readonly<Required<UsageRequirementsInit>>;

/**
 * Merge several requirement sets into a new one, left to right.
 */
export function mergeRequirements(
  sets: readonly UsageRequirementsLike[],
  separatedArgFlags: SeparatedArgFlags = []
): UsageRequirements {
  const result = new UsageRequirements();
  for (const set of sets) {
    result.merge(set, separatedArgFlags);
  }
  return result;
}
