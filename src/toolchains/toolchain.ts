import type { DepsStyle, StepAction } from '../core/node.js';
import type { VarValue } from '../core/subst.js';
import type { TargetKind } from '../core/target.js';

/**
 * Contract between the engine and a compiler family. The engine carries no
 * compiler knowledge of its own: everything it needs to turn sources into
 * commands comes through these interfaces.
 */

export type Platform = 'linux' | 'darwin' | 'win32';

/**
 * One way a tool can build files, e.g. the C compiler's `Object` builder.
 */
export interface BuilderSpec {
  name: string;
  action: StepAction;
  /** Tool variable holding the command template */
  commandVar: string;
  /** One output per source (compilers) or one output for all (archivers, linkers) */
  singleSource: boolean;
  targetPrefix?: string;
  targetSuffix: string;
  language?: string;
  depfile?: string;
  deps?: DepsStyle;
  description?: string;
}

export interface ToolDefinition {
  name: string;
  defaults: Readonly<Record<string, VarValue>>;
  builders: readonly BuilderSpec[];
}

/**
 * Which tool and builder compile a source suffix.
 */
export interface SourceHandler {
  suffix: string;
  tool: string;
  builder: string;
  language: string;
}

export interface RequirementPrefixes {
  include: string;
  define: string;
  libDir: string;
  lib: string;
}

export interface BuilderRef {
  tool: string;
  builder: string;
}

export interface Toolchain {
  readonly name: string;
  readonly platform: Platform;
  readonly tools: readonly ToolDefinition[];
  readonly headerSuffixes: readonly string[];
  /** Flags whose argument is the following token, e.g. `-framework Foo` */
  readonly separatedArgFlags: readonly string[];
  readonly prefixes: RequirementPrefixes;

  sourceHandler(suffix: string): SourceHandler | undefined;
  /** File name of a target's output, e.g. `libcore.a` */
  outputName(kind: TargetKind, name: string): string;
  /** Compile flags every source of a target kind gets, e.g. `-fPIC` */
  compileFlagsFor(kind: TargetKind): string[];
  archiver(): BuilderRef;
  /** Link builder for a program or shared library given its languages */
  linker(kind: TargetKind, languages: readonly string[]): BuilderRef;
}
