/**
 * Programmatic API: declare a project in TypeScript instead of a
 * description file, then call `generate()`.
 */

export { Project, type CommandTargetSpec, type ProjectOptions } from './core/project.js';
export { Environment, type EnvironmentOptions, type EnvironmentOverrides } from './core/environment.js';
export { ToolConfig } from './core/tool-config.js';
export { BuilderInvocation, type BuildOptions } from './core/builder.js';
export {
  Target,
  collectEffectiveRequirements,
  linkDependencies,
  transitiveLanguages,
  type LinkEdge,
  type TargetKind,
  type Visibility
} from './core/target.js';
export { UsageRequirements, mergeRequirements } from './core/requirements.js';
export { AliasNode, DirNode, FileNode, Node, ValueNode, type BuildStep, type DirRole } from './core/node.js';
export {
  PathToken,
  expand,
  expandToSequence,
  quoteForShell,
  toShellCommand,
  type CommandToken,
  type Namespace,
  type VarValue
} from './core/subst.js';
export type { ResolutionReport } from './core/resolver/index.js';
export { generate, generatorsFor, type GenerateResult } from './core/generate.js';
export type { GeneratedFile, Generator } from './core/generators/generator.js';
export { NinjaGenerator } from './core/generators/ninja.js';
export { CompileCommandsGenerator } from './core/generators/compile-commands.js';
export { MermaidGenerator, renderTargetGraph } from './core/generators/mermaid.js';
export { buildProject, findDescriptionFile, loadDescription } from './core/description/loader.js';
export { createClangToolchain, createGccToolchain, getToolchain, type Toolchain } from './toolchains/index.js';
export * from './utils/errors.js';
export { BuildweaveError, ErrorCodes, type BuildweaveConfig, type GenerateOptions, type SourceLocation } from './types/index.js';
