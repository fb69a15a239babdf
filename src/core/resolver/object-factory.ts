import { createHash } from 'crypto';
import { posix } from 'path';
import type { Toolchain } from '../../toolchains/toolchain.js';
import { ConfigError, MissingToolError, NoSourceHandlerError } from '../../utils/errors.js';
import { flattenForOutput, replaceSuffix } from '../../utils/paths.js';
import { logger } from '../../utils/logger.js';
import { STEP_VARIABLES } from '../../constants/index.js';
import type { Environment } from '../environment.js';
import type { BuildStep, FileNode, Node } from '../node.js';
import type { Project } from '../project.js';
import { tokenText, type CommandToken, type PathToken } from '../subst.js';
import type { Target } from '../target.js';

/**
 * Everything that decides how a target's sources compile.
 */
export interface CompileContext {
  target: Target;
  environment: Environment;
  toolchain: Toolchain;
  includes: PathToken[];
  defines: string[];
  flags: string[];
  /** Inputs every object depends on without reading them as sources */
  implicitDeps: Node[];
  /** Inputs that must exist first, such as generated headers */
  orderOnlyDeps: Node[];
}

function compileHash(context: CompileContext): string {
  return createHash('sha256')
    .update(
      JSON.stringify([
        context.environment.name,
        context.includes.map(tokenText),
        context.defines,
        context.flags
      ])
    )
    .digest('hex');
}

/**
 * Creates object nodes. Objects are cached by source path and compile
 * settings, so two targets compiling a file identically share one object.
 */
export class ObjectFactory {
  private readonly cache = new Map<string, FileNode>();

  constructor(private readonly project: Project) {}

  objectFor(context: CompileContext, source: FileNode): FileNode {
    const { target, environment, toolchain } = context;
    const suffix = posix.extname(source.path);

    const handler = toolchain.sourceHandler(suffix);
    if (!handler) {
      throw new NoSourceHandlerError(source.path, suffix, toolchain.name, target.origin);
    }
    if (!environment.hasTool(handler.tool)) {
      throw new MissingToolError(handler.tool, suffix, target.origin);
    }

    const key = `${source.path}\0${compileHash(context)}`;
    const cached = this.cache.get(key);
    if (cached) {
      logger.debug(`Reusing ${cached.path} for ${target.name}`);
      return cached.addImplicit(...context.implicitDeps).orderAfter(...context.orderOnlyDeps);
    }

    const spec = environment.tool(handler.tool).builderSpec(handler.builder);
    if (!spec) {
      throw new ConfigError(`tool '${handler.tool}' has no builder '${handler.builder}'`, {
        tool: handler.tool,
        builder: handler.builder
      });
    }

    const path = posix.join(this.project.buildDir, `obj.${target.name}`, flattenForOutput(replaceSuffix(source.path, spec.targetSuffix)));
    const object = this.project.registry.file(path, target.origin);

    const variables = new Map<string, CommandToken[]>();
    const prefixes = toolchain.prefixes;
    if (context.includes.length > 0) variables.set(STEP_VARIABLES.INCLUDES, context.includes);
    if (context.defines.length > 0) variables.set(STEP_VARIABLES.DEFINES, context.defines.map(define => `${prefixes.define}${define}`));
    if (context.flags.length > 0) variables.set(STEP_VARIABLES.EXTRA_FLAGS, context.flags);

    const step: BuildStep = {
      action: 'compile',
      environment,
      tool: handler.tool,
      commandVar: spec.commandVar,
      language: handler.language,
      sources: [source],
      outputs: [object],
      variables,
      depfile: spec.depfile,
      deps: spec.deps,
      description: spec.description,
      target: target.name,
      origin: target.origin
    };
    object.setProducer(step);
    object.addImplicit(...context.implicitDeps).orderAfter(...context.orderOnlyDeps);

    this.cache.set(key, object);
    return object;
  }
}
