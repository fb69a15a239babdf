import * as yaml from 'js-yaml';
import { dirname, extname, join, resolve } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import type { BuildweaveConfig } from '../../types/index.js';
import { getToolchain, type Platform } from '../../toolchains/index.js';
import { InvalidDescriptionError } from '../../utils/errors.js';
import { expandGlob, isGlobPattern } from '../../utils/file-walker.js';
import { exists, parseJsonOrJsonc, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { loadConfig } from '../config.js';
import type { Environment } from '../environment.js';
import type { Node } from '../node.js';
import { Project } from '../project.js';
import type { InstallSource, Target } from '../target.js';
import { parseDescription, type DescriptionDocument, type EnvironmentSpec, type RequirementsSpec, type TargetSpec } from './schema.js';

export interface LoadDescriptionOptions {
  /** Project root (default: the description file's directory) */
  rootDir?: string;
  /** Use this configuration instead of reading buildweave.jsonc */
  config?: BuildweaveConfig;
  /** Platform the toolchains name outputs for (default: the host) */
  platform?: Platform;
}

const DEFAULT_TOOLCHAIN = 'gcc';

/**
 * First description file found in `dir`, in FILE_PATTERNS order.
 */
export async function findDescriptionFile(dir: string): Promise<string | undefined> {
  for (const name of FILE_PATTERNS.DESCRIPTION_FILES) {
    const candidate = join(dir, name);
    if (await exists(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Parse description text: YAML for .yml/.yaml, JSON with comments otherwise.
 */
export function parseDescriptionText(content: string, file: string): unknown {
  const ext = extname(file).toLowerCase();
  if (ext === '.yml' || ext === '.yaml') {
    try {
      return yaml.load(content);
    } catch (error) {
      throw new InvalidDescriptionError(error instanceof Error ? error.message : String(error), { file });
    }
  }
  try {
    return parseJsonOrJsonc(content, file);
  } catch (error) {
    throw new InvalidDescriptionError(error instanceof Error ? error.message : String(error), { file });
  }
}

/**
 * Read a description file and declare everything in it on a new project.
 * The project is returned unresolved.
 */
export async function loadDescription(file: string, options: LoadDescriptionOptions = {}): Promise<Project> {
  const path = resolve(file);
  logger.debug(`Loading build description: ${path}`);
  const document = parseDescription(parseDescriptionText(await readTextFile(path), path), path);
  return buildProject(document, { ...options, rootDir: options.rootDir ?? dirname(path) }, path);
}

/**
 * Declare a validated description on a new project.
 */
export async function buildProject(
  document: DescriptionDocument,
  options: LoadDescriptionOptions = {},
  file = '<description>'
): Promise<Project> {
  const rootDir = resolve(options.rootDir ?? process.cwd());
  const config = options.config ?? (await loadConfig(rootDir));
  const project = new Project(document.project, {
    rootDir,
    config: document.buildDir ? { ...config, buildDir: document.buildDir } : config
  });
  const builder = new DescriptionBuilder(project, document, file, options.platform);
  await builder.declare();
  return project;
}

class DescriptionBuilder {
  private readonly environments = new Map<string, Environment>();
  private readonly targets = new Map<string, Target>();

  constructor(
    private readonly project: Project,
    private readonly document: DescriptionDocument,
    private readonly file: string,
    private readonly platform: Platform | undefined
  ) {}

  async declare(): Promise<void> {
    for (const spec of this.document.environments) {
      this.declareEnvironment(spec);
    }

    // Build targets first so links and installs can name any of them
    const deferred: TargetSpec[] = [];
    for (const spec of this.document.targets) {
      if (spec.kind === 'install' || spec.kind === 'install_as') {
        deferred.push(spec);
      } else {
        await this.declareTarget(spec);
      }
    }
    for (const spec of this.document.targets) {
      const target = this.targets.get(spec.name);
      if (!target) continue;
      for (const link of spec.link) {
        target.link(this.requireTarget(link.target, spec), link.visibility);
      }
    }
    for (const spec of deferred) {
      await this.declareInstall(spec);
    }

    for (const alias of this.document.aliases) {
      const members = await Promise.all(alias.members.map(member => this.member(member, alias.origin.detail)));
      this.project.alias(alias.name, members.flat(), alias.origin);
    }

    for (const name of this.document.defaults) {
      const target = this.targets.get(name);
      if (target) {
        this.project.setDefault(target);
      } else if (this.document.aliases.some(alias => alias.name === name)) {
        this.project.setDefault(this.project.registry.alias(name));
      } else {
        this.project.setDefault(this.project.file(name, { file: this.file, detail: 'defaults' }));
      }
    }
  }

  private declareEnvironment(spec: EnvironmentSpec): void {
    let env: Environment;
    if (spec.from) {
      const base = this.environments.get(spec.from);
      if (!base) {
        throw new InvalidDescriptionError(`environment '${spec.from}' must be declared before '${spec.name}'`, spec.origin);
      }
      env = base.override({ vars: spec.vars, tools: spec.tools }, spec.name);
    } else {
      const toolchainName = spec.toolchain ?? this.document.toolchain ?? this.project.config.toolchain ?? DEFAULT_TOOLCHAIN;
      env = this.project.environment({
        name: spec.name,
        toolchain: getToolchain(toolchainName, this.platform),
        vars: spec.vars,
        origin: spec.origin
      });
      for (const [toolName, values] of Object.entries(spec.tools)) {
        const tool = env.addTool(toolName);
        for (const [key, value] of Object.entries(values)) {
          tool.set(key, value);
        }
      }
    }
    this.environments.set(spec.name, env);
  }

  private environmentFor(spec: TargetSpec): Environment {
    if (spec.env) {
      const env = this.environments.get(spec.env);
      if (!env) {
        throw new InvalidDescriptionError(`unknown environment '${spec.env}'`, spec.origin);
      }
      return env;
    }
    const first = this.environments.values().next();
    if (!first.done) return first.value;

    // No environments declared: one default environment serves every target
    this.declareEnvironment({ name: 'default', vars: {}, tools: {}, origin: { file: this.file, detail: 'environments' } });
    return this.environmentFor(spec);
  }

  private requireTarget(name: string, spec: TargetSpec): Target {
    const target = this.targets.get(name);
    if (!target) {
      throw new InvalidDescriptionError(`unknown target '${name}'`, spec.origin);
    }
    return target;
  }

  /**
   * Expand glob patterns below the project root. The build directory is
   * never searched.
   */
  private async expandSources(patterns: readonly string[], detail: string | undefined): Promise<string[]> {
    const buildDir = this.project.buildDir;
    const exclude = [buildDir, `${buildDir}/**`];
    const result: string[] = [];
    for (const pattern of patterns) {
      if (!isGlobPattern(pattern)) {
        result.push(pattern);
        continue;
      }
      const matches = await expandGlob(this.project.rootDir, pattern, exclude);
      if (matches.length === 0) {
        this.project.warn(`pattern '${pattern}' matched no files`, { file: this.file, detail });
      }
      result.push(...matches);
    }
    return result;
  }

  private applyRequirements(target: Target, spec: TargetSpec): void {
    const apply = (requirements: RequirementsSpec, visibility: 'public' | 'private'): void => {
      if (visibility === 'public') {
        target
          .publicIncludes(...requirements.includes)
          .publicDefines(...requirements.defines)
          .publicFlags(...requirements.flags)
          .publicLinkFlags(...requirements.linkFlags)
          .publicLinkDirs(...requirements.linkDirs)
          .publicLinkLibs(...requirements.linkLibs);
      } else {
        if (requirements.linkDirs.length > 0) {
          throw new InvalidDescriptionError('linkDirs are always public; move them under public', spec.origin);
        }
        target
          .privateIncludes(...requirements.includes)
          .privateDefines(...requirements.defines)
          .privateFlags(...requirements.flags)
          .privateLinkFlags(...requirements.linkFlags)
          .privateLinkLibs(...requirements.linkLibs);
      }
    };
    apply(spec.public, 'public');
    apply(spec.private, 'private');
  }

  private async declareTarget(spec: TargetSpec): Promise<void> {
    const origin = spec.origin;
    const sources = await this.expandSources(spec.sources, origin.detail);
    let target: Target;

    switch (spec.kind) {
      case 'static_library':
        target = this.project.staticLibrary(spec.name, this.environmentFor(spec), sources, origin);
        break;
      case 'shared_library':
        target = this.project.sharedLibrary(spec.name, this.environmentFor(spec), sources, origin);
        break;
      case 'program':
        target = this.project.program(spec.name, this.environmentFor(spec), sources, origin);
        break;
      case 'object':
        target = this.project.objectLibrary(spec.name, this.environmentFor(spec), sources, origin);
        break;
      case 'interface':
        target = this.project.interfaceLibrary(spec.name, origin);
        break;
      case 'command':
        target = this.project.command(
          spec.name,
          spec.env ? this.environmentFor(spec) : undefined,
          {
            command: spec.command ?? '',
            outputs: spec.outputs,
            sources,
            description: spec.description,
            depfile: spec.depfile,
            deps: spec.deps
          },
          origin
        );
        break;
      default:
        return;
    }

    this.applyRequirements(target, spec);
    if (spec.outputName) target.setOutputName(spec.outputName);
    this.targets.set(spec.name, target);
  }

  private async installSources(patterns: readonly string[], detail: string | undefined): Promise<InstallSource[]> {
    const result: InstallSource[] = [];
    for (const pattern of patterns) {
      const target = this.targets.get(pattern);
      if (target) {
        result.push(target);
      } else {
        result.push(...(await this.expandSources([pattern], detail)));
      }
    }
    return result;
  }

  private async declareInstall(spec: TargetSpec): Promise<void> {
    const dest = spec.dest ?? '';
    if (spec.kind === 'install') {
      const sources = await this.installSources(spec.sources, spec.origin.detail);
      this.targets.set(spec.name, this.project.install(dest, sources, spec.name, spec.origin));
      return;
    }
    const [source, ...extra] = await this.installSources(spec.source ? [spec.source] : [], spec.origin.detail);
    if (!source || extra.length > 0) {
      throw new InvalidDescriptionError(`'source' must name exactly one file or target`, spec.origin);
    }
    this.targets.set(spec.name, this.project.installAs(dest, source, spec.name, spec.origin));
  }

  private async member(name: string, detail: string | undefined): Promise<Array<Node | Target>> {
    const target = this.targets.get(name);
    if (target) return [target];
    const paths = await this.expandSources([name], detail);
    return paths.map(path => this.project.file(path, { file: this.file, detail }));
  }
}
