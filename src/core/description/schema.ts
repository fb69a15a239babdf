import type { SourceLocation } from '../../types/index.js';
import { InvalidDescriptionError } from '../../utils/errors.js';
import type { DepsStyle } from '../node.js';
import type { Scalar, VarValue } from '../subst.js';
import { TARGET_KINDS, type TargetKind, type Visibility } from '../target.js';

/**
 * Typed form of a build description file (buildweave.yml or
 * buildweave.build.json). `parseDescription` checks the shape and reports
 * the offending entry; it does not look at the file system.
 */

export interface RequirementsSpec {
  includes: string[];
  defines: string[];
  flags: string[];
  linkFlags: string[];
  linkDirs: string[];
  linkLibs: string[];
}

export interface LinkSpec {
  target: string;
  visibility: Visibility;
}

export interface EnvironmentSpec {
  name: string;
  /** Environment this one is cloned from */
  from?: string;
  toolchain?: string;
  vars: Record<string, VarValue>;
  tools: Record<string, Record<string, VarValue>>;
  origin: SourceLocation;
}

export interface TargetSpec {
  name: string;
  kind: TargetKind;
  env?: string;
  sources: string[];
  public: RequirementsSpec;
  private: RequirementsSpec;
  link: LinkSpec[];
  outputName?: string;
  command?: string;
  outputs: string[];
  description?: string;
  depfile?: string;
  deps?: DepsStyle;
  dest?: string;
  source?: string;
  origin: SourceLocation;
}

export interface AliasSpec {
  name: string;
  members: string[];
  origin: SourceLocation;
}

export interface DescriptionDocument {
  project: string;
  buildDir?: string;
  toolchain?: string;
  environments: EnvironmentSpec[];
  targets: TargetSpec[];
  aliases: AliasSpec[];
  defaults: string[];
}

const DOCUMENT_KEYS = ['project', 'buildDir', 'toolchain', 'environments', 'targets', 'aliases', 'defaults'];
const ENVIRONMENT_KEYS = ['from', 'toolchain', 'vars', 'tools'];
const REQUIREMENT_KEYS = ['includes', 'defines', 'flags', 'linkFlags', 'linkDirs', 'linkLibs'];
const TARGET_KEYS = [
  'kind',
  'env',
  'sources',
  'public',
  'private',
  'link',
  'outputName',
  'command',
  'outputs',
  'description',
  'depfile',
  'deps',
  'dest',
  'source'
];

/** Keys each kind accepts on top of `kind` */
const KIND_KEYS: Record<TargetKind, readonly string[]> = {
  static_library: ['env', 'sources', 'public', 'private', 'link', 'outputName'],
  shared_library: ['env', 'sources', 'public', 'private', 'link', 'outputName'],
  program: ['env', 'sources', 'public', 'private', 'link', 'outputName'],
  object: ['env', 'sources', 'public', 'private', 'link'],
  interface: ['public', 'link'],
  command: ['env', 'sources', 'command', 'outputs', 'description', 'depfile', 'deps'],
  install: ['sources', 'dest'],
  install_as: ['source', 'dest']
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

class Reader {
  constructor(private readonly file: string) {}

  at(detail: string): SourceLocation {
    return { file: this.file, detail };
  }

  error(message: string, detail?: string): InvalidDescriptionError {
    return new InvalidDescriptionError(message, detail ? this.at(detail) : { file: this.file });
  }

  record(value: unknown, detail: string): Record<string, unknown> {
    if (!isRecord(value)) throw this.error('expected a mapping', detail);
    return value;
  }

  optionalRecord(value: unknown, detail: string): Record<string, unknown> {
    return value === undefined || value === null ? {} : this.record(value, detail);
  }

  keys(value: Record<string, unknown>, allowed: readonly string[], detail: string): void {
    for (const key of Object.keys(value)) {
      if (!allowed.includes(key)) throw this.error(`unknown key '${key}'`, detail);
    }
  }

  string(value: unknown, detail: string): string {
    if (typeof value !== 'string' || value === '') throw this.error('expected a non-empty string', detail);
    return value;
  }

  optionalString(value: unknown, detail: string): string | undefined {
    return value === undefined ? undefined : this.string(value, detail);
  }

  /** A string or a list of strings */
  stringList(value: unknown, detail: string): string[] {
    if (value === undefined || value === null) return [];
    if (typeof value === 'string') return [value];
    if (!Array.isArray(value)) throw this.error('expected a string or a list of strings', detail);
    return value.map((item, index) => this.string(item, `${detail}[${index}]`));
  }

  varValue(value: unknown, detail: string): VarValue {
    if (isScalar(value)) return value;
    if (Array.isArray(value)) {
      return value.map((item, index) => {
        if (!isScalar(item)) throw this.error('expected a string, number or boolean', `${detail}[${index}]`);
        return item;
      });
    }
    throw this.error('expected a value or a list of values', detail);
  }

  vars(value: unknown, detail: string): Record<string, VarValue> {
    const result: Record<string, VarValue> = {};
    for (const [key, item] of Object.entries(this.optionalRecord(value, detail))) {
      result[key] = this.varValue(item, `${detail}.${key}`);
    }
    return result;
  }

  namedEntries(value: unknown, detail: string): Array<[string, unknown]> {
    return Object.entries(this.optionalRecord(value, detail));
  }
}

function parseRequirements(reader: Reader, value: unknown, detail: string): RequirementsSpec {
  const raw = reader.optionalRecord(value, detail);
  reader.keys(raw, REQUIREMENT_KEYS, detail);
  return {
    includes: reader.stringList(raw.includes, `${detail}.includes`),
    defines: reader.stringList(raw.defines, `${detail}.defines`),
    flags: reader.stringList(raw.flags, `${detail}.flags`),
    linkFlags: reader.stringList(raw.linkFlags, `${detail}.linkFlags`),
    linkDirs: reader.stringList(raw.linkDirs, `${detail}.linkDirs`),
    linkLibs: reader.stringList(raw.linkLibs, `${detail}.linkLibs`)
  };
}

function parseLinks(reader: Reader, value: unknown, detail: string): LinkSpec[] {
  if (value === undefined || value === null) return [];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item, index): LinkSpec => {
    const itemDetail = `${detail}[${index}]`;
    if (typeof item === 'string') {
      return { target: reader.string(item, itemDetail), visibility: 'public' };
    }
    const raw = reader.record(item, itemDetail);
    reader.keys(raw, ['target', 'visibility'], itemDetail);
    const visibility = raw.visibility ?? 'public';
    if (visibility !== 'public' && visibility !== 'private') {
      throw reader.error("visibility must be 'public' or 'private'", `${itemDetail}.visibility`);
    }
    return { target: reader.string(raw.target, `${itemDetail}.target`), visibility };
  });
}

function parseEnvironment(reader: Reader, name: string, value: unknown): EnvironmentSpec {
  const detail = `environments.${name}`;
  const raw = reader.optionalRecord(value, detail);
  reader.keys(raw, ENVIRONMENT_KEYS, detail);

  const from = reader.optionalString(raw.from, `${detail}.from`);
  const toolchain = reader.optionalString(raw.toolchain, `${detail}.toolchain`);
  if (from && toolchain) {
    throw reader.error("'toolchain' cannot be combined with 'from'; clones keep their base toolchain", detail);
  }

  const tools: Record<string, Record<string, VarValue>> = {};
  for (const [tool, vars] of reader.namedEntries(raw.tools, `${detail}.tools`)) {
    tools[tool] = reader.vars(vars, `${detail}.tools.${tool}`);
  }

  return { name, from, toolchain, vars: reader.vars(raw.vars, `${detail}.vars`), tools, origin: reader.at(detail) };
}

function parseTarget(reader: Reader, name: string, value: unknown): TargetSpec {
  const detail = `targets.${name}`;
  const raw = reader.record(value, detail);
  reader.keys(raw, TARGET_KEYS, detail);

  const kind = TARGET_KINDS.find(candidate => candidate === raw.kind);
  if (!kind) {
    throw reader.error(`kind must be one of ${TARGET_KINDS.join(', ')}`, `${detail}.kind`);
  }
  for (const key of Object.keys(raw)) {
    if (key !== 'kind' && !KIND_KEYS[kind].includes(key)) {
      throw reader.error(`'${key}' is not supported for ${kind} targets`, detail);
    }
  }

  const deps = raw.deps;
  if (deps !== undefined && deps !== 'gcc' && deps !== 'msvc') {
    throw reader.error("deps must be 'gcc' or 'msvc'", `${detail}.deps`);
  }

  const spec: TargetSpec = {
    name,
    kind,
    env: reader.optionalString(raw.env, `${detail}.env`),
    sources: reader.stringList(raw.sources, `${detail}.sources`),
    public: parseRequirements(reader, raw.public, `${detail}.public`),
    private: parseRequirements(reader, raw.private, `${detail}.private`),
    link: parseLinks(reader, raw.link, `${detail}.link`),
    outputName: reader.optionalString(raw.outputName, `${detail}.outputName`),
    command: reader.optionalString(raw.command, `${detail}.command`),
    outputs: reader.stringList(raw.outputs, `${detail}.outputs`),
    description: reader.optionalString(raw.description, `${detail}.description`),
    depfile: reader.optionalString(raw.depfile, `${detail}.depfile`),
    deps,
    dest: reader.optionalString(raw.dest, `${detail}.dest`),
    source: reader.optionalString(raw.source, `${detail}.source`),
    origin: reader.at(detail)
  };

  if (kind === 'command') {
    if (!spec.command) throw reader.error("command targets need 'command'", detail);
    if (spec.outputs.length === 0) throw reader.error("command targets need at least one entry in 'outputs'", detail);
  }
  if ((kind === 'install' || kind === 'install_as') && !spec.dest) {
    throw reader.error(`${kind} targets need 'dest'`, detail);
  }
  if (kind === 'install_as' && !spec.source) {
    throw reader.error("install_as targets need 'source'", detail);
  }

  return spec;
}

/**
 * Validate a parsed description document.
 */
export function parseDescription(raw: unknown, file: string): DescriptionDocument {
  const reader = new Reader(file);
  const document = reader.record(raw, 'document');
  reader.keys(document, DOCUMENT_KEYS, 'document');

  return {
    project: reader.string(document.project, 'project'),
    buildDir: reader.optionalString(document.buildDir, 'buildDir'),
    toolchain: reader.optionalString(document.toolchain, 'toolchain'),
    environments: reader
      .namedEntries(document.environments, 'environments')
      .map(([name, value]) => parseEnvironment(reader, name, value)),
    targets: reader.namedEntries(document.targets, 'targets').map(([name, value]) => parseTarget(reader, name, value)),
    aliases: reader.namedEntries(document.aliases, 'aliases').map(([name, value]) => ({
      name,
      members: reader.stringList(value, `aliases.${name}`),
      origin: reader.at(`aliases.${name}`)
    })),
    defaults: reader.stringList(document.defaults, 'defaults')
  };
}
