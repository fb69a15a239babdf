import type { TargetKind } from '../core/target.js';
import type {
  BuilderRef,
  BuilderSpec,
  Platform,
  RequirementPrefixes,
  SourceHandler,
  ToolDefinition,
  Toolchain
} from './toolchain.js';

/**
 * GCC-compatible toolchains (GCC and Clang).
 *
 * Command templates leave target-specific parts to per-step variables
 * (`$$includes`, `$$defines`, `$$extra_flags`, `$$ldflags`, `$$libdirs`,
 * `$$libs`) so one rule per environment serves every target in it.
 */

export interface GccToolchainOptions {
  name?: string;
  cc?: string;
  cxx?: string;
  ar?: string;
  platform?: Platform;
}

const SEPARATED_ARG_FLAGS = [
  '-arch',
  '-F',
  '-framework',
  '-idirafter',
  '-imacros',
  '-include',
  '-iquote',
  '-isysroot',
  '-isystem',
  '-MF',
  '-MQ',
  '-MT',
  '-u',
  '-weak_framework',
  '-x',
  '-Xassembler',
  '-Xlinker',
  '-Xpreprocessor'
];

const HEADER_SUFFIXES = ['.h', '.hh', '.hpp', '.hxx', '.h++', '.inl', '.ipp'];

const PREFIXES: RequirementPrefixes = {
  include: '-I',
  define: '-D',
  libDir: '-L',
  lib: '-l'
};

function objectBuilder(language: string, label: string): BuilderSpec {
  return {
    name: 'Object',
    action: 'compile',
    commandVar: 'objcmd',
    singleSource: true,
    targetSuffix: '.o',
    language,
    depfile: '$$out.d',
    deps: 'gcc',
    description: `${label} $$out`
  };
}

function linkBuilder(name: string, commandVar: string, targetSuffix: string, label: string): BuilderSpec {
  return { name, action: 'link', commandVar, singleSource: false, targetSuffix, description: `${label} $$out` };
}

function currentPlatform(): Platform {
  return process.platform === 'darwin' || process.platform === 'win32' ? process.platform : 'linux';
}

export class GccToolchain implements Toolchain {
  readonly name: string;
  readonly platform: Platform;
  readonly tools: readonly ToolDefinition[];
  readonly headerSuffixes = HEADER_SUFFIXES;
  readonly separatedArgFlags = SEPARATED_ARG_FLAGS;
  readonly prefixes = PREFIXES;
  private readonly handlers: ReadonlyMap<string, SourceHandler>;

  constructor(options: GccToolchainOptions = {}) {
    this.name = options.name ?? 'gcc';
    this.platform = options.platform ?? currentPlatform();
    const cc = options.cc ?? 'gcc';
    const cxx = options.cxx ?? 'g++';
    const compileTemplate = (tool: string) =>
      `$${tool}.cmd $${tool}.flags $$includes $$defines $$extra_flags $${tool}.depflags -c -o $$out $$in`;
    const sharedFlag = this.platform === 'darwin' ? '-dynamiclib' : '-shared';

    this.tools = [
      {
        name: 'cc',
        defaults: { cmd: cc, flags: [], depflags: ['-MMD', '-MF', '$$out.d'], objcmd: compileTemplate('cc') },
        builders: [objectBuilder('c', 'CC')]
      },
      {
        name: 'cxx',
        defaults: { cmd: cxx, flags: [], depflags: ['-MMD', '-MF', '$$out.d'], objcmd: compileTemplate('cxx') },
        builders: [objectBuilder('cxx', 'CXX')]
      },
      {
        name: 'ar',
        defaults: { cmd: options.ar ?? 'ar', flags: ['rcs'], libcmd: '$ar.cmd $ar.flags $$out $$in' },
        builders: [
          {
            name: 'StaticLibrary',
            action: 'archive',
            commandVar: 'libcmd',
            singleSource: false,
            targetPrefix: 'lib',
            targetSuffix: '.a',
            description: 'AR $$out'
          }
        ]
      },
      {
        name: 'link',
        defaults: {
          cmd: cc,
          cxxcmd: cxx,
          flags: [],
          progcmd: '$link.cmd $link.flags $$ldflags -o $$out $$in $$libdirs $$libs',
          cxxprogcmd: '$link.cxxcmd $link.flags $$ldflags -o $$out $$in $$libdirs $$libs',
          sharedcmd: `$link.cmd ${sharedFlag} $link.flags $$ldflags -o $$out $$in $$libdirs $$libs`,
          cxxsharedcmd: `$link.cxxcmd ${sharedFlag} $link.flags $$ldflags -o $$out $$in $$libdirs $$libs`
        },
        builders: [
          linkBuilder('Program', 'progcmd', this.platform === 'win32' ? '.exe' : '', 'LINK'),
          linkBuilder('CxxProgram', 'cxxprogcmd', this.platform === 'win32' ? '.exe' : '', 'LINK'),
          linkBuilder('SharedLibrary', 'sharedcmd', this.sharedSuffix(), 'LINK'),
          linkBuilder('CxxSharedLibrary', 'cxxsharedcmd', this.sharedSuffix(), 'LINK')
        ]
      }
    ];

    const handlers = new Map<string, SourceHandler>();
    for (const suffix of ['.c', '.s', '.S']) {
      handlers.set(suffix, { suffix, tool: 'cc', builder: 'Object', language: 'c' });
    }
    for (const suffix of ['.cc', '.cpp', '.cxx', '.c++', '.C']) {
      handlers.set(suffix, { suffix, tool: 'cxx', builder: 'Object', language: 'cxx' });
    }
    this.handlers = handlers;
  }

  private sharedSuffix(): string {
    switch (this.platform) {
      case 'darwin':
        return '.dylib';
      case 'win32':
        return '.dll';
      default:
        return '.so';
    }
  }

  sourceHandler(suffix: string): SourceHandler | undefined {
    return this.handlers.get(suffix);
  }

  outputName(kind: TargetKind, name: string): string {
    switch (kind) {
      case 'static_library':
        return `lib${name}.a`;
      case 'shared_library':
        return this.platform === 'win32' ? `${name}.dll` : `lib${name}${this.sharedSuffix()}`;
      case 'program':
        return this.platform === 'win32' ? `${name}.exe` : name;
      default:
        return name;
    }
  }

  compileFlagsFor(kind: TargetKind): string[] {
    return kind === 'shared_library' && this.platform !== 'win32' ? ['-fPIC'] : [];
  }

  archiver(): BuilderRef {
    return { tool: 'ar', builder: 'StaticLibrary' };
  }

  linker(kind: TargetKind, languages: readonly string[]): BuilderRef {
    const cxx = languages.includes('cxx');
    if (kind === 'shared_library') {
      return { tool: 'link', builder: cxx ? 'CxxSharedLibrary' : 'SharedLibrary' };
    }
    return { tool: 'link', builder: cxx ? 'CxxProgram' : 'Program' };
  }
}

export function createGccToolchain(options: Omit<GccToolchainOptions, 'name'> = {}): GccToolchain {
  return new GccToolchain({ ...options, name: 'gcc' });
}

export function createClangToolchain(options: Omit<GccToolchainOptions, 'name'> = {}): GccToolchain {
  return new GccToolchain({ cc: 'clang', cxx: 'clang++', ...options, name: 'clang' });
}
