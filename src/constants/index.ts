/**
 * Shared constants for buildweave
 * Single source of truth for file names, defaults and output layout.
 */

export const FILE_PATTERNS = {
  BUILD_NINJA: 'build.ninja',
  COMPILE_COMMANDS: 'compile_commands.json',
  TARGET_GRAPH: 'targets.mmd',
  // Description files probed when none is given on the command line
  DESCRIPTION_FILES: ['buildweave.yml', 'buildweave.yaml', 'buildweave.build.json', 'buildweave.build.jsonc']
} as const;

export const CONFIG_FILE_NAMES = ['buildweave.jsonc', 'buildweave.json'] as const;

export const DEFAULT_BUILD_DIR = 'build';

/** `$$in`/`$$out` become the executor's own `$in`/`$out` */
export const DEFAULT_COPY_COMMAND = 'cp $$in $$out';

export const NINJA = {
  REQUIRED_VERSION: '1.3',
  /** Value nodes are written below this directory of the output directory */
  VALUES_DIR: '.buildweave/values',
  COPY_RULE: 'copy',
  PHONY: 'phony'
} as const;

/** Per-step variables emitted on build statements, in this order */
export const STEP_VARIABLES = {
  INCLUDES: 'includes',
  DEFINES: 'defines',
  EXTRA_FLAGS: 'extra_flags',
  LDFLAGS: 'ldflags',
  LIBDIRS: 'libdirs',
  LIBS: 'libs'
} as const;
