import { ConfigError } from '../utils/errors.js';
import { createClangToolchain, createGccToolchain } from './gcc.js';
import type { Platform, Toolchain } from './toolchain.js';

export type { BuilderRef, BuilderSpec, Platform, SourceHandler, ToolDefinition, Toolchain } from './toolchain.js';
export { GccToolchain, createClangToolchain, createGccToolchain } from './gcc.js';

const FACTORIES: Record<string, (platform?: Platform) => Toolchain> = {
  gcc: platform => createGccToolchain({ platform }),
  clang: platform => createClangToolchain({ platform })
};

export function toolchainNames(): string[] {
  return Object.keys(FACTORIES);
}

/**
 * Toolchain by name, as used in configuration and build descriptions.
 */
export function getToolchain(name: string, platform?: Platform): Toolchain {
  const factory = Object.prototype.hasOwnProperty.call(FACTORIES, name) ? FACTORIES[name] : undefined;
  if (!factory) {
    throw new ConfigError(`unknown toolchain '${name}' (available: ${toolchainNames().join(', ')})`, { toolchain: name });
  }
  return factory(platform);
}
