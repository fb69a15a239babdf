import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

/**
 * Nearest package.json above this module; found the same way from src/ and
 * from the compiled output.
 */
function findManifest(): string | undefined {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

export function getVersion(): string {
  const manifestPath = findManifest();
  if (!manifestPath) return '0.0.0';
  try {
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    logger.debug(`Could not read ${manifestPath}`, error);
  }
  return '0.0.0';
}
