import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion = '';

/**
 * Read the package version from package.json (two levels up from both
 * src/utils and dist/utils). Cached after the first call.
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(join(here, '..', '..', 'package.json'), 'utf-8'));
    const version =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg ? pkg.version : undefined;
    cachedVersion = typeof version === 'string' ? version : FALLBACK_VERSION;
  } catch {
    cachedVersion = FALLBACK_VERSION;
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
