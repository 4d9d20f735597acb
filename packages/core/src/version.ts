/**
 * demeter-lint version constants.
 *
 * Reads the version from the core package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  throw new Error('core package.json has no version');
}

/** Full version string (e.g., "0.3.0-beta") */
export const LINTER_VERSION: string = readVersion(pkg);
