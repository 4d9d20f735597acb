/**
 * DefaultProvenanceOracle - where a module or file comes from.
 *
 * Standard-library membership is a lookup in data/stdlib-modules.json
 * (top-level module names only). A file is an external dependency when it
 * lives outside the project root or under an installed-packages directory.
 */
import { readFileSync } from 'fs';
import { resolve, relative, isAbsolute, sep } from 'path';
import type { ProvenanceOracle } from '@demeter-lint/types';

const PACKAGE_DIRS = new Set(['site-packages', 'dist-packages']);

let stdlibModules: Set<string> | null = null;

function loadStdlibModules(): Set<string> {
  if (!stdlibModules) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../data/stdlib-modules.json', import.meta.url), 'utf-8'));
    if (typeof raw !== 'object' || raw === null || !('modules' in raw) || !Array.isArray(raw.modules)) {
      throw new Error('stdlib-modules.json: expected { "modules": string[] }');
    }
    stdlibModules = new Set(raw.modules.filter((name): name is string => typeof name === 'string'));
  }
  return stdlibModules;
}

export class DefaultProvenanceOracle implements ProvenanceOracle {
  private readonly projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = resolve(projectRoot);
  }

  /** Accepts dotted names; only the top-level segment is looked up */
  isStdlibModule(moduleName: string): boolean {
    const top = moduleName.split('.')[0];
    return top !== '' && loadStdlibModules().has(top);
  }

  isExternalDependency(filePath: string): boolean {
    if (!filePath) return false;
    const absolute = resolve(this.projectRoot, filePath);
    if (absolute.split(sep).some(segment => PACKAGE_DIRS.has(segment))) return true;
    const rel = relative(this.projectRoot, absolute);
    return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
  }
}
