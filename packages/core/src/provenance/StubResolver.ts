import { existsSync } from 'fs';
import { join } from 'path';
import type { StubResolver } from '@demeter-lint/types';

export const STUBS_DIR = 'stubs';

/** `stubs/a/b.pyi` for module `a.b`, relative to the project root */
export function stubPath(moduleName: string): string {
  return `${STUBS_DIR}/${moduleName.split('.').join('/')}.pyi`;
}

/**
 * Stub lookup on disk: `stubs/<a/b>.pyi` or `stubs/<a/b>/__init__.pyi`
 * under the project root.
 */
export class FileStubResolver implements StubResolver {
  hasStub(moduleName: string, projectRoot: string): boolean {
    const parts = moduleName.split('.');
    return existsSync(join(projectRoot, STUBS_DIR, ...parts) + '.pyi')
      || existsSync(join(projectRoot, STUBS_DIR, ...parts, '__init__.pyi'));
  }
}
