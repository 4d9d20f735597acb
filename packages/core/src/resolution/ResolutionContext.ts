import type { PyNode } from '@demeter-lint/types';

/**
 * State of one top-level resolution call.
 *
 * Holds the nodes currently being resolved on the recursion path. A node
 * met again while it is still on the path is a cycle and gets the fallback
 * answer; a node revisited after its resolution finished (`x * x`, two
 * parameters sharing an alias) is resolved again normally.
 */
export class ResolutionContext {
  private readonly active = new Set<PyNode>();

  /** Run `resolve` with `node` on the path, or return `cyclic` if it already is */
  guard<T>(node: PyNode, cyclic: T, resolve: () => T): T {
    if (this.active.has(node)) return cyclic;
    this.active.add(node);
    try {
      return resolve();
    } finally {
      this.active.delete(node);
    }
  }
}
