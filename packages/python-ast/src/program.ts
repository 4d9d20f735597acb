/**
 * Program - a set of parsed modules that can answer questions about each
 * other. Implements InferenceProvider for the resolution core.
 *
 * Modules are either added up front (the files being linted) or pulled in
 * on demand through a ModuleLoader (stubs, dependencies, sibling modules).
 */
import type {
  PyNode,
  ExprNode,
  ClassDefNode,
  FunctionDefNode,
  ScopeOwnerNode,
  Scope,
  Definition,
  InferenceProvider,
  InferOptions,
  InferredValue,
  ClassValue,
  ModuleRecord,
  ModuleOrigin,
  Logger,
} from '@demeter-lint/types';
import { SyntaxTree, lookupName } from './tree.js';
import { parseModule, parseExpression } from './parser.js';
import { InferenceEngine } from './infer.js';
import { PythonSyntaxError } from './errors.js';
import { walk } from './walk.js';

export interface ModuleSource {
  name: string;
  source: string;
  file?: string | null;
  isPackage?: boolean;
  origin?: ModuleOrigin;
}

/** Finds the source of a module by dotted name; null when there is none */
export type ModuleLoader = (name: string) => ModuleSource | null;

export interface ProgramOptions {
  loader?: ModuleLoader;
  /** Modules that exist without source (the standard library, usually) */
  isKnownModule?: (name: string) => boolean;
  logger?: Logger;
}

const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  trace: () => {},
};

export class Program implements InferenceProvider {
  private readonly records = new Map<string, ModuleRecord>();
  private readonly owners = new Map<PyNode, SyntaxTree>();
  private readonly missing = new Set<string>();
  private readonly loading = new Set<string>();
  private readonly expressions = new Map<PyNode, Map<string, ExprNode | null>>();
  private readonly engine: InferenceEngine;
  private readonly loader: ModuleLoader | null;
  private readonly knownModule: (name: string) => boolean;
  private readonly logger: Logger;

  constructor(options: ProgramOptions = {}) {
    this.loader = options.loader ?? null;
    this.knownModule = options.isKnownModule ?? (() => false);
    this.logger = options.logger ?? silentLogger;
    this.engine = new InferenceEngine(this, this.logger);
  }

  // ─── Modules ───────────────────────────────────────────────────────

  /**
   * Parse and register a module.
   * @throws PythonSyntaxError when the source does not parse
   */
  addModule(source: ModuleSource): ModuleRecord {
    if (this.records.has(source.name)) {
      throw new Error(`Module already registered: ${source.name}`);
    }
    const tree = new SyntaxTree(parseModule(source.source), {
      moduleName: source.name,
      file: source.file ?? null,
      isPackage: source.isPackage ?? false,
    });
    const record: ModuleRecord = {
      name: source.name,
      file: tree.file,
      isPackage: tree.isPackage,
      origin: source.origin ?? 'source',
      node: tree.module,
      scope: tree.moduleScope,
    };
    this.records.set(source.name, record);
    this.missing.delete(source.name);
    for (const node of tree.nodes()) this.owners.set(node, tree);
    this.engine.clear();
    return record;
  }

  getModule(name: string): ModuleRecord | null {
    const existing = this.records.get(name);
    if (existing) return existing;
    if (!this.loader || this.missing.has(name) || this.loading.has(name)) return null;

    this.loading.add(name);
    try {
      const source = this.loader(name);
      if (!source) {
        this.missing.add(name);
        return null;
      }
      return this.addModule({ ...source, name });
    } catch (error) {
      if (!(error instanceof PythonSyntaxError)) throw error;
      this.logger.warn('Skipping module that does not parse', { module: name, error: error.message });
      this.missing.add(name);
      return null;
    } finally {
      this.loading.delete(name);
    }
  }

  modules(): ModuleRecord[] {
    return [...this.records.values()];
  }

  isKnownModule(name: string): boolean {
    return this.knownModule(name);
  }

  // ─── Structure ─────────────────────────────────────────────────────

  private treeOf(node: PyNode): SyntaxTree {
    const tree = this.owners.get(node);
    if (!tree) throw new Error(`Node does not belong to this program: ${node.kind} at line ${node.line}`);
    return tree;
  }

  scopeOf(node: PyNode): Scope {
    const scope = this.treeOf(node).scopeOf(node);
    if (!scope) throw new Error(`Node has no scope: ${node.kind} at line ${node.line}`);
    return scope;
  }

  scopeFor(owner: ScopeOwnerNode): Scope | null {
    return this.owners.get(owner)?.scopeFor(owner) ?? null;
  }

  parentOf(node: PyNode): PyNode | null {
    return this.treeOf(node).parentOf(node);
  }

  moduleOf(node: PyNode): ModuleRecord {
    const tree = this.treeOf(node);
    const record = this.records.get(tree.moduleName);
    if (!record) throw new Error(`Module not registered: ${tree.moduleName}`);
    return record;
  }

  isWithin(node: PyNode, ancestor: PyNode): boolean {
    return this.treeOf(node).isWithin(node, ancestor);
  }

  // ─── Names ─────────────────────────────────────────────────────────

  lookup(scope: Scope, name: string): Definition[] {
    return lookupName(scope, name);
  }

  selectDefinition(definitions: Definition[], at: PyNode): Definition | null {
    if (definitions.length === 0) return null;
    const first = definitions[0];
    if (first.kind === 'builtin' || !first.scope) return first;

    // Position only matters when `at` runs in the binding's own scope
    // (comprehensions run inline with it); elsewhere the last binding wins.
    const bindingScope = first.scope;
    let scope: Scope | null = this.scopeOf(at);
    while (scope && scope !== bindingScope && scope.kind === 'comprehension') scope = scope.parent;
    if (scope !== bindingScope) return definitions[definitions.length - 1];

    let selected: Definition | null = null;
    for (const definition of definitions) {
      if (this.precedes(definition, at)) selected = definition;
    }
    return selected ?? definitions[definitions.length - 1];
  }

  private precedes(definition: Definition, at: PyNode): boolean {
    if (definition.kind === 'builtin') return true;
    const anchor = definition.node;
    if (this.owners.get(anchor) === this.owners.get(at) && this.isWithin(at, anchor)) {
      switch (definition.kind) {
        case 'loop':
          return definition.node.kind === 'For' ? !this.isWithin(at, definition.node.iter) : true;
        case 'exception':
        case 'capture':
        case 'class':
        case 'function':
        case 'parameter':
          return true;
        case 'assignment':
        case 'import':
        case 'context':
          return false;
        default: {
          const unreachable: never = definition;
          throw new Error(`Unhandled definition kind: ${JSON.stringify(unreachable)}`);
        }
      }
    }
    return anchor.line < at.line || (anchor.line === at.line && anchor.column < at.column);
  }

  // ─── Inference ─────────────────────────────────────────────────────

  infer(node: PyNode, options?: InferOptions): InferredValue[] {
    return this.engine.infer(node, options);
  }

  inferDefinition(definition: Definition, options: InferOptions = {}): InferredValue[] {
    return this.engine.inferDefinition(definition, options.broad ?? false);
  }

  ancestors(cls: ClassValue): ClassValue[] {
    return this.engine.ancestors(cls);
  }

  findClass(qname: string, context: PyNode): ClassValue | null {
    return this.engine.findClass(qname, this.moduleOf(context));
  }

  classValue(node: ClassDefNode): ClassValue {
    return this.engine.classValue(node);
  }

  enclosingClass(node: PyNode): ClassValue | null {
    let scope: Scope | null = this.scopeOf(node);
    while (scope) {
      if (scope.kind === 'class' && scope.node.kind === 'ClassDef') return this.engine.classValue(scope.node);
      scope = scope.parent;
    }
    return null;
  }

  /** Innermost `def` whose body contains `node` */
  enclosingFunction(node: PyNode): FunctionDefNode | null {
    let scope: Scope | null = this.scopeOf(node);
    while (scope) {
      if (scope.kind === 'function' && scope.node.kind === 'FunctionDef') return scope.node;
      scope = scope.parent;
    }
    return null;
  }

  parseExpression(source: string, context: PyNode): ExprNode | null {
    let cache = this.expressions.get(context);
    if (!cache) {
      cache = new Map();
      this.expressions.set(context, cache);
    }
    if (cache.has(source)) return cache.get(source) ?? null;

    let parsed: ExprNode | null = null;
    try {
      parsed = parseExpression(source);
    } catch (error) {
      if (!(error instanceof PythonSyntaxError)) throw error;
      this.logger.debug('Unparseable string annotation', { annotation: source, error: error.message });
    }
    if (parsed) {
      const tree = this.treeOf(context);
      tree.adopt(parsed, context);
      walk(parsed, node => {
        this.owners.set(node, tree);
      });
    }
    cache.set(source, parsed);
    return parsed;
  }

  clearInferenceCache(): void {
    this.engine.clear();
  }
}
