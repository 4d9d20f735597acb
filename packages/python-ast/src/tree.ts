/**
 * SyntaxTree - a parsed module plus the lexical structure resolution needs:
 * parent links, the scope every node is evaluated in, and per-scope bindings.
 *
 * Scoping follows Python's LEGB rule. Class scopes are visible only to
 * code directly in the class body; functions, lambdas and comprehensions
 * nested in a class skip them. The first iterable of a comprehension is
 * evaluated in the enclosing scope.
 */
import type {
  PyNode,
  ExprNode,
  StmtNode,
  ModuleNode,
  ScopeOwnerNode,
  ClassDefNode,
  FunctionDefNode,
  LambdaNode,
  ComprehensionNode,
  ArgNode,
  NameNode,
  AssignNode,
  AnnAssignNode,
  NamedExprNode,
  ImportNode,
  ImportFromNode,
  Scope,
  ScopeKind,
  Definition,
  BuiltinDefinition,
} from '@demeter-lint/types';
import { parseModule } from './parser.js';
import { childNodes, walk } from './walk.js';
import { isBuiltinName } from './builtins.js';

export interface TreeOptions {
  /** Dotted module name; defaults to `__main__` */
  moduleName?: string;
  file?: string | null;
  /** Module is a package `__init__`, which changes relative import anchoring */
  isPackage?: boolean;
}

// ─── Scope creation ──────────────────────────────────────────────────

function createScope(kind: ScopeKind, node: ScopeOwnerNode, parent: Scope | null, qname: string): Scope {
  const scope: Scope = {
    kind,
    node,
    parent,
    qname,
    bindings: new Map(),
    globals: new Set(),
    nonlocals: new Set(),
    children: [],
  };
  parent?.children.push(scope);
  return scope;
}

/** `global`/`nonlocal` apply to the whole block, so collect them up front */
function collectDeclarations(body: StmtNode[], scope: Scope): void {
  for (const statement of body) {
    switch (statement.kind) {
      case 'Simple':
        if (statement.keyword === 'global') statement.names.forEach(name => scope.globals.add(name));
        if (statement.keyword === 'nonlocal') statement.names.forEach(name => scope.nonlocals.add(name));
        break;
      case 'If':
      case 'While':
      case 'For':
        collectDeclarations(statement.body, scope);
        collectDeclarations(statement.orelse, scope);
        break;
      case 'With':
        collectDeclarations(statement.body, scope);
        break;
      case 'Try':
        collectDeclarations(statement.body, scope);
        statement.handlers.forEach(handler => collectDeclarations(handler.body, scope));
        collectDeclarations(statement.orelse, scope);
        collectDeclarations(statement.finalbody, scope);
        break;
      case 'Match':
        statement.cases.forEach(arm => collectDeclarations(arm.body, scope));
        break;
      default:
        break;
    }
  }
}

/**
 * Absolute module a `from ... import` refers to.
 * `from ..a import b` inside `pkg.sub.mod` → `pkg.a`.
 */
export function resolveImportModule(
  moduleName: string,
  isPackage: boolean,
  level: number,
  module: string,
): string {
  if (level === 0) return module;
  const parts = moduleName.split('.');
  if (!isPackage) parts.pop();
  const drop = level - 1;
  if (drop > parts.length) return module;
  const base = parts.slice(0, parts.length - drop);
  if (module) base.push(module);
  return base.join('.');
}

// ─── Lookup ──────────────────────────────────────────────────────────

const builtinDefinitions = new Map<string, BuiltinDefinition>();

function builtinDefinition(name: string): BuiltinDefinition {
  let definition = builtinDefinitions.get(name);
  if (!definition) {
    definition = { kind: 'builtin', name, scope: null };
    builtinDefinitions.set(name, definition);
  }
  return definition;
}

function moduleScopeOf(scope: Scope): Scope {
  let current = scope;
  while (current.parent) current = current.parent;
  return current;
}

/**
 * LEGB lookup. Returns every definition of `name` in the innermost scope
 * that binds it, or the builtin definition, or nothing.
 */
export function lookupName(scope: Scope, name: string): Definition[] {
  let current: Scope | null = scope.globals.has(name) ? moduleScopeOf(scope) : scope;
  let innermost = true;
  while (current) {
    if (innermost || current.kind !== 'class') {
      const found = current.bindings.get(name);
      if (found && found.length > 0) return found;
    }
    innermost = false;
    current = current.parent;
  }
  return isBuiltinName(name) ? [builtinDefinition(name)] : [];
}

// ─── Tree ────────────────────────────────────────────────────────────

export class SyntaxTree {
  readonly module: ModuleNode;
  readonly moduleName: string;
  readonly file: string | null;
  readonly isPackage: boolean;
  readonly moduleScope: Scope;

  private readonly parents = new Map<PyNode, PyNode>();
  /** node → scope the node is evaluated in */
  private readonly evaluatedIn = new Map<PyNode, Scope>();
  /** scope owner → scope it opens */
  private readonly opened = new Map<ScopeOwnerNode, Scope>();

  constructor(module: ModuleNode, options: TreeOptions = {}) {
    this.module = module;
    this.moduleName = options.moduleName ?? '__main__';
    this.file = options.file ?? null;
    this.isPackage = options.isPackage ?? false;
    this.moduleScope = createScope('module', module, null, this.moduleName);
    this.opened.set(module, this.moduleScope);
    this.evaluatedIn.set(module, this.moduleScope);
    collectDeclarations(module.body, this.moduleScope);
    for (const statement of module.body) this.visit(statement, module, this.moduleScope);
  }

  parentOf(node: PyNode): PyNode | null {
    return this.parents.get(node) ?? null;
  }

  /** Scope the node is evaluated in; null for nodes of another tree */
  scopeOf(node: PyNode): Scope | null {
    return this.evaluatedIn.get(node) ?? null;
  }

  /** Scope opened by a module, class, function, lambda or comprehension */
  scopeFor(owner: ScopeOwnerNode): Scope | null {
    return this.opened.get(owner) ?? null;
  }

  contains(node: PyNode): boolean {
    return this.evaluatedIn.has(node);
  }

  /** True when `node` is `ancestor` or lies below it */
  isWithin(node: PyNode, ancestor: PyNode): boolean {
    let current: PyNode | null = node;
    while (current) {
      if (current === ancestor) return true;
      current = this.parentOf(current);
    }
    return false;
  }

  nodes(): IterableIterator<PyNode> {
    return this.evaluatedIn.keys();
  }

  /**
   * Attach an expression parsed out of band (a quoted annotation) so that
   * it evaluates in the scope of `parent`.
   */
  adopt(root: ExprNode, parent: PyNode): void {
    const scope = this.scopeOf(parent) ?? this.moduleScope;
    walk(root, (node, nodeParent) => {
      this.parents.set(node, nodeParent ?? parent);
      this.evaluatedIn.set(node, scope);
    });
  }

  // ─── Construction ──────────────────────────────────────────────────

  private record(node: PyNode, parent: PyNode, scope: Scope): void {
    this.parents.set(node, parent);
    this.evaluatedIn.set(node, scope);
  }

  private visit(node: PyNode, parent: PyNode, scope: Scope): void {
    this.record(node, parent, scope);

    switch (node.kind) {
      case 'ClassDef':
        this.visitClass(node, scope);
        return;
      case 'FunctionDef':
        this.visitFunction(node, scope);
        return;
      case 'Lambda':
        this.visitLambda(node, scope);
        return;
      case 'Comprehension':
        this.visitComprehension(node, scope);
        return;
      case 'Assign':
        for (const target of node.targets) this.bindAssignment(target, node, node.value, null, scope, false);
        break;
      case 'AnnAssign':
        if (node.target.kind === 'Name') {
          this.bindAssignment(node.target, node, node.value, node.annotation, scope, false);
        }
        break;
      case 'NamedExpr': {
        // PEP 572: binds in the nearest enclosing non-comprehension scope
        let target = scope;
        while (target.kind === 'comprehension' && target.parent) target = target.parent;
        this.bindAssignment(node.target, node, node.value, null, target, false);
        break;
      }
      case 'For': {
        const loop = node;
        for (const name of targetNames(loop.target)) {
          this.declare(scope, name.id, bound => ({ kind: 'loop', name: name.id, scope: bound, node: loop, target: name }));
        }
        break;
      }
      case 'WithItem': {
        const item = node;
        for (const name of item.target ? targetNames(item.target) : []) {
          this.declare(scope, name.id, bound => ({ kind: 'context', name: name.id, scope: bound, node: item, target: name }));
        }
        break;
      }
      case 'ExceptHandler': {
        const handler = node;
        const name = handler.name;
        if (name) this.declare(scope, name, bound => ({ kind: 'exception', name, scope: bound, node: handler }));
        break;
      }
      case 'MatchCase': {
        const arm = node;
        for (const name of arm.captures) {
          this.declare(scope, name.id, bound => ({ kind: 'capture', name: name.id, scope: bound, node: arm, target: name }));
        }
        break;
      }
      case 'Import':
        this.bindImport(node, scope);
        break;
      case 'ImportFrom':
        this.bindImportFrom(node, scope);
        break;
      default:
        break;
    }

    for (const child of childNodes(node)) this.visit(child, node, scope);
  }

  private declare(scope: Scope, name: string, make: (bound: Scope) => Definition): void {
    if (scope.nonlocals.has(name)) return;
    const bound = scope.globals.has(name) ? this.moduleScope : scope;
    const definitions = bound.bindings.get(name);
    if (definitions) definitions.push(make(bound));
    else bound.bindings.set(name, [make(bound)]);
  }

  private bindAssignment(
    target: ExprNode,
    node: AssignNode | AnnAssignNode | NamedExprNode,
    value: ExprNode | null,
    annotation: ExprNode | null,
    scope: Scope,
    unpacked: boolean,
  ): void {
    switch (target.kind) {
      case 'Name': {
        const name = target;
        this.declare(scope, name.id, bound => ({
          kind: 'assignment',
          name: name.id,
          scope: bound,
          node,
          target: name,
          value,
          annotation,
          unpacked,
        }));
        return;
      }
      case 'Tuple':
      case 'List':
        for (const element of target.elements) this.bindAssignment(element, node, value, null, scope, true);
        return;
      case 'Starred':
        this.bindAssignment(target.value, node, value, null, scope, true);
        return;
      default:
        return;
    }
  }

  private bindImport(node: ImportNode, scope: Scope): void {
    for (const alias of node.names) {
      const head = alias.name.split('.')[0];
      const name = alias.asname ?? head;
      const target = alias.asname ? alias.name : head;
      this.declare(scope, name, bound => ({
        kind: 'import',
        name,
        scope: bound,
        node,
        alias,
        target,
        module: target,
        isModuleImport: true,
      }));
    }
  }

  private bindImportFrom(node: ImportFromNode, scope: Scope): void {
    const module = resolveImportModule(this.moduleName, this.isPackage, node.level, node.module);
    for (const alias of node.names) {
      if (alias.name === '*') continue;
      const name = alias.asname ?? alias.name;
      this.declare(scope, name, bound => ({
        kind: 'import',
        name,
        scope: bound,
        node,
        alias,
        target: module ? `${module}.${alias.name}` : alias.name,
        module,
        isModuleImport: false,
      }));
    }
  }

  private visitClass(node: ClassDefNode, scope: Scope): void {
    for (const child of [...node.decorators, ...node.bases, ...node.keywords]) this.visit(child, node, scope);
    this.declare(scope, node.name, bound => ({ kind: 'class', name: node.name, scope: bound, node }));

    const classScope = createScope('class', node, scope, `${scope.qname}.${node.name}`);
    this.opened.set(node, classScope);
    collectDeclarations(node.body, classScope);
    for (const statement of node.body) this.visit(statement, node, classScope);
  }

  private visitFunction(node: FunctionDefNode, scope: Scope): void {
    for (const decorator of node.decorators) this.visit(decorator, node, scope);
    if (node.returns) this.visit(node.returns, node, scope);
    this.declare(scope, node.name, bound => ({ kind: 'function', name: node.name, scope: bound, node }));

    const functionScope = createScope('function', node, scope, `${scope.qname}.${node.name}`);
    this.opened.set(node, functionScope);
    this.visitParameters(node.params, node, scope, functionScope);
    collectDeclarations(node.body, functionScope);
    for (const statement of node.body) this.visit(statement, node, functionScope);
  }

  private visitLambda(node: LambdaNode, scope: Scope): void {
    const lambdaScope = createScope('lambda', node, scope, `${scope.qname}.<lambda>`);
    this.opened.set(node, lambdaScope);
    this.visitParameters(node.params, node, scope, lambdaScope);
    this.visit(node.body, node, lambdaScope);
  }

  private visitParameters(
    params: ArgNode[],
    owner: FunctionDefNode | LambdaNode,
    outer: Scope,
    inner: Scope,
  ): void {
    params.forEach((param, index) => {
      this.record(param, owner, inner);
      // Annotations and defaults are evaluated where the function is defined
      if (param.annotation) this.visit(param.annotation, param, outer);
      if (param.default) this.visit(param.default, param, outer);
      this.declare(inner, param.name, bound => ({
        kind: 'parameter',
        name: param.name,
        scope: bound,
        node: param,
        owner,
        index,
      }));
    });
  }

  private visitComprehension(node: ComprehensionNode, scope: Scope): void {
    const label = node.collection === 'generator' ? 'genexpr' : `${node.collection}comp`;
    const inner = createScope('comprehension', node, scope, `${scope.qname}.<${label}>`);
    this.opened.set(node, inner);

    node.generators.forEach((generator, index) => {
      this.record(generator, node, inner);
      this.visit(generator.iter, generator, index === 0 ? scope : inner);
      this.visit(generator.target, generator, inner);
      for (const name of targetNames(generator.target)) {
        this.declare(inner, name.id, bound => ({ kind: 'loop', name: name.id, scope: bound, node: generator, target: name }));
      }
      for (const condition of generator.conditions) this.visit(condition, generator, inner);
    });
    this.visit(node.element, node, inner);
    if (node.value) this.visit(node.value, node, inner);
  }
}

function targetNames(target: ExprNode): NameNode[] {
  switch (target.kind) {
    case 'Name':
      return [target];
    case 'Tuple':
    case 'List':
      return target.elements.flatMap(targetNames);
    case 'Starred':
      return targetNames(target.value);
    default:
      return [];
  }
}

export function parse(source: string, options: TreeOptions = {}): SyntaxTree {
  return new SyntaxTree(parseModule(source), options);
}
