/**
 * StructuralCouplingAnalyzer - Law of Demeter checks for one call at a time.
 *
 * Two findings, at most one per call:
 *
 * - chain: `a.b.c()`, `x.get().run()` - two or more hops from the terminal
 *   receiver. W9006, or W9019 when the receiver cannot be inferred because
 *   an external module has no stub.
 * - stranger: `obj.run()` where `obj` holds the result of a call on some
 *   other object (tracked in the caller's StrangerMap). W9006.
 *
 * Exclusions are checked before anything is emitted; the first that
 * matches wins.
 */
import type {
  PyNode,
  ExprNode,
  CallNode,
  NameNode,
  AssignNode,
  AnnAssignNode,
  FunctionDefNode,
  Definition,
  InferenceProvider,
  Logger,
  ProvenanceClass,
  ProvenanceOracle,
  StrangerMap,
  StubResolver,
  Violation,
  ViolationCode,
} from '@demeter-lint/types';
import { walk } from '@demeter-lint/python-ast';
import { silentLogger } from '../logging/Logger.js';
import type { QNameResolver } from '../resolution/QNameResolver.js';
import { ResolutionContext } from '../resolution/ResolutionContext.js';
import type { ProvenanceClassifier } from '../provenance/ProvenanceClassifier.js';
import { stubPath } from '../provenance/StubResolver.js';

export const MIN_CHAIN_LENGTH = 2;
export const MAX_SELF_CHAIN_LENGTH = 2;

const CHAIN_MESSAGE = 'Law of Demeter: Chain access (%s) exceeds one level. Create delegated method.';
const STUB_MESSAGE = 'Dependency %s is uninferable. Create %s so the linter can resolve its types.';

const MOCK_MARKERS = ['unittest.mock', 'pytest', 'MagicMock'];
const SELF_NAMES = new Set(['self', 'cls']);
/** Layers whose objects are plain data and may be navigated */
const DATA_LAYER_MARKERS = ['domain', 'dto'];

export interface CouplingPolicy {
  projectRoot: string;
  allowedLodRoots: readonly string[];
  allowedLodMethods: readonly string[];
  /** Module prefix → layer name */
  layerMap: Readonly<Record<string, string>>;
}

export interface CouplingCollaborators {
  resolver: QNameResolver;
  classifier: ProvenanceClassifier;
  oracle: ProvenanceOracle;
  stubs: StubResolver;
}

export interface StructuralCouplingAnalyzerOptions {
  logger?: Logger;
  /** Files whose calls are never reported */
  isTestFile?: (file: string) => boolean;
}

function formatMessage(template: string, args: readonly string[]): string {
  let index = 0;
  return template.replace(/%s/g, () => args[index++] ?? '');
}

export class StructuralCouplingAnalyzer {
  private readonly logger: Logger;
  private readonly isTestFile: (file: string) => boolean;
  private readonly resolver: QNameResolver;
  private readonly classifier: ProvenanceClassifier;
  private readonly oracle: ProvenanceOracle;
  private readonly stubs: StubResolver;

  constructor(
    private readonly provider: InferenceProvider,
    collaborators: CouplingCollaborators,
    private readonly policy: CouplingPolicy,
    options: StructuralCouplingAnalyzerOptions = {},
  ) {
    this.resolver = collaborators.resolver;
    this.classifier = collaborators.classifier;
    this.oracle = collaborators.oracle;
    this.stubs = collaborators.stubs;
    this.logger = options.logger ?? silentLogger;
    this.isTestFile = options.isTestFile ?? (() => false);
  }

  // ─── Stranger tracking ─────────────────────────────────────────────

  /**
   * Update `strangers` for the Name targets of an assignment. A name holds a
   * stranger when its value is a call that is not trusted, does not return
   * a primitive and is not made on a primitive receiver. Any other
   * assignment clears the mark.
   */
  recordAssign(assign: AssignNode | AnnAssignNode, strangers: StrangerMap): void {
    const targets = assign.kind === 'Assign' ? assign.targets : [assign.target];
    const names = targets.filter((target): target is NameNode => target.kind === 'Name');
    if (names.length === 0) return;

    const value = assign.value;
    const stranger = value !== null && value.kind === 'Call' && this.isStrangerCall(value);
    for (const name of names) {
      strangers.set(name.id, stranger);
    }
  }

  private isStrangerCall(call: CallNode): boolean {
    if (this.classifier.isTrustedAuthority(call)) return false;

    const returned = this.qnameOf(call);
    if (returned && this.classifier.isPrimitive(returned)) return false;

    if (call.func.kind === 'Attribute') {
      const receiver = this.qnameOf(call.func.value);
      if (receiver && this.classifier.isPrimitive(receiver)) return false;
    }
    return true;
  }

  // ─── Call check ────────────────────────────────────────────────────

  checkCall(call: CallNode, strangers: StrangerMap): Violation[] {
    if (this.inTestFile(call)) return [];

    const chained = this.checkChain(call);
    if (chained) return [chained];

    const stranger = this.checkStranger(call, strangers);
    return stranger ? [stranger] : [];
  }

  private checkChain(call: CallNode): Violation | null {
    if (call.func.kind !== 'Attribute') return null;

    const chain: string[] = [];
    let terminal: ExprNode = call.func;
    while (terminal.kind === 'Attribute' || terminal.kind === 'Call') {
      if (terminal.kind === 'Attribute') {
        chain.push(terminal.attr);
        terminal = terminal.value;
      } else {
        chain.push('()');
        terminal = terminal.func;
      }
    }

    if (chain.length < MIN_CHAIN_LENGTH) return null;
    if (this.isChainExcluded(call, chain, terminal)) return null;

    const dependency = this.uninferableDependency(terminal);
    if (dependency) {
      return this.violation('W9019', STUB_MESSAGE, [dependency, stubPath(dependency)], call, 'external');
    }

    const display = `${renderRoot(terminal)}.${[...chain].reverse().join('.')}`.replace(/\.\(\)/g, '()');
    return this.violation('W9006', CHAIN_MESSAGE, [display], call, this.provenanceOf(terminal));
  }

  private checkStranger(call: CallNode, strangers: StrangerMap): Violation | null {
    if (call.func.kind !== 'Attribute') return null;
    const receiver = call.func.value;
    if (receiver.kind !== 'Name' || !strangers.get(receiver.id)) return null;

    const qname = this.qnameOf(receiver);
    if (qname && this.classifier.isPrimitive(qname)) return null;
    if (this.isAssignedFromPrimitiveMethod(receiver)) return null;
    if (this.isAssignedFromContainerGet(receiver)) return null;
    if (this.isChainExcluded(call, [call.func.attr], receiver)) return null;

    return this.violation(
      'W9006',
      CHAIN_MESSAGE,
      [`${receiver.id}.${call.func.attr} (Stranger)`],
      call,
      this.provenanceOf(receiver),
    );
  }

  private violation(
    code: ViolationCode,
    template: string,
    messageArgs: string[],
    node: CallNode,
    provenance: ProvenanceClass,
  ): Violation {
    const file = this.attempt(() => this.provider.moduleOf(node).file, null);
    return Object.freeze({
      code,
      message: formatMessage(template, messageArgs),
      messageArgs: Object.freeze([...messageArgs]),
      locations: Object.freeze([{ file, line: node.line, column: node.column }]),
      node,
      provenance,
    });
  }

  // ─── Exclusion policy ──────────────────────────────────────────────

  private isChainExcluded(call: CallNode, chain: readonly string[], terminal: ExprNode): boolean {
    return this.excludedByEnvironmentOrTrust(call, terminal)
      || this.excludedByReceiver(call, chain, terminal)
      || this.isAllowedByInference(terminal);
  }

  /** Test code, overrides, trusted and protocol calls, fluent calls */
  private excludedByEnvironmentOrTrust(call: CallNode, terminal: ExprNode): boolean {
    if (this.inTestFile(call) || this.isMockInvolved(terminal)) return true;
    if (this.isOverridden(call)) return true;
    if (this.classifier.isTrustedAuthority(call)) return true;
    if (call.func.kind === 'Attribute' && call.func.value.kind === 'Call'
      && this.classifier.isProtocolCall(call.func.value)) {
      return true;
    }
    return this.classifier.isFluent(call);
  }

  /** Primitive receiver, safe source, self/cls, local construction, protocol */
  private excludedByReceiver(call: CallNode, chain: readonly string[], terminal: ExprNode): boolean {
    if (call.func.kind === 'Attribute') {
      const receiver = this.qnameOf(call.func.value);
      if (receiver && this.classifier.isPrimitive(receiver)) return true;
    }
    if (this.isSafeSource(terminal)) return true;
    if (terminal.kind === 'Name' && SELF_NAMES.has(terminal.id) && chain.length <= MAX_SELF_CHAIN_LENGTH) {
      return true;
    }
    if (this.isLocallyInstantiated(terminal)) return true;
    return this.classifier.isProtocol(terminal);
  }

  private inTestFile(node: PyNode): boolean {
    const file = this.attempt(() => this.provider.moduleOf(node).file, null);
    return file !== null && this.isTestFile(file);
  }

  /** The receiver's type, or the module its root name came from, is a mocking library */
  private isMockInvolved(node: ExprNode): boolean {
    const qname = this.qnameOf(node);
    if (qname !== null && MOCK_MARKERS.some(marker => qname.includes(marker))) return true;
    const origin = this.traceModule(node, new Set());
    return origin !== null && MOCK_MARKERS.some(marker => origin.includes(marker));
  }

  private isOverridden(call: CallNode): boolean {
    if (call.func.kind !== 'Attribute' || this.policy.allowedLodMethods.length === 0) return false;
    return this.attempt(() => this.provider.infer(call.func), [])
      .some(value => this.policy.allowedLodMethods.includes(value.qname));
  }

  private isSafeSource(receiver: ExprNode): boolean {
    const qname = this.qnameOf(receiver);
    if (qname && (this.classifier.isPrimitive(qname) || this.oracle.isStdlibModule(qname))) return true;

    // `os.environ.get(...)` with `os` imported (or not bound at all)
    if (receiver.kind === 'Name' && this.oracle.isStdlibModule(receiver.id)) {
      const definition = this.definitionOf(receiver);
      if (!definition || definition.kind === 'import' || definition.kind === 'builtin') return true;
    }

    for (const value of this.attempt(() => this.provider.infer(receiver), [])) {
      if (this.isAllowedModule(value.qname)) return true;
      const root = this.rootModuleOf(value.kind === 'class' || value.kind === 'instance' ? value.node : null);
      if (root && this.isAllowedModule(root)) return true;
    }
    return false;
  }

  private isAllowedModule(name: string): boolean {
    if (!name) return false;
    if (this.oracle.isStdlibModule(name)) return true;
    return this.policy.allowedLodRoots.some(root => name === root || name.startsWith(`${root}.`));
  }

  /** Bound by `x = SomeClass(...)` in this scope, on a line before the receiver */
  private isLocallyInstantiated(receiver: ExprNode): boolean {
    if (receiver.kind !== 'Name') return false;
    const scope = this.attempt(() => this.provider.scopeOf(receiver), null);
    if (!scope) return false;

    const definitions = this.attempt(() => this.provider.lookup(scope, receiver.id), []);
    return definitions.some(definition => {
      if (definition.kind !== 'assignment' || definition.scope !== scope) return false;
      if (definition.node.line >= receiver.line) return false;
      if (definition.node.kind !== 'Assign' || definition.unpacked) return false;
      const value = definition.node.value;
      if (value.kind !== 'Call') return false;
      return this.attempt(() => this.provider.infer(value.func), []).some(callee => callee.kind === 'class');
    });
  }

  /** Receiver type sits in a data layer or under an allowed root */
  private isAllowedByInference(receiver: ExprNode): boolean {
    const qname = this.qnameOf(receiver);
    if (!qname) return false;
    const layer = this.layerOf(qname);
    if (layer && DATA_LAYER_MARKERS.some(marker => layer.toLowerCase().includes(marker))) return true;
    return this.policy.allowedLodRoots.some(root => qname === root || qname.startsWith(`${root}.`));
  }

  /** Longest configured prefix wins */
  layerOf(moduleName: string): string | null {
    let best: string | null = null;
    let bestLength = -1;
    for (const [prefix, layer] of Object.entries(this.policy.layerMap)) {
      if (moduleName.startsWith(prefix) && prefix.length > bestLength) {
        best = layer;
        bestLength = prefix.length;
      }
    }
    return best;
  }

  // ─── Primitive-origin stranger values ──────────────────────────────

  /**
   * `x = data.setdefault(...)` with `data` a primitive (or guarded by
   * `isinstance(data, dict)` earlier in the function).
   */
  private isAssignedFromPrimitiveMethod(variable: NameNode): boolean {
    const fn = this.enclosingFunction(variable);
    if (!fn) return false;

    const assign = this.firstAssignment(fn, variable.id);
    if (!assign) return false;
    const value = assign.value;
    if (value.kind !== 'Call' || value.func.kind !== 'Attribute') return false;

    const receiver = value.func.value;
    const receiverQName = this.qnameOf(receiver);
    if (receiverQName && this.classifier.isPrimitive(receiverQName)) return true;
    return receiver.kind === 'Name' && this.hasIsinstanceGuard(fn, receiver.id, assign.line);
  }

  /** `x = registry.get(...)` with `registry` being `self` or built locally */
  private isAssignedFromContainerGet(variable: NameNode): boolean {
    const fn = this.enclosingFunction(variable);
    const assign = fn ? this.firstAssignment(fn, variable.id) : null;
    if (!assign) return false;
    const value = assign.value;
    if (value.kind !== 'Call' || value.func.kind !== 'Attribute' || value.func.attr !== 'get') return false;

    const container = value.func.value;
    if (container.kind !== 'Name') return false;
    return SELF_NAMES.has(container.id) || this.isLocallyInstantiated(container);
  }

  private enclosingFunction(node: PyNode): FunctionDefNode | null {
    let scope = this.attempt(() => this.provider.scopeOf(node), null);
    while (scope) {
      if (scope.kind === 'function' && scope.node.kind === 'FunctionDef') return scope.node;
      if (scope.kind !== 'comprehension') return null;
      scope = scope.parent;
    }
    return null;
  }

  /** First `name = ...` in the function's own body, in source order */
  private firstAssignment(fn: FunctionDefNode, name: string): AssignNode | null {
    const assignments = ownStatements(fn).filter((node): node is AssignNode => node.kind === 'Assign'
      && node.targets.some(target => target.kind === 'Name' && target.id === name));
    return assignments[0] ?? null;
  }

  private hasIsinstanceGuard(fn: FunctionDefNode, name: string, beforeLine: number): boolean {
    return ownStatements(fn).some(node => {
      if (node.kind !== 'If' || node.line >= beforeLine) return false;
      const test = node.test.kind === 'UnaryOp' && node.test.op === 'not' ? node.test.operand : node.test;
      return test.kind === 'Call' && this.isPrimitiveIsinstance(test, name);
    });
  }

  private isPrimitiveIsinstance(test: CallNode, name: string): boolean {
    const callees = this.attempt(() => this.provider.infer(test.func), []);
    if (!callees.some(callee => callee.qname === 'builtins.isinstance')) return false;
    const [subject, type] = test.args;
    if (!subject || !type || subject.kind !== 'Name' || subject.id !== name) return false;
    return this.attempt(() => this.provider.infer(type), [])
      .some(value => this.classifier.isPrimitive(value.qname));
  }

  // ─── Missing stubs ─────────────────────────────────────────────────

  /**
   * External module behind an uninferable receiver that has no stub, or
   * null. Receivers whose type the linter can locate, and receivers traced
   * to the standard library or the project itself, never qualify.
   */
  private uninferableDependency(receiver: ExprNode): string | null {
    const qname = this.qnameOf(receiver);
    if (qname && this.isLocatable(qname, receiver)) return null;

    const moduleName = this.traceModule(receiver, new Set());
    if (!moduleName || this.oracle.isStdlibModule(moduleName)) return null;

    if (this.isProjectOrStubbed(moduleName) || this.isProjectOrStubbed(moduleName.split('.')[0])) return null;
    if (this.stubs.hasStub(moduleName, this.policy.projectRoot)) return null;

    this.logger.debug('Uninferable receiver from external module', { module: moduleName, line: receiver.line });
    return moduleName;
  }

  private isProjectOrStubbed(moduleName: string): boolean {
    const module = this.attempt(() => this.provider.getModule(moduleName), null);
    if (!module) return false;
    if (module.origin === 'stub') return true;
    return module.origin === 'source' && !(module.file && this.oracle.isExternalDependency(module.file));
  }

  private isLocatable(qname: string, context: PyNode): boolean {
    if (this.classifier.isPrimitive(qname) || this.oracle.isStdlibModule(qname)) return true;
    const cls = this.attempt(() => this.provider.findClass(qname, context), null);
    if (cls?.node) return true;
    return this.attempt(() => this.provider.getModule(qname), null) !== null;
  }

  /** Module the receiver's root name was imported from, following assignments and annotations */
  private traceModule(node: ExprNode, visited: Set<PyNode>): string | null {
    if (visited.has(node)) return null;
    visited.add(node);

    switch (node.kind) {
      case 'Attribute':
      case 'Subscript':
      case 'Starred':
      case 'Await':
        return this.traceModule(node.value, visited);
      case 'Call':
        return this.traceModule(node.func, visited);
      case 'Name':
        return this.traceDefinition(this.definitionOf(node), visited);
      default:
        return null;
    }
  }

  private traceDefinition(definition: Definition | null, visited: Set<PyNode>): string | null {
    if (!definition) return null;
    switch (definition.kind) {
      case 'import':
        return definition.isModuleImport ? definition.target : definition.module;
      case 'parameter': {
        const { annotation, default: fallback } = definition.node;
        if (annotation) return this.traceAnnotation(annotation, visited);
        return fallback ? this.traceModule(fallback, visited) : null;
      }
      case 'assignment':
        if (definition.annotation) return this.traceAnnotation(definition.annotation, visited);
        return definition.value && !definition.unpacked ? this.traceModule(definition.value, visited) : null;
      case 'context':
        return this.traceModule(definition.node.context, visited);
      case 'loop':
        return this.traceModule(definition.node.iter, visited);
      case 'class':
      case 'function':
      case 'exception':
      case 'capture':
      case 'builtin':
        return null;
      default: {
        const unreachable: never = definition;
        throw new Error(`Unhandled definition kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private traceAnnotation(annotation: ExprNode, visited: Set<PyNode>): string | null {
    switch (annotation.kind) {
      case 'Constant': {
        if (annotation.type !== 'str' || annotation.formatted) return null;
        const parsed = this.attempt(() => this.provider.parseExpression(annotation.value, annotation), null);
        return parsed ? this.traceAnnotation(parsed, visited) : null;
      }
      case 'Subscript':
        return this.traceAnnotation(annotation.value, visited);
      case 'BinOp':
        return this.traceAnnotation(annotation.left, visited) ?? this.traceAnnotation(annotation.right, visited);
      default:
        return this.traceModule(annotation, visited);
    }
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  private qnameOf(node: ExprNode): string | null {
    const resolved = this.resolver.resolve(node, new ResolutionContext());
    return resolved.kind === 'resolved' ? resolved.name : null;
  }

  private provenanceOf(node: ExprNode): ProvenanceClass {
    return this.classifier.classify(this.resolver.resolve(node, new ResolutionContext()), node);
  }

  private definitionOf(node: NameNode): Definition | null {
    return this.attempt(
      () => this.provider.selectDefinition(this.provider.lookup(this.provider.scopeOf(node), node.id), node),
      null,
    );
  }

  private rootModuleOf(node: PyNode | null): string | null {
    if (!node) return null;
    return this.attempt(() => this.provider.moduleOf(node).name, null);
  }

  private attempt<T>(query: () => T, fallback: T): T {
    try {
      return query();
    } catch (error) {
      this.logger.debug('Inference provider failed', { error: error instanceof Error ? error.message : String(error) });
      return fallback;
    }
  }
}

/** Source-like text for the root of a chain; compound roots read `(...)` */
function renderRoot(node: ExprNode): string {
  switch (node.kind) {
    case 'Name':
      return node.id;
    case 'Subscript':
      return `${renderRoot(node.value)}[...]`;
    default:
      return '(...)';
  }
}

/** Nodes of a function body in pre-order, without nested functions, classes or lambdas */
function ownStatements(fn: FunctionDefNode): PyNode[] {
  const nodes: PyNode[] = [];
  for (const statement of fn.body) {
    walk(statement, node => {
      if (node.kind === 'FunctionDef' || node.kind === 'ClassDef' || node.kind === 'Lambda') return false;
      nodes.push(node);
      return true;
    });
  }
  return nodes;
}
