/**
 * ProvenanceClassifier - which trust domain a type or a call belongs to.
 *
 * Every predicate asks its questions afresh (new ResolutionContext per
 * question, no memo). The inference cache inside the Program is the only
 * thing that persists between calls.
 */
import type {
  PyNode,
  CallNode,
  ClassValue,
  InferenceProvider,
  Logger,
  ModuleRecord,
  ProvenanceClass,
  ProvenanceOracle,
  QName,
} from '@demeter-lint/types';
import { silentLogger } from '../logging/Logger.js';
import type { QNameResolver } from '../resolution/QNameResolver.js';
import { ResolutionContext } from '../resolution/ResolutionContext.js';

/** Builtin base names that count as primitive wherever they appear */
const PRIMITIVE_BASE_NAMES = new Set([
  'str', 'int', 'float', 'list', 'dict', 'set', 'bool', 'bytes', 'tuple', 'NoneType', 'type',
]);

const PRIMITIVE_PREFIXES = ['builtins.', 'typing.', 'collections.abc.'];

const PROTOCOL_ROOTS = new Set(['typing.Protocol', 'typing_extensions.Protocol']);

export function isPrimitive(qname: string): boolean {
  if (!qname) return false;
  if (qname.includes('|')) {
    return qname.split('|').every(part => isPrimitive(part.trim()));
  }
  const base = qname.slice(qname.lastIndexOf('.') + 1);
  return PRIMITIVE_PREFIXES.some(prefix => qname.startsWith(prefix)) || PRIMITIVE_BASE_NAMES.has(base);
}

/** Protocol by name alone: `*.Protocol`, or anything under a `protocols` package */
export function isProtocolName(qname: string): boolean {
  return qname === 'Protocol'
    || qname.endsWith('.Protocol')
    || qname.toLowerCase().includes('.protocols.');
}

export interface ProvenanceClassifierOptions {
  logger?: Logger;
}

export class ProvenanceClassifier {
  private readonly logger: Logger;

  constructor(
    private readonly provider: InferenceProvider,
    private readonly resolver: QNameResolver,
    private readonly oracle: ProvenanceOracle,
    options: ProvenanceClassifierOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  isPrimitive(qname: string): boolean {
    return isPrimitive(qname);
  }

  /** Resolved QName of `node`, or null; one fresh context per question */
  qnameOf(node: PyNode): string | null {
    const resolved = this.resolver.resolve(node, new ResolutionContext());
    return resolved.kind === 'resolved' ? resolved.name : null;
  }

  // ─── Trusted authority ─────────────────────────────────────────────

  /**
   * The callee is a standard-library callable, the call chains from a
   * trusted call, or the receiver's type is stdlib, builtin or lives in an
   * external dependency.
   */
  isTrustedAuthority(call: CallNode): boolean {
    return this.trustedAuthority(call, new Set());
  }

  private trustedAuthority(call: CallNode, visited: Set<CallNode>): boolean {
    if (visited.has(call)) return false;
    visited.add(call);

    const callees = this.attempt(() => this.provider.infer(call.func), []);
    if (callees.some(callee => this.oracle.isStdlibModule(callee.qname))) return true;

    if (call.func.kind !== 'Attribute') return false;
    const receiver = call.func.value;
    if (receiver.kind === 'Call' && this.trustedAuthority(receiver, visited)) return true;

    const receiverQName = this.qnameOf(receiver);
    return receiverQName !== null && this.trustedReceiver(receiverQName, call);
  }

  private trustedReceiver(qname: string, context: PyNode): boolean {
    if (this.oracle.isStdlibModule(qname) || qname.startsWith('builtins.')) return true;
    const cls = this.attempt(() => this.provider.findClass(qname, context), null);
    const file = cls?.node ? this.fileOf(cls.node) : null;
    return file !== null && this.oracle.isExternalDependency(file);
  }

  // ─── Protocols ─────────────────────────────────────────────────────

  /**
   * A class that is or inherits from `typing.Protocol`, a QName that names
   * one, or an expression whose type does.
   */
  isProtocol(target: PyNode | string, context?: PyNode): boolean {
    if (typeof target === 'string') return this.isProtocolQName(target, context ?? null);
    if (target.kind === 'ClassDef') {
      const cls = this.attempt(() => this.provider.infer(target), []).find(value => value.kind === 'class');
      return cls?.kind === 'class' && this.isProtocolClass(cls);
    }

    const qname = this.qnameOf(target);
    if (qname && this.isProtocolQName(qname, target)) return true;
    return this.attempt(() => this.provider.infer(target), [])
      .some(value => value.kind === 'class' && this.isProtocolClass(value));
  }

  private isProtocolQName(qname: string, context: PyNode | null): boolean {
    if (isProtocolName(qname)) return true;
    if (!context) return false;
    const cls = this.attempt(() => this.provider.findClass(qname, context), null);
    return cls !== null && this.isProtocolClass(cls);
  }

  private isProtocolClass(cls: ClassValue): boolean {
    if (isProtocolName(cls.qname)) return true;
    return this.attempt(() => this.provider.ancestors(cls), [])
      .some(ancestor => PROTOCOL_ROOTS.has(ancestor.qname));
  }

  /** The method is declared on a protocol class, or the receiver is (or came from) one */
  isProtocolCall(call: CallNode): boolean {
    return this.protocolCall(call, new Set());
  }

  private protocolCall(call: CallNode, visited: Set<CallNode>): boolean {
    if (visited.has(call)) return false;
    visited.add(call);

    for (const callee of this.attempt(() => this.provider.infer(call.func), [])) {
      if (callee.kind !== 'function' || !callee.node) continue;
      const method = callee.node;
      const owner = this.attempt(() => this.provider.enclosingClass(method), null);
      if (owner && this.isProtocolClass(owner)) return true;
    }

    if (call.func.kind !== 'Attribute') return false;
    const receiver = call.func.value;
    if (receiver.kind === 'Call' && this.protocolCall(receiver, visited)) return true;

    const receiverQName = this.qnameOf(receiver);
    return receiverQName !== null && this.isProtocolQName(receiverQName, call);
  }

  // ─── Fluent interfaces ─────────────────────────────────────────────

  /** The call returns its receiver's type (or continues a fluent chain) */
  isFluent(call: CallNode): boolean {
    if (call.func.kind !== 'Attribute') return false;
    const receiver = call.func.value;
    if (receiver.kind === 'Call' && this.isFluent(receiver)) return true;

    const receiverQName = this.qnameOf(receiver);
    const returnQName = this.qnameOf(call);
    if (!receiverQName || !returnQName) return false;
    if (receiverQName === returnQName) return true;

    const receiverBase = receiverQName.slice(receiverQName.lastIndexOf('.') + 1);
    const returnBase = returnQName.slice(returnQName.lastIndexOf('.') + 1);
    return receiverBase === returnBase && receiverBase !== 'NoneType';
  }

  // ─── Classification ────────────────────────────────────────────────

  classify(qname: QName, context: PyNode): ProvenanceClass {
    if (qname.kind !== 'resolved') return 'unknown';
    const name = qname.name;
    if (isPrimitive(name)) return 'primitive';
    if (this.isProtocolQName(name, context)) return 'protocol';
    if (this.oracle.isStdlibModule(name)) return 'stdlib';

    const cls = this.attempt(() => this.provider.findClass(name, context), null);
    if (cls?.node) return this.originOf(cls.node);

    const module = this.owningModule(name);
    if (!module) return 'unknown';
    if (module.origin !== 'source' || (module.file && this.oracle.isExternalDependency(module.file))) {
      return 'external';
    }
    return 'local';
  }

  /** Provenance of a call's receiver, or `fluent` for a fluent call */
  classifyCall(call: CallNode): ProvenanceClass {
    if (this.isFluent(call)) return 'fluent';
    const target = call.func.kind === 'Attribute' ? call.func.value : call.func;
    return this.classify(this.resolver.resolve(target, new ResolutionContext()), target);
  }

  private originOf(node: PyNode): ProvenanceClass {
    const module = this.attempt(() => this.provider.moduleOf(node), null);
    if (!module) return 'unknown';
    if (module.origin !== 'source') return 'external';
    return module.file && this.oracle.isExternalDependency(module.file) ? 'external' : 'local';
  }

  /** Longest dotted prefix of `qname` that names a loadable module */
  private owningModule(qname: string): ModuleRecord | null {
    const parts = qname.split('.');
    for (let end = parts.length; end >= 1; end--) {
      const module = this.attempt(() => this.provider.getModule(parts.slice(0, end).join('.')), null);
      if (module) return module;
    }
    return null;
  }

  private fileOf(node: PyNode): string | null {
    return this.attempt(() => this.provider.moduleOf(node).file, null);
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
