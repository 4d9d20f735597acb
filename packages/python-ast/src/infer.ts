/**
 * InferenceEngine - what an expression evaluates to, without running it.
 *
 * Values are inferred from the binding that reaches a name (see
 * Program.selectDefinition), from class bodies and instance attribute
 * assignments, and from the builtin table. Annotations are not read here:
 * an annotated parameter infers to nothing and the resolution core reads
 * the annotation itself.
 *
 * Recursion guard: a node that is already being inferred yields nothing.
 * Only results of top-level calls are cached, since nested results may
 * have been cut short by that guard.
 */
import type {
  PyNode,
  ExprNode,
  NameNode,
  CallNode,
  ClassDefNode,
  FunctionDefNode,
  AliasNode,
  Definition,
  ImportDefinition,
  ParameterDefinition,
  ExceptionDefinition,
  InferredValue,
  InferOptions,
  ClassValue,
  InstanceValue,
  FunctionValue,
  ModuleRecord,
  Scope,
  Logger,
} from '@demeter-lint/types';
import { walk } from './walk.js';
import { builtins, builtinMethodReturn, isBuiltinClass } from './builtins.js';
import {
  isClassMethod,
  isProperty,
  isStaticMethod,
  memberDefinition,
  instanceAttributes,
} from './classes.js';

/** What the engine needs from its host program */
export interface InferenceHost {
  scopeOf(node: PyNode): Scope;
  scopeFor(owner: ClassDefNode | FunctionDefNode): Scope | null;
  lookup(scope: Scope, name: string): Definition[];
  selectDefinition(definitions: Definition[], at: PyNode): Definition | null;
  getModule(name: string): ModuleRecord | null;
  isKnownModule(name: string): boolean;
}

interface ClassMember {
  definition: Definition;
  owner: ClassValue;
}

const NUMERIC = new Set(['builtins.int', 'builtins.float', 'builtins.complex', 'builtins.bool']);

function instance(qname: string, node: ClassDefNode | null = null): InstanceValue {
  return { kind: 'instance', qname, node };
}

function builtinClass(name: string): ClassValue {
  return { kind: 'class', qname: `builtins.${name}`, node: null };
}

function dedupe(values: InferredValue[]): InferredValue[] {
  const seen = new Set<string>();
  const result: InferredValue[] = [];
  for (const value of values) {
    const key = `${value.kind}:${value.qname}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}

export class InferenceEngine {
  private readonly cache = new Map<PyNode, InferredValue[]>();
  private readonly broadCache = new Map<PyNode, InferredValue[]>();
  private readonly mroCache = new Map<ClassDefNode | string, ClassValue[]>();
  private readonly inProgress = new Set<PyNode>();
  private depth = 0;

  constructor(
    private readonly host: InferenceHost,
    private readonly logger: Logger,
  ) {}

  clear(): void {
    this.cache.clear();
    this.broadCache.clear();
    this.mroCache.clear();
  }

  infer(node: PyNode, options: InferOptions = {}): InferredValue[] {
    const broad = options.broad ?? false;
    const cache = broad ? this.broadCache : this.cache;
    const cached = cache.get(node);
    if (cached) return cached;
    if (this.inProgress.has(node)) return [];

    this.inProgress.add(node);
    this.depth++;
    try {
      const result = dedupe(this.inferNode(node, broad));
      if (this.depth === 1) cache.set(node, result);
      return result;
    } finally {
      this.inProgress.delete(node);
      this.depth--;
    }
  }

  // ─── Node dispatch ─────────────────────────────────────────────────

  private inferNode(node: PyNode, broad: boolean): InferredValue[] {
    switch (node.kind) {
      case 'Name':
        return this.inferName(node, broad);
      case 'Attribute':
        return this.infer(node.value, { broad }).flatMap(value => this.attributeOf(value, node.attr, broad));
      case 'Call':
        return this.inferCall(node, broad);
      case 'Subscript':
        return this.infer(node.value, { broad }).flatMap((value): InferredValue[] => {
          if (value.kind === 'class' || value.kind === 'symbol') return [value];
          if (value.kind === 'instance' && (value.qname === 'builtins.str' || value.qname === 'builtins.bytes')) {
            return [value];
          }
          return [];
        });
      case 'Constant':
        switch (node.type) {
          case 'None':
            return [instance('builtins.NoneType')];
          case 'Ellipsis':
            return [instance('builtins.ellipsis')];
          default:
            return [instance(`builtins.${node.type}`)];
        }
      case 'List':
        return [instance('builtins.list')];
      case 'Tuple':
        return [instance('builtins.tuple')];
      case 'Set':
        return [instance('builtins.set')];
      case 'Dict':
        return [instance('builtins.dict')];
      case 'Comprehension':
        return [instance(node.collection === 'generator' ? 'builtins.generator' : `builtins.${node.collection}`)];
      case 'Compare':
        return [instance('builtins.bool')];
      case 'UnaryOp':
        if (node.op === 'not') return [instance('builtins.bool')];
        return this.infer(node.operand, { broad }).filter(value => value.kind === 'instance' && NUMERIC.has(value.qname));
      case 'IfExp':
        return [...this.infer(node.body, { broad }), ...this.infer(node.orelse, { broad })];
      case 'NamedExpr':
        return this.infer(node.value, { broad });
      case 'Lambda':
        return [{ kind: 'function', qname: `${this.host.scopeOf(node).qname}.<lambda>`, node: null, boundTo: null }];
      case 'ClassDef':
        return [this.classValue(node)];
      case 'FunctionDef':
        return [this.functionValue(node)];
      case 'Arg': {
        const definition = this.host.lookup(this.host.scopeOf(node), node.name)
          .find((candidate): candidate is ParameterDefinition => candidate.kind === 'parameter' && candidate.node === node);
        return definition ? this.inferParameter(definition, broad) : [];
      }
      // Compound expressions are resolved operand by operand by the caller
      case 'BoolOp':
      case 'BinOp':
      case 'Await':
      case 'Yield':
      case 'Starred':
      case 'Slice':
      case 'Keyword':
      case 'Module':
      case 'Alias':
      case 'WithItem':
      case 'ExceptHandler':
      case 'ComprehensionFor':
      case 'Assign':
      case 'AnnAssign':
      case 'AugAssign':
      case 'Return':
      case 'ExprStmt':
      case 'Import':
      case 'ImportFrom':
      case 'If':
      case 'While':
      case 'For':
      case 'With':
      case 'Try':
      case 'Raise':
      case 'Match':
      case 'MatchCase':
      case 'Simple':
        return [];
      default: {
        const unreachable: never = node;
        throw new Error(`Unhandled node kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private inferName(node: NameNode, broad: boolean): InferredValue[] {
    const definitions = this.host.lookup(this.host.scopeOf(node), node.id);
    const definition = this.host.selectDefinition(definitions, node);
    return definition ? this.inferDefinition(definition, broad) : [];
  }

  // ─── Definitions ───────────────────────────────────────────────────

  inferDefinition(definition: Definition, broad = false): InferredValue[] {
    switch (definition.kind) {
      case 'assignment':
        if (definition.unpacked || !definition.value) return [];
        return this.infer(definition.value, { broad });
      case 'loop':
      case 'context':
      case 'capture':
        return [];
      case 'exception':
        return this.inferCaught(definition, broad);
      case 'parameter':
        return this.inferParameter(definition, broad);
      case 'import':
        return this.inferImport(definition, broad);
      case 'class':
        return [this.classValue(definition.node)];
      case 'function':
        return [this.functionValue(definition.node)];
      case 'builtin': {
        const table = builtins();
        if (table.classes.has(definition.name)) return [builtinClass(definition.name)];
        if (table.functions.has(definition.name)) {
          return [{ kind: 'function', qname: `builtins.${definition.name}`, node: null, boundTo: null }];
        }
        const constant = table.constants.get(definition.name);
        return constant ? [instance(constant)] : [];
      }
      default: {
        const unreachable: never = definition;
        throw new Error(`Unhandled definition kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private inferCaught(definition: ExceptionDefinition, broad: boolean): InferredValue[] {
    const type = definition.node.type;
    if (!type) return [instance('builtins.BaseException')];
    const types = type.kind === 'Tuple' ? type.elements : [type];
    return types.flatMap(expr => this.infer(expr, { broad }))
      .flatMap((value): InferredValue[] => (value.kind === 'class' ? [instance(value.qname, value.node)] : []));
  }

  private inferParameter(definition: ParameterDefinition, broad: boolean): InferredValue[] {
    const { owner, node: param } = definition;
    if (owner.kind === 'FunctionDef' && definition.index === 0 && param.variant === 'positional') {
      const outer = this.host.scopeOf(owner);
      if (outer.kind === 'class' && outer.node.kind === 'ClassDef' && !isStaticMethod(owner)) {
        const cls = this.classValue(outer.node);
        return isClassMethod(owner) || owner.name === '__new__' ? [cls] : [instance(cls.qname, cls.node)];
      }
    }
    if (param.variant === 'vararg') return [instance('builtins.tuple')];
    if (param.variant === 'kwarg') return [instance('builtins.dict')];
    if (param.annotation) return [];
    return param.default ? this.infer(param.default, { broad }) : [];
  }

  // ─── Imports and modules ───────────────────────────────────────────

  private readonly importsInProgress = new Set<AliasNode>();

  private inferImport(definition: ImportDefinition, broad: boolean): InferredValue[] {
    if (this.importsInProgress.has(definition.alias)) return [];
    this.importsInProgress.add(definition.alias);
    try {
      if (definition.isModuleImport) return this.moduleValue(definition.target);

      const record = this.host.getModule(definition.module);
      if (!record) {
        return this.host.isKnownModule(definition.module) ? [{ kind: 'symbol', qname: definition.target }] : [];
      }
      const member = this.moduleMember(record, definition.alias.name, broad);
      return member.length > 0 ? member : this.moduleValue(definition.target, false);
    } finally {
      this.importsInProgress.delete(definition.alias);
    }
  }

  private moduleValue(name: string, allowKnown = true): InferredValue[] {
    const record = this.host.getModule(name);
    if (record) return [{ kind: 'module', qname: record.name, file: record.file }];
    if (allowKnown && this.host.isKnownModule(name)) return [{ kind: 'module', qname: name, file: null }];
    return [];
  }

  private moduleMember(record: ModuleRecord, name: string, broad: boolean): InferredValue[] {
    const definitions = record.scope.bindings.get(name);
    if (!definitions || definitions.length === 0) return [];
    return this.inferDefinition(definitions[definitions.length - 1], broad);
  }

  // ─── Attributes ────────────────────────────────────────────────────

  private attributeOf(value: InferredValue, attr: string, broad: boolean): InferredValue[] {
    switch (value.kind) {
      case 'module': {
        const record = this.host.getModule(value.qname);
        if (!record) return [{ kind: 'symbol', qname: `${value.qname}.${attr}` }];
        const member = this.moduleMember(record, attr, broad);
        return member.length > 0 ? member : this.moduleValue(`${value.qname}.${attr}`, false);
      }
      case 'symbol':
        return [{ kind: 'symbol', qname: `${value.qname}.${attr}` }];
      case 'class': {
        const member = this.classMember(value, attr);
        return member ? this.memberValue(member, attr, null, broad) : [];
      }
      case 'instance': {
        const member = this.classMember({ kind: 'class', qname: value.qname, node: value.node }, attr);
        if (member) return this.memberValue(member, attr, value, broad);
        const assigned = this.instanceAttribute(value, attr, broad);
        if (assigned.length > 0) return assigned;
        if (builtinMethodReturn(value.qname, attr) !== undefined) {
          return [{ kind: 'function', qname: `${value.qname}.${attr}`, node: null, boundTo: value.qname }];
        }
        return [];
      }
      case 'function':
        return [];
      default: {
        const unreachable: never = value;
        throw new Error(`Unhandled value kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private memberValue(
    member: ClassMember,
    attr: string,
    receiver: InstanceValue | null,
    broad: boolean,
  ): InferredValue[] {
    const { definition, owner } = member;
    if (definition.kind === 'function') {
      const fn = definition.node;
      if (receiver && isProperty(fn)) return this.inferReturns(fn, broad);
      const bound = receiver && !isStaticMethod(fn) ? receiver.qname : null;
      return [{ kind: 'function', qname: `${owner.qname}.${attr}`, node: fn, boundTo: bound }];
    }
    return this.inferDefinition(definition, broad);
  }

  /** First member binding of `attr` along the MRO */
  classMember(cls: ClassValue, attr: string): ClassMember | null {
    for (const candidate of [cls, ...this.ancestors(cls)]) {
      if (!candidate.node) continue;
      const scope = this.host.scopeFor(candidate.node);
      const definition = memberDefinition(scope?.bindings.get(attr) ?? []);
      if (definition) return { definition, owner: candidate };
    }
    return null;
  }

  private instanceAttribute(value: InstanceValue, attr: string, broad: boolean): InferredValue[] {
    const cls: ClassValue = { kind: 'class', qname: value.qname, node: value.node };
    for (const candidate of [cls, ...this.ancestors(cls)]) {
      if (!candidate.node) continue;
      for (const assignment of instanceAttributes(candidate.node, attr)) {
        if (!assignment.value) continue;
        const inferred = this.infer(assignment.value, { broad });
        if (inferred.length > 0) return inferred;
      }
    }
    return [];
  }

  // ─── Calls ─────────────────────────────────────────────────────────

  private inferCall(node: CallNode, broad: boolean): InferredValue[] {
    const callee = node.func;
    if (callee.kind === 'Name' && callee.id === 'super') return [];

    return this.infer(callee, { broad }).flatMap((value): InferredValue[] => {
      switch (value.kind) {
        case 'class':
          if (value.qname === 'builtins.type' && node.args.length === 1) return [];
          return [instance(value.qname, value.node)];
        case 'function':
          if (value.node) return this.callResult(value.node, broad);
          return this.builtinCallResult(value, broad);
        case 'instance':
        case 'module':
        case 'symbol':
          return [];
        default: {
          const unreachable: never = value;
          throw new Error(`Unhandled value kind: ${JSON.stringify(unreachable)}`);
        }
      }
    });
  }

  private builtinCallResult(value: FunctionValue, broad: boolean): InferredValue[] {
    if (value.boundTo) {
      if (!broad) return [];
      const method = value.qname.slice(value.boundTo.length + 1);
      const returned = builtinMethodReturn(value.boundTo, method);
      return returned ? [instance(returned)] : [];
    }
    if (!value.qname.startsWith('builtins.')) return [];
    const returned = builtins().functions.get(value.qname.slice('builtins.'.length));
    return returned ? [instance(returned)] : [];
  }

  private callResult(fn: FunctionDefNode, broad: boolean): InferredValue[] {
    if (fn.isAsync) return [];
    return this.inferReturns(fn, broad);
  }

  /** Values of every `return` in the function's own body */
  private inferReturns(fn: FunctionDefNode, broad: boolean): InferredValue[] {
    const returns: (ExprNode | null)[] = [];
    let generator = false;
    let raises = false;
    for (const statement of fn.body) {
      walk(statement, node => {
        if (node.kind === 'FunctionDef' || node.kind === 'ClassDef' || node.kind === 'Lambda') return false;
        if (node.kind === 'Return') returns.push(node.value);
        if (node.kind === 'Yield') generator = true;
        if (node.kind === 'Raise') raises = true;
        return true;
      });
    }
    if (generator) return [instance('builtins.generator')];
    if (returns.length === 0) return raises ? [] : [instance('builtins.NoneType')];
    return returns.flatMap(value => (value ? this.infer(value, { broad }) : [instance('builtins.NoneType')]));
  }

  // ─── Classes ───────────────────────────────────────────────────────

  classValue(node: ClassDefNode): ClassValue {
    return { kind: 'class', qname: `${this.host.scopeOf(node).qname}.${node.name}`, node };
  }

  functionValue(node: FunctionDefNode): FunctionValue {
    return { kind: 'function', qname: `${this.host.scopeOf(node).qname}.${node.name}`, node, boundTo: null };
  }

  private basesOf(cls: ClassValue): ClassValue[] {
    if (!cls.node) {
      if (!cls.qname.startsWith('builtins.')) return [];
      const name = cls.qname.slice('builtins.'.length);
      return (builtins().classes.get(name) ?? []).map(builtinClass);
    }
    if (cls.node.bases.length === 0) return [builtinClass('object')];

    const bases: ClassValue[] = [];
    for (const base of cls.node.bases) {
      if (base.kind === 'Starred') continue;
      for (const value of this.infer(base)) {
        if (value.kind === 'class') bases.push(value);
        // Bases from modules that were never loaded are known by name only
        if (value.kind === 'symbol') bases.push({ kind: 'class', qname: value.qname, node: null });
      }
    }
    return bases;
  }

  /** C3 linearization without the class itself; `builtins.object` always closes it */
  ancestors(cls: ClassValue): ClassValue[] {
    const key = cls.node ?? cls.qname;
    const cached = this.mroCache.get(key);
    if (cached) return cached;
    const result = this.linearize(cls, new Set()).slice(1);
    if (cls.qname !== 'builtins.object' && !result.some(value => value.qname === 'builtins.object')) {
      result.push(builtinClass('object'));
    }
    this.mroCache.set(key, result);
    return result;
  }

  private linearize(cls: ClassValue, active: Set<string>): ClassValue[] {
    if (active.has(cls.qname)) {
      this.logger.debug('Cyclic class hierarchy', { class: cls.qname });
      return [cls];
    }
    active.add(cls.qname);
    const bases = this.basesOf(cls);
    const sequences = [...bases.map(base => this.linearize(base, active)), bases];
    active.delete(cls.qname);

    const merged = c3Merge(sequences);
    if (merged) return [cls, ...merged];

    this.logger.debug('Inconsistent MRO, using depth-first order', { class: cls.qname });
    const seen = new Set<string>([cls.qname]);
    const fallback: ClassValue[] = [cls];
    for (const sequence of sequences) {
      for (const value of sequence) {
        if (seen.has(value.qname)) continue;
        seen.add(value.qname);
        fallback.push(value);
      }
    }
    return fallback;
  }

  // ─── Class lookup by name ──────────────────────────────────────────

  /**
   * Class named by `qname`, looked up in `current` first, then by splitting
   * the name into a module part and a class path.
   */
  findClass(qname: string, current: ModuleRecord): ClassValue | null {
    if (qname.startsWith('builtins.')) {
      const name = qname.slice('builtins.'.length);
      return isBuiltinClass(name) ? builtinClass(name) : null;
    }
    if (qname.startsWith(`${current.name}.`)) {
      const local = this.classInScope(current.scope, qname.slice(current.name.length + 1).split('.'));
      if (local) return local;
    }
    const parts = qname.split('.');
    for (let split = parts.length - 1; split >= 1; split--) {
      const record = this.host.getModule(parts.slice(0, split).join('.'));
      if (!record) continue;
      const found = this.classInScope(record.scope, parts.slice(split));
      if (found) return found;
    }
    return null;
  }

  private classInScope(scope: Scope, path: string[]): ClassValue | null {
    const [head, ...rest] = path;
    const definitions = scope.bindings.get(head);
    if (!definitions || definitions.length === 0) return null;
    for (const value of this.inferDefinition(definitions[definitions.length - 1])) {
      if (value.kind === 'class') {
        if (rest.length === 0) return value;
        const inner = value.node ? this.host.scopeFor(value.node) : null;
        if (inner) return this.classInScope(inner, rest);
      }
      if (value.kind === 'module' && rest.length > 0) {
        const record = this.host.getModule(value.qname);
        if (record) return this.classInScope(record.scope, rest);
      }
    }
    return null;
  }
}

function c3Merge(sequences: ClassValue[][]): ClassValue[] | null {
  const pending = sequences.map(sequence => [...sequence]).filter(sequence => sequence.length > 0);
  const result: ClassValue[] = [];
  while (pending.length > 0) {
    const candidate = pending
      .map(sequence => sequence[0])
      .find(head => !pending.some(sequence => sequence.slice(1).some(value => value.qname === head.qname)));
    if (!candidate) return null;
    result.push(candidate);
    for (const sequence of pending) {
      if (sequence[0].qname === candidate.qname) sequence.shift();
    }
    for (let i = pending.length - 1; i >= 0; i--) {
      if (pending[i].length === 0) pending.splice(i, 1);
    }
  }
  return result;
}
