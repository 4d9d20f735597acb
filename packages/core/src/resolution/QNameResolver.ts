/**
 * QNameResolver - expression node → qualified name of the type it produces.
 *
 * Strategies run in a fixed order and the first one that answers wins:
 *
 * ```
 * 1. explicit annotation     (annotated parameter, AnnAssign value/target)
 * 2. direct inference        provider.infer(node)
 * 3. call-specific           constructor, return annotation, cast, getattr default
 * 4. attribute               declared attribute along the MRO, then native overrides
 * 5. compound                BoolOp / BinOp (final either way)
 * 6. name                    the binding that reaches the name
 * 7. broad inference         builtin-method return table
 * 8. UNRESOLVED
 * ```
 *
 * Never throws. Provider faults are logged at debug and count as "no answer".
 */
import type {
  PyNode,
  CallNode,
  AttributeNode,
  NameNode,
  BoolOpNode,
  BinOpNode,
  Definition,
  InferenceProvider,
  InferredValue,
  Logger,
  QName,
} from '@demeter-lint/types';
import { UNRESOLVED, resolvedQName } from '@demeter-lint/types';
import { silentLogger } from '../logging/Logger.js';
import { AnnotationResolver } from './AnnotationResolver.js';
import { ResolutionContext } from './ResolutionContext.js';
import { normalizeQName, NONE_QNAME } from './normalize.js';
import { nativeAttributeType } from './nativeAttributes.js';

export interface QNameResolverOptions {
  logger?: Logger;
  /** Shared annotation resolver; one is created when omitted */
  annotations?: AnnotationResolver;
}

const CAST_QNAMES = new Set(['typing.cast']);
const NUMERIC_WIDENING = new Set(['builtins.int', 'builtins.float']);

export class QNameResolver {
  private readonly logger: Logger;
  readonly annotations: AnnotationResolver;

  constructor(
    private readonly provider: InferenceProvider,
    options: QNameResolverOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.annotations = options.annotations ?? new AnnotationResolver(provider, this.logger);
  }

  resolve(node: PyNode, ctx: ResolutionContext = new ResolutionContext()): QName {
    return ctx.guard(node, UNRESOLVED, () => this.resolveNode(node, ctx));
  }

  private resolveNode(node: PyNode, ctx: ResolutionContext): QName {
    const annotated = this.fromAnnotation(node, ctx);
    if (annotated.kind === 'resolved') return annotated;

    const inferred = this.fromValues(this.attempt(() => this.provider.infer(node), []));
    if (inferred.kind === 'resolved') return inferred;

    switch (node.kind) {
      case 'Call': {
        const result = this.fromCall(node, ctx);
        if (result.kind === 'resolved') return result;
        break;
      }
      case 'Attribute': {
        const result = this.fromAttribute(node, ctx);
        if (result.kind === 'resolved') return result;
        break;
      }
      case 'BoolOp':
        return this.fromBoolOp(node, ctx);
      case 'BinOp':
        return this.fromBinOp(node, ctx);
      case 'Name': {
        const result = this.fromName(node, ctx);
        if (result.kind === 'resolved') return result;
        break;
      }
      default:
        break;
    }

    return this.fromValues(this.attempt(() => this.provider.infer(node, { broad: true }), []));
  }

  // ─── 1. Explicit annotation ────────────────────────────────────────

  private fromAnnotation(node: PyNode, ctx: ResolutionContext): QName {
    if (node.kind === 'Arg') {
      return node.annotation ? this.annotations.resolveAnnotation(node.annotation, ctx) : UNRESOLVED;
    }
    const parent = this.attempt(() => this.provider.parentOf(node), null);
    if (parent?.kind === 'AnnAssign' && (parent.value === node || parent.target === node)) {
      return this.annotations.resolveAnnotation(parent.annotation, ctx);
    }
    return UNRESOLVED;
  }

  // ─── 2 / 7. Inference ──────────────────────────────────────────────

  /** First candidate that is not None; None only when nothing else was inferred */
  private fromValues(values: InferredValue[]): QName {
    let sawNone = false;
    for (const value of values) {
      const name = normalizeQName(value.qname);
      if (name === NONE_QNAME) {
        sawNone = true;
        continue;
      }
      return resolvedQName(name);
    }
    return sawNone ? resolvedQName(NONE_QNAME) : UNRESOLVED;
  }

  // ─── 3. Calls ──────────────────────────────────────────────────────

  private fromCall(node: CallNode, ctx: ResolutionContext): QName {
    const callees = this.attempt(() => this.provider.infer(node.func), []);

    for (const callee of callees) {
      const name = normalizeQName(callee.qname);
      if (callee.kind === 'class') return resolvedQName(name);
      if (CAST_QNAMES.has(name)) {
        const target = node.args[0];
        return target ? this.annotations.resolveAnnotation(target, ctx) : UNRESOLVED;
      }
      if (name === 'builtins.getattr') {
        const fallback = node.args[2];
        return node.args.length === 3 && fallback ? this.resolve(fallback, ctx) : UNRESOLVED;
      }
      if (callee.kind === 'function' && callee.node?.returns) {
        const returned = this.annotations.resolveAnnotation(callee.node.returns, ctx);
        if (returned.kind === 'resolved') return returned;
      }
    }

    if (node.func.kind !== 'Attribute') return UNRESOLVED;
    const method = node.func.attr;
    const receiver = this.resolve(node.func.value, ctx);
    if (receiver.kind !== 'resolved') return UNRESOLVED;
    const cls = this.attempt(() => this.provider.findClass(receiver.name, node), null);
    return cls ? this.annotations.methodReturn(cls, method, ctx) : UNRESOLVED;
  }

  // ─── 4. Attributes ─────────────────────────────────────────────────

  private fromAttribute(node: AttributeNode, ctx: ResolutionContext): QName {
    const receiver = this.resolve(node.value, ctx);
    if (receiver.kind !== 'resolved') return UNRESOLVED;

    const cls = this.attempt(() => this.provider.findClass(receiver.name, node), null);
    if (cls) {
      const declared = this.annotations.attributeType(cls, node.attr, ctx);
      if (declared.kind === 'resolved') return declared;
    }

    const lineage = cls
      ? [cls.qname, ...this.attempt(() => this.provider.ancestors(cls), []).map(ancestor => ancestor.qname)]
      : [receiver.name, 'builtins.object'];
    const native = nativeAttributeType(lineage, node.attr);
    return native ? resolvedQName(native) : UNRESOLVED;
  }

  // ─── 5. Compound expressions ───────────────────────────────────────

  private fromBoolOp(node: BoolOpNode, ctx: ResolutionContext): QName {
    const distinct = new Set<string>();
    for (const operand of node.values) {
      const resolved = this.resolve(operand, ctx);
      if (resolved.kind === 'resolved' && resolved.name !== NONE_QNAME) distinct.add(resolved.name);
    }
    if (distinct.size !== 1) return UNRESOLVED;
    const [only] = distinct;
    return resolvedQName(only);
  }

  private fromBinOp(node: BinOpNode, ctx: ResolutionContext): QName {
    const left = this.resolve(node.left, ctx);
    const right = this.resolve(node.right, ctx);
    if (left.kind !== 'resolved' || right.kind !== 'resolved') return UNRESOLVED;
    if (left.name === right.name) return left;
    if (NUMERIC_WIDENING.has(left.name) && NUMERIC_WIDENING.has(right.name)) {
      return resolvedQName('builtins.float');
    }
    return UNRESOLVED;
  }

  // ─── 6. Names ──────────────────────────────────────────────────────

  private fromName(node: NameNode, ctx: ResolutionContext): QName {
    const definition = this.attempt(
      () => this.provider.selectDefinition(this.provider.lookup(this.provider.scopeOf(node), node.id), node),
      null,
    );
    return definition ? this.fromDefinition(definition, ctx) : UNRESOLVED;
  }

  private fromDefinition(definition: Definition, ctx: ResolutionContext): QName {
    switch (definition.kind) {
      case 'assignment': {
        if (definition.annotation) {
          const declared = this.annotations.resolveAnnotation(definition.annotation, ctx);
          if (declared.kind === 'resolved') return declared;
        }
        return definition.value && !definition.unpacked ? this.resolve(definition.value, ctx) : UNRESOLVED;
      }
      case 'parameter': {
        const { annotation, default: fallback } = definition.node;
        if (annotation) {
          const declared = this.annotations.resolveAnnotation(annotation, ctx);
          if (declared.kind === 'resolved') return declared;
        }
        return fallback ? this.resolve(fallback, ctx) : UNRESOLVED;
      }
      case 'import':
        return resolvedQName(normalizeQName(definition.target));
      case 'class':
      case 'function':
        return this.fromValues(this.attempt(() => this.provider.infer(definition.node), []));
      case 'exception': {
        const type = definition.node.type;
        if (!type) return resolvedQName('builtins.BaseException');
        return type.kind === 'Tuple' ? UNRESOLVED : this.resolve(type, ctx);
      }
      case 'builtin':
        return resolvedQName(normalizeQName(definition.name));
      case 'capture': {
        // `case Point(...) as p` binds an instance of the class pattern
        const { alias, pattern } = definition.node;
        const isAlias = alias !== null && alias === definition.target;
        return isAlias && pattern.kind === 'Call' ? this.resolve(pattern.func, ctx) : UNRESOLVED;
      }
      case 'loop':
      case 'context':
        return UNRESOLVED;
      default: {
        const unreachable: never = definition;
        throw new Error(`Unhandled definition kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  private attempt<T>(query: () => T, fallback: T): T {
    try {
      return query();
    } catch (error) {
      this.logger.debug('Inference provider failed', { error: error instanceof Error ? error.message : String(error) });
      return fallback;
    }
  }
}
