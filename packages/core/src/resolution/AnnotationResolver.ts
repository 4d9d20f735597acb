/**
 * AnnotationResolver - type-hint expression → QName.
 *
 * Understands bare and dotted names, subscripted generics, PEP 604 unions,
 * quoted forward references and `Self`. Optional/Union collapse to their
 * first member that is not None; nothing is merged.
 */
import type {
  ExprNode,
  NameNode,
  SubscriptNode,
  ClassValue,
  InferenceProvider,
  InferredValue,
  Logger,
  QName,
} from '@demeter-lint/types';
import { UNRESOLVED, resolvedQName } from '@demeter-lint/types';
import { instanceAttributes, isProperty, isPropertyAccessor } from '@demeter-lint/python-ast';
import { silentLogger } from '../logging/Logger.js';
import { ResolutionContext } from './ResolutionContext.js';
import { normalizeQName, NONE_QNAME } from './normalize.js';

const SELF_NAMES = new Set(['typing.Self']);
const UNION_FORMS = new Set(['typing.Union']);
const OPTIONAL_FORMS = new Set(['typing.Optional']);
/** Wrappers whose first argument is the real type */
const WRAPPER_FORMS = new Set([
  'typing.Annotated',
  'typing.ClassVar',
  'typing.Final',
  'typing.Required',
  'typing.NotRequired',
  'typing.ReadOnly',
]);

export class AnnotationResolver {
  constructor(
    private readonly provider: InferenceProvider,
    private readonly logger: Logger = silentLogger,
  ) {}

  resolveAnnotation(node: ExprNode, ctx: ResolutionContext = new ResolutionContext()): QName {
    const name = this.annotationName(node, ctx);
    return name ? resolvedQName(normalizeQName(name)) : UNRESOLVED;
  }

  /**
   * Declared type of `attr` on instances of `cls`: a class-body annotation,
   * a `@property` getter's return annotation, or a `self.attr: T` in a
   * method. Own body first, then ancestors in MRO order.
   */
  attributeType(cls: ClassValue, attr: string, ctx: ResolutionContext = new ResolutionContext()): QName {
    for (const candidate of this.lineage(cls)) {
      const node = candidate.node;
      if (!node) continue;

      for (const statement of node.body) {
        if (statement.kind === 'AnnAssign' && statement.target.kind === 'Name' && statement.target.id === attr) {
          const declared = this.resolveAnnotation(statement.annotation, ctx);
          if (declared.kind === 'resolved') return declared;
        }
        if (statement.kind === 'FunctionDef' && statement.name === attr && isProperty(statement) && statement.returns) {
          const returned = this.resolveAnnotation(statement.returns, ctx);
          if (returned.kind === 'resolved') return returned;
        }
      }

      for (const assignment of instanceAttributes(node, attr)) {
        if (!assignment.annotation) continue;
        const declared = this.resolveAnnotation(assignment.annotation, ctx);
        if (declared.kind === 'resolved') return declared;
      }
    }
    return UNRESOLVED;
  }

  /**
   * Return annotation of method `name` as seen from `cls` (last definition
   * in the first class of the MRO that defines it).
   */
  methodReturn(cls: ClassValue, name: string, ctx: ResolutionContext = new ResolutionContext()): QName {
    for (const candidate of this.lineage(cls)) {
      const node = candidate.node;
      if (!node) continue;
      const method = [...node.body].reverse().find(statement => statement.kind === 'FunctionDef'
        && statement.name === name
        && !isPropertyAccessor(statement));
      if (!method || method.kind !== 'FunctionDef') continue;
      return method.returns ? this.resolveAnnotation(method.returns, ctx) : UNRESOLVED;
    }
    return UNRESOLVED;
  }

  // ─── Annotation forms ──────────────────────────────────────────────

  /** Un-normalized qualified name an annotation denotes */
  private annotationName(node: ExprNode, ctx: ResolutionContext): string | null {
    return ctx.guard(node, null, () => this.annotationNameOf(node, ctx));
  }

  private annotationNameOf(node: ExprNode, ctx: ResolutionContext): string | null {
    switch (node.kind) {
      case 'Constant':
        if (node.type === 'None') return NONE_QNAME;
        if (node.type === 'str' && !node.formatted) return this.forwardReference(node.value, node, ctx);
        return null;
      case 'Name':
        return this.selfOr(this.nameQName(node, ctx), node);
      case 'Attribute': {
        const inferred = this.typeLikeValue(this.attempt(() => this.provider.infer(node), []));
        if (inferred) return this.selfOr(inferred, node);
        const head = this.annotationName(node.value, ctx);
        return head ? this.selfOr(`${head}.${node.attr}`, node) : null;
      }
      case 'Subscript':
        return this.subscriptName(node, ctx);
      case 'BinOp':
        if (node.op !== '|') return null;
        return this.firstNotNone(unionMembers(node), ctx);
      default:
        return null;
    }
  }

  private forwardReference(source: string, context: ExprNode, ctx: ResolutionContext): string | null {
    const parsed = this.attempt(() => this.provider.parseExpression(source, context), null);
    if (!parsed) {
      this.logger.debug('Forward reference did not parse', { annotation: source, line: context.line });
      return null;
    }
    return this.annotationName(parsed, ctx);
  }

  private subscriptName(node: SubscriptNode, ctx: ResolutionContext): string | null {
    const origin = this.annotationName(node.value, ctx);
    if (!origin) return null;
    const form = normalizeQName(origin);
    const args = node.slice.kind === 'Tuple' ? node.slice.elements : [node.slice];

    if (OPTIONAL_FORMS.has(form) || UNION_FORMS.has(form)) {
      return this.firstNotNone(args, ctx);
    }
    if (WRAPPER_FORMS.has(form)) {
      return args.length > 0 ? this.annotationName(args[0], ctx) : null;
    }
    if (form === 'typing.Literal') {
      const first = args[0];
      if (first?.kind === 'Constant') return first.type === 'None' ? NONE_QNAME : `builtins.${first.type}`;
      return null;
    }
    return origin;
  }

  private firstNotNone(members: ExprNode[], ctx: ResolutionContext): string | null {
    for (const member of members) {
      const name = this.annotationName(member, ctx);
      if (name && normalizeQName(name) !== NONE_QNAME) return name;
    }
    return null;
  }

  private nameQName(node: NameNode, ctx: ResolutionContext): string | null {
    const definition = this.attempt(
      () => this.provider.selectDefinition(this.provider.lookup(this.provider.scopeOf(node), node.id), node),
      null,
    );
    if (!definition) {
      return node.id === 'Self' ? 'typing.Self' : null;
    }

    switch (definition.kind) {
      case 'builtin':
        return `builtins.${definition.name}`;
      case 'class':
        return this.typeLikeValue(this.attempt(() => this.provider.infer(definition.node), []));
      case 'import':
        return this.typeLikeValue(this.attempt(() => this.provider.infer(node), [])) ?? definition.target;
      case 'assignment':
        // Type alias: `UserId = int`, `Handler = "Callable[[Event], None]"`
        return definition.value && !definition.unpacked ? this.annotationName(definition.value, ctx) : null;
      case 'function':
      case 'parameter':
      case 'loop':
      case 'context':
      case 'exception':
      case 'capture':
        return null;
      default: {
        const unreachable: never = definition;
        throw new Error(`Unhandled definition kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /** `Self` stands for the class whose scope encloses the annotation */
  private selfOr(name: string | null, node: ExprNode): string | null {
    if (!name || !SELF_NAMES.has(normalizeQName(name))) return name;
    const cls = this.attempt(() => this.provider.enclosingClass(node), null);
    return cls ? cls.qname : null;
  }

  private typeLikeValue(values: InferredValue[]): string | null {
    for (const value of values) {
      if (value.kind === 'class' || value.kind === 'symbol' || value.kind === 'module') return value.qname;
    }
    return null;
  }

  private lineage(cls: ClassValue): ClassValue[] {
    return [cls, ...this.attempt(() => this.provider.ancestors(cls), [])];
  }

  /** Provider faults count as "no answer" */
  private attempt<T>(query: () => T, fallback: T): T {
    try {
      return query();
    } catch (error) {
      this.logger.debug('Inference provider failed', { error: error instanceof Error ? error.message : String(error) });
      return fallback;
    }
  }
}

/** Members of `A | B | C`, left to right */
function unionMembers(node: ExprNode): ExprNode[] {
  if (node.kind === 'BinOp' && node.op === '|') {
    return [...unionMembers(node.left), ...unionMembers(node.right)];
  }
  return [node];
}
