/**
 * Class-body helpers shared by inference and the resolution core.
 */
import type {
  ExprNode,
  FunctionDefNode,
  ClassDefNode,
  AssignNode,
  AnnAssignNode,
  Definition,
} from '@demeter-lint/types';
import { walk } from './walk.js';

/** Terminal identifier of a decorator: `functools.cached_property` → `cached_property` */
export function decoratorName(decorator: ExprNode): string | null {
  switch (decorator.kind) {
    case 'Name':
      return decorator.id;
    case 'Attribute':
      return decorator.attr;
    case 'Call':
      return decoratorName(decorator.func);
    default:
      return null;
  }
}

export function hasDecorator(fn: FunctionDefNode, ...names: string[]): boolean {
  return fn.decorators.some(decorator => {
    const name = decoratorName(decorator);
    return name !== null && names.includes(name);
  });
}

export function isProperty(fn: FunctionDefNode): boolean {
  return hasDecorator(fn, 'property', 'cached_property', 'abstractproperty');
}

export function isStaticMethod(fn: FunctionDefNode): boolean {
  return hasDecorator(fn, 'staticmethod');
}

export function isClassMethod(fn: FunctionDefNode): boolean {
  return hasDecorator(fn, 'classmethod');
}

/** `@name.setter` / `@name.deleter` re-bind a property name without carrying its type */
export function isPropertyAccessor(fn: FunctionDefNode): boolean {
  return fn.decorators.some(decorator => decorator.kind === 'Attribute'
    && (decorator.attr === 'setter' || decorator.attr === 'deleter'));
}

/**
 * Binding a class member name resolves to. Property setters and deleters
 * never shadow the getter.
 */
export function memberDefinition(definitions: Definition[]): Definition | null {
  for (let i = definitions.length - 1; i >= 0; i--) {
    const definition = definitions[i];
    if (definition.kind === 'function' && isPropertyAccessor(definition.node)) continue;
    return definition;
  }
  return definitions.length > 0 ? definitions[definitions.length - 1] : null;
}

export interface InstanceAttribute {
  readonly method: FunctionDefNode;
  readonly statement: AssignNode | AnnAssignNode;
  readonly value: ExprNode | null;
  readonly annotation: ExprNode | null;
}

/**
 * `self.<attr> = ...` and `self.<attr>: T = ...` assignments made by the
 * methods of one class body, in source order.
 */
export function instanceAttributes(cls: ClassDefNode, attr: string): InstanceAttribute[] {
  const found: InstanceAttribute[] = [];
  for (const statement of cls.body) {
    if (statement.kind !== 'FunctionDef' || isStaticMethod(statement)) continue;
    const method = statement;
    const self = method.params[0];
    if (!self || self.variant !== 'positional') continue;

    const isSelfAttribute = (target: ExprNode): boolean => target.kind === 'Attribute'
      && target.attr === attr
      && target.value.kind === 'Name'
      && target.value.id === self.name;

    for (const child of method.body) {
      walk(child, node => {
        if (node.kind === 'FunctionDef' || node.kind === 'ClassDef' || node.kind === 'Lambda') return false;
        if (node.kind === 'Assign' && node.targets.some(isSelfAttribute)) {
          found.push({ method, statement: node, value: node.value, annotation: null });
        } else if (node.kind === 'AnnAssign' && isSelfAttribute(node.target)) {
          found.push({ method, statement: node, value: node.value, annotation: node.annotation });
        }
        return true;
      });
    }
  }
  return found;
}
