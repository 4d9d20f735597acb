/**
 * Generic traversal over the closed node union.
 *
 * childNodes() lists children in evaluation order (source order except
 * for comprehensions, whose generators come first); every node kind is
 * handled explicitly, so adding a kind to the union fails compilation here.
 */
import type { PyNode, ExprNode } from '@demeter-lint/types';

function present(nodes: (ExprNode | null)[]): ExprNode[] {
  return nodes.filter((node): node is ExprNode => node !== null);
}

export function childNodes(node: PyNode): PyNode[] {
  switch (node.kind) {
    case 'Module':
      return [...node.body];
    case 'ClassDef':
      return [...node.decorators, ...node.bases, ...node.keywords, ...node.body];
    case 'FunctionDef':
      return [...node.decorators, ...node.params, ...present([node.returns]), ...node.body];
    case 'Arg':
      return present([node.annotation, node.default]);
    case 'Assign':
      return [...node.targets, node.value];
    case 'AnnAssign':
      return present([node.target, node.annotation, node.value]);
    case 'AugAssign':
      return [node.target, node.value];
    case 'Return':
      return present([node.value]);
    case 'ExprStmt':
      return [node.value];
    case 'Import':
    case 'ImportFrom':
      return [...node.names];
    case 'Alias':
      return [];
    case 'If':
    case 'While':
      return [node.test, ...node.body, ...node.orelse];
    case 'For':
      return [node.target, node.iter, ...node.body, ...node.orelse];
    case 'With':
      return [...node.items, ...node.body];
    case 'WithItem':
      return present([node.context, node.target]);
    case 'Try':
      return [...node.body, ...node.handlers, ...node.orelse, ...node.finalbody];
    case 'ExceptHandler':
      return [...present([node.type]), ...node.body];
    case 'Raise':
      return present([node.exc, node.cause]);
    case 'Match':
      return [node.subject, ...node.cases];
    case 'MatchCase':
      return [node.pattern, ...present([node.alias, node.guard]), ...node.body];
    case 'Simple':
      return [...node.values];
    case 'Name':
    case 'Constant':
      return [];
    case 'Attribute':
      return [node.value];
    case 'Call':
      return [node.func, ...node.args, ...node.keywords];
    case 'Keyword':
      return [node.value];
    case 'Subscript':
      return [node.value, node.slice];
    case 'Slice':
      return present([node.lower, node.upper, node.step]);
    case 'List':
    case 'Tuple':
    case 'Set':
      return [...node.elements];
    case 'Dict': {
      const children: PyNode[] = [];
      node.keys.forEach((key, i) => {
        if (key) children.push(key);
        children.push(node.values[i]);
      });
      return children;
    }
    case 'BoolOp':
      return [...node.values];
    case 'BinOp':
      return [node.left, node.right];
    case 'UnaryOp':
      return [node.operand];
    case 'Compare':
      return [node.left, ...node.comparators];
    case 'IfExp':
      return [node.test, node.body, node.orelse];
    case 'Lambda':
      return [...node.params, node.body];
    case 'Starred':
    case 'Await':
      return [node.value];
    case 'Yield':
      return present([node.value]);
    case 'NamedExpr':
      return [node.target, node.value];
    case 'ComprehensionFor':
      return [node.target, node.iter, ...node.conditions];
    case 'Comprehension':
      return [...node.generators, node.element, ...present([node.value])];
    default: {
      const unreachable: never = node;
      throw new Error(`Unhandled node kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Pre-order walk. Returning false from `enter` skips the node's children.
 */
export function walk(root: PyNode, enter: (node: PyNode, parent: PyNode | null) => boolean | void): void {
  const visit = (node: PyNode, parent: PyNode | null): void => {
    if (enter(node, parent) === false) return;
    for (const child of childNodes(node)) visit(child, node);
  };
  visit(root, null);
}
