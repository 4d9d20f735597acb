/**
 * Python syntax tree - closed tagged union over the node kinds the
 * front end produces.
 *
 * Nodes are plain objects owned by their Tree. Identity is object identity;
 * nothing downstream of the parser mutates them.
 */

interface NodeBase {
  /** 1-based line */
  readonly line: number;
  /** 0-based column */
  readonly column: number;
}

// ─── Statements ──────────────────────────────────────────────────────

export interface ModuleNode extends NodeBase {
  readonly kind: 'Module';
  readonly body: StmtNode[];
}

export interface ClassDefNode extends NodeBase {
  readonly kind: 'ClassDef';
  readonly name: string;
  readonly bases: ExprNode[];
  readonly keywords: KeywordNode[];
  readonly decorators: ExprNode[];
  readonly body: StmtNode[];
}

export interface FunctionDefNode extends NodeBase {
  readonly kind: 'FunctionDef';
  readonly name: string;
  readonly params: ArgNode[];
  readonly returns: ExprNode | null;
  readonly decorators: ExprNode[];
  readonly body: StmtNode[];
  readonly isAsync: boolean;
}

export type ArgVariant = 'positional' | 'vararg' | 'keyword-only' | 'kwarg';

export interface ArgNode extends NodeBase {
  readonly kind: 'Arg';
  readonly name: string;
  readonly annotation: ExprNode | null;
  readonly default: ExprNode | null;
  readonly variant: ArgVariant;
}

export interface AssignNode extends NodeBase {
  readonly kind: 'Assign';
  readonly targets: ExprNode[];
  readonly value: ExprNode;
}

export interface AnnAssignNode extends NodeBase {
  readonly kind: 'AnnAssign';
  readonly target: ExprNode;
  readonly annotation: ExprNode;
  readonly value: ExprNode | null;
}

export interface AugAssignNode extends NodeBase {
  readonly kind: 'AugAssign';
  readonly target: ExprNode;
  readonly op: string;
  readonly value: ExprNode;
}

export interface ReturnNode extends NodeBase {
  readonly kind: 'Return';
  readonly value: ExprNode | null;
}

export interface ExprStmtNode extends NodeBase {
  readonly kind: 'ExprStmt';
  readonly value: ExprNode;
}

export interface AliasNode extends NodeBase {
  readonly kind: 'Alias';
  /** Dotted name as written (`a.b.c` for `import a.b.c`) */
  readonly name: string;
  readonly asname: string | null;
}

export interface ImportNode extends NodeBase {
  readonly kind: 'Import';
  readonly names: AliasNode[];
}

export interface ImportFromNode extends NodeBase {
  readonly kind: 'ImportFrom';
  /** Module as written, without leading dots ('' for `from . import x`) */
  readonly module: string;
  /** Number of leading dots */
  readonly level: number;
  readonly names: AliasNode[];
}

export interface IfNode extends NodeBase {
  readonly kind: 'If';
  readonly test: ExprNode;
  readonly body: StmtNode[];
  readonly orelse: StmtNode[];
}

export interface WhileNode extends NodeBase {
  readonly kind: 'While';
  readonly test: ExprNode;
  readonly body: StmtNode[];
  readonly orelse: StmtNode[];
}

export interface ForNode extends NodeBase {
  readonly kind: 'For';
  readonly target: ExprNode;
  readonly iter: ExprNode;
  readonly body: StmtNode[];
  readonly orelse: StmtNode[];
  readonly isAsync: boolean;
}

export interface WithItemNode extends NodeBase {
  readonly kind: 'WithItem';
  readonly context: ExprNode;
  readonly target: ExprNode | null;
}

export interface WithNode extends NodeBase {
  readonly kind: 'With';
  readonly items: WithItemNode[];
  readonly body: StmtNode[];
  readonly isAsync: boolean;
}

export interface ExceptHandlerNode extends NodeBase {
  readonly kind: 'ExceptHandler';
  readonly type: ExprNode | null;
  readonly name: string | null;
  readonly body: StmtNode[];
}

export interface TryNode extends NodeBase {
  readonly kind: 'Try';
  readonly body: StmtNode[];
  readonly handlers: ExceptHandlerNode[];
  readonly orelse: StmtNode[];
  readonly finalbody: StmtNode[];
}

export interface RaiseNode extends NodeBase {
  readonly kind: 'Raise';
  readonly exc: ExprNode | null;
  readonly cause: ExprNode | null;
}

/**
 * One `case` arm. The pattern is kept as an expression; `captures` are the
 * names it binds, `as` targets included.
 */
export interface MatchCaseNode extends NodeBase {
  readonly kind: 'MatchCase';
  readonly pattern: ExprNode;
  /** Target of a trailing `as name` */
  readonly alias: NameNode | null;
  readonly captures: NameNode[];
  readonly guard: ExprNode | null;
  readonly body: StmtNode[];
}

export interface MatchNode extends NodeBase {
  readonly kind: 'Match';
  readonly subject: ExprNode;
  readonly cases: MatchCaseNode[];
}

export type SimpleKeyword = 'pass' | 'break' | 'continue' | 'global' | 'nonlocal' | 'del' | 'assert';

/**
 * Keyword statements with no structure of their own.
 * `global`/`nonlocal` carry `names`; `del`/`assert` carry `values`.
 */
export interface SimpleStmtNode extends NodeBase {
  readonly kind: 'Simple';
  readonly keyword: SimpleKeyword;
  readonly names: string[];
  readonly values: ExprNode[];
}

export type StmtNode =
  | ClassDefNode
  | FunctionDefNode
  | AssignNode
  | AnnAssignNode
  | AugAssignNode
  | ReturnNode
  | ExprStmtNode
  | ImportNode
  | ImportFromNode
  | IfNode
  | WhileNode
  | ForNode
  | WithNode
  | TryNode
  | RaiseNode
  | MatchNode
  | SimpleStmtNode;

// ─── Expressions ─────────────────────────────────────────────────────

export interface NameNode extends NodeBase {
  readonly kind: 'Name';
  readonly id: string;
}

export interface AttributeNode extends NodeBase {
  readonly kind: 'Attribute';
  readonly value: ExprNode;
  readonly attr: string;
}

export interface KeywordNode extends NodeBase {
  readonly kind: 'Keyword';
  /** null for `**kwargs` */
  readonly arg: string | null;
  readonly value: ExprNode;
}

export interface CallNode extends NodeBase {
  readonly kind: 'Call';
  readonly func: ExprNode;
  readonly args: ExprNode[];
  readonly keywords: KeywordNode[];
}

export interface SubscriptNode extends NodeBase {
  readonly kind: 'Subscript';
  readonly value: ExprNode;
  /** Multiple indices arrive as a Tuple */
  readonly slice: ExprNode;
}

export interface SliceNode extends NodeBase {
  readonly kind: 'Slice';
  readonly lower: ExprNode | null;
  readonly upper: ExprNode | null;
  readonly step: ExprNode | null;
}

export type ConstantType = 'str' | 'bytes' | 'int' | 'float' | 'complex' | 'bool' | 'None' | 'Ellipsis';

export interface ConstantNode extends NodeBase {
  readonly kind: 'Constant';
  readonly type: ConstantType;
  /** Decoded text for strings, source text otherwise */
  readonly value: string;
  /** f-string: the value is the raw template, never parsed */
  readonly formatted: boolean;
}

export interface ListNode extends NodeBase {
  readonly kind: 'List';
  readonly elements: ExprNode[];
}

export interface TupleNode extends NodeBase {
  readonly kind: 'Tuple';
  readonly elements: ExprNode[];
}

export interface SetNode extends NodeBase {
  readonly kind: 'Set';
  readonly elements: ExprNode[];
}

export interface DictNode extends NodeBase {
  readonly kind: 'Dict';
  /** null key marks a `**mapping` entry */
  readonly keys: (ExprNode | null)[];
  readonly values: ExprNode[];
}

export interface BoolOpNode extends NodeBase {
  readonly kind: 'BoolOp';
  readonly op: 'and' | 'or';
  readonly values: ExprNode[];
}

export interface BinOpNode extends NodeBase {
  readonly kind: 'BinOp';
  readonly op: string;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

export interface UnaryOpNode extends NodeBase {
  readonly kind: 'UnaryOp';
  readonly op: 'not' | '-' | '+' | '~';
  readonly operand: ExprNode;
}

export interface CompareNode extends NodeBase {
  readonly kind: 'Compare';
  readonly left: ExprNode;
  readonly ops: string[];
  readonly comparators: ExprNode[];
}

export interface IfExpNode extends NodeBase {
  readonly kind: 'IfExp';
  readonly test: ExprNode;
  readonly body: ExprNode;
  readonly orelse: ExprNode;
}

export interface LambdaNode extends NodeBase {
  readonly kind: 'Lambda';
  readonly params: ArgNode[];
  readonly body: ExprNode;
}

export interface StarredNode extends NodeBase {
  readonly kind: 'Starred';
  readonly value: ExprNode;
}

export interface AwaitNode extends NodeBase {
  readonly kind: 'Await';
  readonly value: ExprNode;
}

export interface YieldNode extends NodeBase {
  readonly kind: 'Yield';
  readonly value: ExprNode | null;
  readonly isFrom: boolean;
}

export interface NamedExprNode extends NodeBase {
  readonly kind: 'NamedExpr';
  readonly target: NameNode;
  readonly value: ExprNode;
}

export interface ComprehensionForNode extends NodeBase {
  readonly kind: 'ComprehensionFor';
  readonly target: ExprNode;
  readonly iter: ExprNode;
  readonly conditions: ExprNode[];
}

export interface ComprehensionNode extends NodeBase {
  readonly kind: 'Comprehension';
  readonly collection: 'list' | 'set' | 'dict' | 'generator';
  /** Element, or key for dict comprehensions */
  readonly element: ExprNode;
  /** Value for dict comprehensions */
  readonly value: ExprNode | null;
  readonly generators: ComprehensionForNode[];
}

export type ExprNode =
  | NameNode
  | AttributeNode
  | CallNode
  | SubscriptNode
  | SliceNode
  | ConstantNode
  | ListNode
  | TupleNode
  | SetNode
  | DictNode
  | BoolOpNode
  | BinOpNode
  | UnaryOpNode
  | CompareNode
  | IfExpNode
  | LambdaNode
  | StarredNode
  | AwaitNode
  | YieldNode
  | NamedExprNode
  | ComprehensionNode;

/** Nodes that are neither statements nor expressions on their own */
export type AuxiliaryNode =
  | ModuleNode
  | ArgNode
  | AliasNode
  | KeywordNode
  | WithItemNode
  | ExceptHandlerNode
  | MatchCaseNode
  | ComprehensionForNode;

export type PyNode = StmtNode | ExprNode | AuxiliaryNode;

export type PyNodeKind = PyNode['kind'];

/** Nodes that open a lexical scope */
export type ScopeOwnerNode = ModuleNode | ClassDefNode | FunctionDefNode | LambdaNode | ComprehensionNode;
