/**
 * Inference Provider Types - the contract between the Python front end
 * and the resolution core.
 *
 * The core never walks source text itself. Everything it knows about a
 * node (its scope, its bindings, what it evaluates to) comes through
 * InferenceProvider.
 */

import type {
  PyNode,
  ExprNode,
  ModuleNode,
  ClassDefNode,
  FunctionDefNode,
  LambdaNode,
  ScopeOwnerNode,
  AssignNode,
  AnnAssignNode,
  AugAssignNode,
  NamedExprNode,
  ForNode,
  ComprehensionForNode,
  WithItemNode,
  ExceptHandlerNode,
  MatchCaseNode,
  ArgNode,
  ImportNode,
  ImportFromNode,
  AliasNode,
  NameNode,
} from './python.js';

// === SCOPES ===

export type ScopeKind = 'module' | 'class' | 'function' | 'lambda' | 'comprehension';

export interface Scope {
  readonly kind: ScopeKind;
  readonly node: ScopeOwnerNode;
  readonly parent: Scope | null;
  /** Dotted qualified name of the owner; the module name for module scopes */
  readonly qname: string;
  readonly bindings: Map<string, Definition[]>;
  readonly globals: Set<string>;
  readonly nonlocals: Set<string>;
  readonly children: Scope[];
}

// === DEFINITIONS ===

interface DefinitionBase {
  readonly name: string;
  /** Scope the name is bound in (null for builtins) */
  readonly scope: Scope | null;
}

export interface AssignmentDefinition extends DefinitionBase {
  readonly kind: 'assignment';
  readonly node: AssignNode | AnnAssignNode | AugAssignNode | NamedExprNode;
  readonly target: NameNode;
  /** Right-hand side; null for a bare `x: T` declaration */
  readonly value: ExprNode | null;
  readonly annotation: ExprNode | null;
  /** Target sits inside a tuple/list unpacking, so `value` is not its value */
  readonly unpacked: boolean;
}

export interface LoopDefinition extends DefinitionBase {
  readonly kind: 'loop';
  readonly node: ForNode | ComprehensionForNode;
  readonly target: NameNode;
}

export interface ContextDefinition extends DefinitionBase {
  readonly kind: 'context';
  readonly node: WithItemNode;
  readonly target: NameNode;
}

export interface ParameterDefinition extends DefinitionBase {
  readonly kind: 'parameter';
  readonly node: ArgNode;
  readonly owner: FunctionDefNode | LambdaNode;
  /** Position in the owner's parameter list */
  readonly index: number;
}

export interface ImportDefinition extends DefinitionBase {
  readonly kind: 'import';
  readonly node: ImportNode | ImportFromNode;
  readonly alias: AliasNode;
  /**
   * Absolute dotted name the binding refers to: `a` for `import a.b`,
   * `a.b` for `import a.b as x`, `pkg.mod.name` for `from pkg.mod import name`
   */
  readonly target: string;
  /** Module part of `target` (`pkg.mod` for `from pkg.mod import name`) */
  readonly module: string;
  /** `import ...` form; `from ... import` bindings may still name a submodule */
  readonly isModuleImport: boolean;
}

export interface ClassDefinition extends DefinitionBase {
  readonly kind: 'class';
  readonly node: ClassDefNode;
}

export interface FunctionDefinition extends DefinitionBase {
  readonly kind: 'function';
  readonly node: FunctionDefNode;
}

export interface ExceptionDefinition extends DefinitionBase {
  readonly kind: 'exception';
  readonly node: ExceptHandlerNode;
}

/** Name bound by a `case` pattern */
export interface CaptureDefinition extends DefinitionBase {
  readonly kind: 'capture';
  readonly node: MatchCaseNode;
  readonly target: NameNode;
}

export interface BuiltinDefinition extends DefinitionBase {
  readonly kind: 'builtin';
  readonly scope: null;
}

export type Definition =
  | AssignmentDefinition
  | LoopDefinition
  | ContextDefinition
  | ParameterDefinition
  | ImportDefinition
  | ClassDefinition
  | FunctionDefinition
  | ExceptionDefinition
  | CaptureDefinition
  | BuiltinDefinition;

// === INFERRED VALUES ===

export interface ClassValue {
  readonly kind: 'class';
  readonly qname: string;
  /** null for builtins and for classes of modules that were never loaded */
  readonly node: ClassDefNode | null;
}

export interface InstanceValue {
  readonly kind: 'instance';
  readonly qname: string;
  readonly node: ClassDefNode | null;
}

export interface FunctionValue {
  readonly kind: 'function';
  readonly qname: string;
  readonly node: FunctionDefNode | null;
  /** Class qname when obtained through an instance attribute */
  readonly boundTo: string | null;
}

export interface ModuleValue {
  readonly kind: 'module';
  readonly qname: string;
  /** null when the module is known by name only */
  readonly file: string | null;
}

/** A name from a module that is known to exist but was never loaded */
export interface SymbolValue {
  readonly kind: 'symbol';
  readonly qname: string;
}

export type InferredValue = ClassValue | InstanceValue | FunctionValue | ModuleValue | SymbolValue;

export interface InferOptions {
  /** Also apply builtin-method return types from the data table */
  broad?: boolean;
}

// === MODULES ===

export type ModuleOrigin = 'source' | 'stub' | 'builtin';

export interface ModuleRecord {
  readonly name: string;
  /** Absolute path of the file the module was parsed from */
  readonly file: string | null;
  readonly isPackage: boolean;
  readonly origin: ModuleOrigin;
  readonly node: ModuleNode;
  readonly scope: Scope;
}

// === PROVIDER ===

export interface InferenceProvider {
  infer(node: PyNode, options?: InferOptions): InferredValue[];
  /** Definitions from the innermost scope binding `name`, following LEGB */
  lookup(scope: Scope, name: string): Definition[];
  /** Binding that reaches `at`: nearest preceding one in the same scope, else the last */
  selectDefinition(definitions: Definition[], at: PyNode): Definition | null;
  /** Method resolution order, excluding the class itself */
  ancestors(cls: ClassValue): ClassValue[];
  scopeOf(node: PyNode): Scope;
  parentOf(node: PyNode): PyNode | null;
  moduleOf(node: PyNode): ModuleRecord;
  getModule(name: string): ModuleRecord | null;
  findClass(qname: string, context: PyNode): ClassValue | null;
  /** Innermost class whose body (or one of its methods) contains `node` */
  enclosingClass(node: PyNode): ClassValue | null;
  /** Parse a quoted annotation as an expression living at `context` */
  parseExpression(source: string, context: PyNode): ExprNode | null;
}
