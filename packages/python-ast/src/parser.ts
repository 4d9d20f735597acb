/**
 * Parser - recursive descent over the token stream, producing the
 * tagged-union tree from @demeter-lint/types.
 *
 * Covers the statement and expression grammar of Python 3 that matters
 * for name and type resolution. `match`, `case` and `type` are soft
 * keywords: they only open a statement where nothing else would parse.
 * Case patterns are read as expressions. An `as` inside a nested
 * pattern is not supported.
 */
import type {
  ModuleNode,
  StmtNode,
  ExprNode,
  ArgNode,
  ArgVariant,
  AliasNode,
  KeywordNode,
  ExceptHandlerNode,
  WithItemNode,
  ComprehensionForNode,
  ComprehensionNode,
  ClassDefNode,
  FunctionDefNode,
  IfNode,
  MatchNode,
  MatchCaseNode,
  ImportNode,
  ImportFromNode,
  SimpleKeyword,
  ConstantNode,
  NameNode,
} from '@demeter-lint/types';
import { tokenize, type Token } from './tokenizer.js';
import { decodeString } from './strings.js';
import { PythonSyntaxError } from './errors.js';

const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally', 'for',
  'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not',
  'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

const AUGMENTED = new Set(['+=', '-=', '*=', '/=', '//=', '%=', '@=', '&=', '|=', '^=', '>>=', '<<=', '**=']);
const COMPARISON = new Set(['<', '>', '==', '>=', '<=', '!=']);
const EXPRESSION_END = new Set([')', ']', '}', '=', ';', ':']);

interface Position {
  line: number;
  column: number;
}

export function parseModule(source: string): ModuleNode {
  return new Parser(tokenize(source)).parseModule();
}

/**
 * Parse a single expression, e.g. the text of a quoted annotation.
 */
export function parseExpression(source: string): ExprNode {
  return new Parser(tokenize(source.trim())).parseStandaloneExpression();
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  // ─── Token helpers ─────────────────────────────────────────────────

  private get current(): Token {
    return this.tokens[this.index];
  }

  private peek(offset = 1): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'ENDMARKER') this.index++;
    return token;
  }

  private isOp(value: string, token: Token = this.current): boolean {
    return token.type === 'OP' && token.value === value;
  }

  private isKeyword(value: string, token: Token = this.current): boolean {
    return token.type === 'NAME' && token.value === value;
  }

  private acceptOp(value: string): boolean {
    if (!this.isOp(value)) return false;
    this.index++;
    return true;
  }

  private acceptKeyword(value: string): boolean {
    if (!this.isKeyword(value)) return false;
    this.index++;
    return true;
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) throw this.error(`expected '${value}'`);
    return this.advance();
  }

  private expectKeyword(value: string): Token {
    if (!this.isKeyword(value)) throw this.error(`expected '${value}'`);
    return this.advance();
  }

  private expectName(): string {
    const token = this.current;
    if (token.type !== 'NAME' || KEYWORDS.has(token.value)) throw this.error('expected a name');
    this.index++;
    return token.value;
  }

  private at(token: Token): Position {
    return { line: token.line, column: token.column };
  }

  private error(message: string, token: Token = this.current): PythonSyntaxError {
    const found =
      token.type === 'ENDMARKER' ? 'end of input'
        : token.type === 'NEWLINE' ? 'end of line'
          : token.type === 'INDENT' ? 'indent'
            : token.type === 'DEDENT' ? 'dedent'
              : `'${token.value}'`;
    return new PythonSyntaxError(`${message}, found ${found}`, token.line, token.column);
  }

  private atExpressionEnd(): boolean {
    const token = this.current;
    if (token.type === 'NEWLINE' || token.type === 'ENDMARKER' || token.type === 'DEDENT') return true;
    return token.type === 'OP' && (EXPRESSION_END.has(token.value) || AUGMENTED.has(token.value));
  }

  private atSimpleEnd(): boolean {
    return this.current.type === 'NEWLINE' || this.current.type === 'ENDMARKER' || this.isOp(';');
  }

  private atComprehension(): boolean {
    return this.isKeyword('for') || (this.isKeyword('async') && this.isKeyword('for', this.peek()));
  }

  // ─── Module ────────────────────────────────────────────────────────

  parseModule(): ModuleNode {
    const body: StmtNode[] = [];
    while (this.current.type !== 'ENDMARKER') {
      if (this.current.type === 'NEWLINE') {
        this.advance();
        continue;
      }
      body.push(...this.parseStatement());
    }
    return { kind: 'Module', body, line: 1, column: 0 };
  }

  parseStandaloneExpression(): ExprNode {
    const expr = this.parseStarExpressions();
    if (this.current.type === 'NEWLINE') this.advance();
    if (this.current.type !== 'ENDMARKER') throw this.error('unexpected token after expression');
    return expr;
  }

  // ─── Statements ────────────────────────────────────────────────────

  private parseStatement(): StmtNode[] {
    const token = this.current;
    if (token.type === 'INDENT') throw this.error('unexpected indent');
    if (this.isOp('@')) return [this.parseDecorated()];

    if (token.type === 'NAME') {
      switch (token.value) {
        case 'def':
          return [this.parseFunctionDef([], false, token)];
        case 'class':
          return [this.parseClassDef([], token)];
        case 'if':
          return [this.parseIf()];
        case 'while':
          return [this.parseWhile()];
        case 'for':
          return [this.parseFor(false, token)];
        case 'try':
          return [this.parseTry()];
        case 'with':
          return [this.parseWith(false, token)];
        case 'match':
          if (this.startsMatch()) return [this.parseMatch()];
          break;
        case 'async': {
          const next = this.peek();
          if (this.isKeyword('def', next)) {
            this.advance();
            return [this.parseFunctionDef([], true, token)];
          }
          if (this.isKeyword('for', next)) {
            this.advance();
            return [this.parseFor(true, token)];
          }
          if (this.isKeyword('with', next)) {
            this.advance();
            return [this.parseWith(true, token)];
          }
          throw this.error('invalid syntax', next);
        }
      }
    }
    return this.parseSimpleStatements();
  }

  private parseBlock(): StmtNode[] {
    this.expectOp(':');
    if (this.peek(0).type !== 'NEWLINE') return this.parseSimpleStatements();

    this.advance();
    if (this.peek(0).type !== 'INDENT') throw this.error('expected an indented block');
    this.advance();
    const body: StmtNode[] = [];
    while (this.current.type !== 'DEDENT' && this.current.type !== 'ENDMARKER') {
      if (this.current.type === 'NEWLINE') {
        this.advance();
        continue;
      }
      body.push(...this.parseStatement());
    }
    if (this.current.type === 'DEDENT') this.advance();
    return body;
  }

  private parseDecorated(): StmtNode {
    const decorators: ExprNode[] = [];
    while (this.acceptOp('@')) {
      decorators.push(this.parseNamedExpr());
      if (this.current.type !== 'NEWLINE') throw this.error('expected end of line after decorator');
      this.advance();
    }
    const token = this.current;
    if (this.isKeyword('def')) return this.parseFunctionDef(decorators, false, token);
    if (this.isKeyword('class')) return this.parseClassDef(decorators, token);
    if (this.isKeyword('async') && this.isKeyword('def', this.peek())) {
      this.advance();
      return this.parseFunctionDef(decorators, true, token);
    }
    throw this.error('expected function or class after decorator');
  }

  private parseFunctionDef(decorators: ExprNode[], isAsync: boolean, start: Token): FunctionDefNode {
    this.expectKeyword('def');
    const name = this.expectName();
    this.skipTypeParameters();
    this.expectOp('(');
    const params = this.parseParameters(')', true);
    this.expectOp(')');
    const returns = this.acceptOp('->') ? this.parseTest() : null;
    const body = this.parseBlock();
    return { kind: 'FunctionDef', name, params, returns, decorators, body, isAsync, ...this.at(start) };
  }

  private parseParameters(closer: string, annotated: boolean): ArgNode[] {
    const params: ArgNode[] = [];
    let variant: ArgVariant = 'positional';
    while (!this.isOp(closer)) {
      if (this.acceptOp('/')) {
        // positional-only marker
      } else if (this.acceptOp('**')) {
        params.push(this.parseParameter('kwarg', annotated));
      } else if (this.acceptOp('*')) {
        if (this.current.type === 'NAME') params.push(this.parseParameter('vararg', annotated));
        variant = 'keyword-only';
      } else {
        params.push(this.parseParameter(variant, annotated));
      }
      if (!this.acceptOp(',')) break;
    }
    return params;
  }

  private parseParameter(variant: ArgVariant, annotated: boolean): ArgNode {
    const token = this.current;
    const name = this.expectName();
    const annotation = annotated && this.acceptOp(':') ? this.parseTest() : null;
    const defaultValue = this.acceptOp('=') ? this.parseTest() : null;
    return { kind: 'Arg', name, annotation, default: defaultValue, variant, ...this.at(token) };
  }

  private parseClassDef(decorators: ExprNode[], start: Token): ClassDefNode {
    this.expectKeyword('class');
    const name = this.expectName();
    this.skipTypeParameters();
    let bases: ExprNode[] = [];
    let keywords: KeywordNode[] = [];
    if (this.acceptOp('(')) {
      ({ args: bases, keywords } = this.parseCallArguments());
      this.expectOp(')');
    }
    const body = this.parseBlock();
    return { kind: 'ClassDef', name, bases, keywords, decorators, body, ...this.at(start) };
  }

  /** `[T, *Ts, **P]` after a def, class or type alias name; the parameters bind nothing */
  private skipTypeParameters(): void {
    if (!this.acceptOp('[')) return;
    while (!this.isOp(']')) {
      if (!this.acceptOp('**')) this.acceptOp('*');
      this.expectName();
      if (this.acceptOp(':')) this.parseTest();
      if (this.acceptOp('=')) this.parseTest();
      if (!this.acceptOp(',')) break;
    }
    this.expectOp(']');
  }

  private parseIf(): IfNode {
    const start = this.advance();
    const test = this.parseNamedExpr();
    const body = this.parseBlock();
    let orelse: StmtNode[] = [];
    if (this.isKeyword('elif')) {
      orelse = [this.parseIf()];
    } else if (this.acceptKeyword('else')) {
      orelse = this.parseBlock();
    }
    return { kind: 'If', test, body, orelse, ...this.at(start) };
  }

  private parseWhile(): StmtNode {
    const start = this.advance();
    const test = this.parseNamedExpr();
    const body = this.parseBlock();
    const orelse = this.acceptKeyword('else') ? this.parseBlock() : [];
    return { kind: 'While', test, body, orelse, ...this.at(start) };
  }

  private parseFor(isAsync: boolean, start: Token): StmtNode {
    this.expectKeyword('for');
    const target = this.parseTargetList();
    this.expectKeyword('in');
    const iter = this.parseStarExpressions();
    const body = this.parseBlock();
    const orelse = this.acceptKeyword('else') ? this.parseBlock() : [];
    return { kind: 'For', target, iter, body, orelse, isAsync, ...this.at(start) };
  }

  private parseTry(): StmtNode {
    const start = this.advance();
    const body = this.parseBlock();
    const handlers: ExceptHandlerNode[] = [];
    while (this.isKeyword('except')) {
      const token = this.advance();
      this.acceptOp('*');
      let type: ExprNode | null = null;
      let name: string | null = null;
      if (!this.isOp(':')) {
        type = this.parseTest();
        if (this.acceptKeyword('as')) name = this.expectName();
      }
      handlers.push({ kind: 'ExceptHandler', type, name, body: this.parseBlock(), ...this.at(token) });
    }
    const orelse = this.acceptKeyword('else') ? this.parseBlock() : [];
    const finalbody = this.acceptKeyword('finally') ? this.parseBlock() : [];
    if (handlers.length === 0 && finalbody.length === 0) {
      throw this.error("expected 'except' or 'finally' block");
    }
    return { kind: 'Try', body, handlers, orelse, finalbody, ...this.at(start) };
  }

  /** A subject, then `:` and the end of the line; `match = 1` or `match.group()` stay expressions */
  private startsMatch(): boolean {
    const saved = this.index;
    try {
      this.advance();
      if (this.atExpressionEnd()) return false;
      this.parseStarExpressions();
      return this.isOp(':') && this.peek().type === 'NEWLINE';
    } catch (error) {
      if (error instanceof PythonSyntaxError) return false;
      throw error;
    } finally {
      this.index = saved;
    }
  }

  private parseMatch(): MatchNode {
    const start = this.advance();
    const subject = this.parseStarExpressions();
    this.expectOp(':');
    this.advance();
    if (this.peek(0).type !== 'INDENT') throw this.error('expected an indented block');
    this.advance();

    const cases: MatchCaseNode[] = [];
    while (this.current.type !== 'DEDENT' && this.current.type !== 'ENDMARKER') {
      if (this.current.type === 'NEWLINE') {
        this.advance();
        continue;
      }
      if (!this.isKeyword('case')) throw this.error("expected 'case'");
      cases.push(this.parseCase());
    }
    if (this.current.type === 'DEDENT') this.advance();
    if (cases.length === 0) throw this.error("expected 'case'");
    return { kind: 'Match', subject, cases, ...this.at(start) };
  }

  private parseCase(): MatchCaseNode {
    const start = this.advance();
    const pattern = this.parsePatterns();
    let alias: NameNode | null = null;
    if (this.acceptKeyword('as')) {
      const token = this.current;
      alias = { kind: 'Name', id: this.expectName(), ...this.at(token) };
    }
    const guard = this.acceptKeyword('if') ? this.parseNamedExpr() : null;
    const body = this.parseBlock();
    const captures = alias ? [...patternCaptures(pattern), alias] : patternCaptures(pattern);
    return { kind: 'MatchCase', pattern, alias, captures, guard, body, ...this.at(start) };
  }

  /** Open sequence `case 1, *rest:` becomes a Tuple */
  private parsePatterns(): ExprNode {
    const start = this.current;
    const first = this.parsePattern();
    if (!this.isOp(',')) return first;
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.isOp(':') || this.isKeyword('if') || this.isKeyword('as')) break;
      elements.push(this.parsePattern());
    }
    return { kind: 'Tuple', elements, ...this.at(start) };
  }

  private parsePattern(): ExprNode {
    const token = this.current;
    if (this.acceptOp('*')) return { kind: 'Starred', value: this.parseBitOr(), ...this.at(token) };
    return this.parseBitOr();
  }

  private parseWith(isAsync: boolean, start: Token): StmtNode {
    this.expectKeyword('with');
    const items: WithItemNode[] = [];
    if (this.isOp('(') && this.hasParenthesizedWithItems()) {
      this.advance();
      while (!this.isOp(')')) {
        items.push(this.parseWithItem());
        if (!this.acceptOp(',')) break;
      }
      this.expectOp(')');
    } else {
      do {
        items.push(this.parseWithItem());
      } while (this.acceptOp(','));
    }
    const body = this.parseBlock();
    return { kind: 'With', items, body, isAsync, ...this.at(start) };
  }

  /** `with (a as b, c as d):` - bracket closes right before the colon and holds a top-level `as` */
  private hasParenthesizedWithItems(): boolean {
    let depth = 0;
    let sawAs = false;
    for (let i = this.index; i < this.tokens.length; i++) {
      const token = this.tokens[i];
      if (token.type === 'OP' && (token.value === '(' || token.value === '[' || token.value === '{')) depth++;
      else if (token.type === 'OP' && (token.value === ')' || token.value === ']' || token.value === '}')) {
        depth--;
        if (depth === 0) return sawAs && this.isOp(':', this.tokens[i + 1]);
      } else if (depth === 1 && this.isKeyword('as', token)) sawAs = true;
      else if (token.type === 'NEWLINE' || token.type === 'ENDMARKER') return false;
    }
    return false;
  }

  private parseWithItem(): WithItemNode {
    const token = this.current;
    const context = this.parseTest();
    const target = this.acceptKeyword('as') ? this.parseBitOr() : null;
    return { kind: 'WithItem', context, target, ...this.at(token) };
  }

  private parseSimpleStatements(): StmtNode[] {
    const statements = [this.parseSmallStatement()];
    while (this.acceptOp(';')) {
      if (this.current.type === 'NEWLINE' || this.current.type === 'ENDMARKER') break;
      statements.push(this.parseSmallStatement());
    }
    if (this.current.type === 'NEWLINE') {
      this.advance();
    } else if (this.current.type !== 'ENDMARKER') {
      throw this.error('invalid syntax');
    }
    return statements;
  }

  private parseSmallStatement(): StmtNode {
    const token = this.current;
    if (token.type === 'NAME') {
      switch (token.value) {
        case 'pass':
        case 'break':
        case 'continue':
          this.advance();
          return this.simple(token.value, [], [], token);
        case 'global':
        case 'nonlocal': {
          this.advance();
          const names = [this.expectName()];
          while (this.acceptOp(',')) names.push(this.expectName());
          return this.simple(token.value, names, [], token);
        }
        case 'del': {
          this.advance();
          const targets = this.parseTargetList();
          return this.simple('del', [], targets.kind === 'Tuple' ? targets.elements : [targets], token);
        }
        case 'assert': {
          this.advance();
          const values = [this.parseTest()];
          if (this.acceptOp(',')) values.push(this.parseTest());
          return this.simple('assert', [], values, token);
        }
        case 'return': {
          this.advance();
          const value = this.atSimpleEnd() ? null : this.parseStarExpressions();
          return { kind: 'Return', value, ...this.at(token) };
        }
        case 'raise': {
          this.advance();
          const exc = this.atSimpleEnd() ? null : this.parseTest();
          const cause = exc && this.acceptKeyword('from') ? this.parseTest() : null;
          return { kind: 'Raise', exc, cause, ...this.at(token) };
        }
        case 'import':
          return this.parseImport();
        case 'from':
          return this.parseImportFrom();
        case 'type':
          if (this.startsTypeAlias()) return this.parseTypeAlias();
          break;
      }
    }
    return this.parseExpressionStatement();
  }

  /** `type X = ...` or `type X[T] = ...`; `type(x)` and `type = 3` stay expressions */
  private startsTypeAlias(): boolean {
    const name = this.peek();
    if (name.type !== 'NAME' || KEYWORDS.has(name.value)) return false;
    const after = this.peek(2);
    return this.isOp('=', after) || this.isOp('[', after);
  }

  /** Read as a plain assignment so the alias resolves like `X = ...` */
  private parseTypeAlias(): StmtNode {
    const start = this.advance();
    const token = this.current;
    const target: NameNode = { kind: 'Name', id: this.expectName(), ...this.at(token) };
    this.skipTypeParameters();
    this.expectOp('=');
    return { kind: 'Assign', targets: [target], value: this.parseTest(), ...this.at(start) };
  }

  private simple(keyword: SimpleKeyword, names: string[], values: ExprNode[], token: Token): StmtNode {
    return { kind: 'Simple', keyword, names, values, ...this.at(token) };
  }

  private parseAssignedValue(): ExprNode {
    return this.isKeyword('yield') ? this.parseYield() : this.parseStarExpressions();
  }

  private parseExpressionStatement(): StmtNode {
    const start = this.current;
    const first = this.parseAssignedValue();

    if (this.acceptOp(':')) {
      const annotation = this.parseTest();
      const value = this.acceptOp('=') ? this.parseAssignedValue() : null;
      return { kind: 'AnnAssign', target: first, annotation, value, ...this.at(start) };
    }

    if (this.isOp('=')) {
      const chain: ExprNode[] = [first];
      while (this.acceptOp('=')) chain.push(this.parseAssignedValue());
      const value = chain[chain.length - 1];
      return { kind: 'Assign', targets: chain.slice(0, -1), value, ...this.at(start) };
    }

    const operator = this.current;
    if (operator.type === 'OP' && AUGMENTED.has(operator.value)) {
      this.advance();
      const value = this.parseAssignedValue();
      return { kind: 'AugAssign', target: first, op: operator.value.slice(0, -1), value, ...this.at(start) };
    }

    return { kind: 'ExprStmt', value: first, ...this.at(start) };
  }

  private parseDottedName(): string {
    let name = this.expectName();
    while (this.acceptOp('.')) name += `.${this.expectName()}`;
    return name;
  }

  private parseImport(): ImportNode {
    const start = this.advance();
    const names: AliasNode[] = [];
    do {
      const token = this.current;
      const name = this.parseDottedName();
      const asname = this.acceptKeyword('as') ? this.expectName() : null;
      names.push({ kind: 'Alias', name, asname, ...this.at(token) });
    } while (this.acceptOp(','));
    return { kind: 'Import', names, ...this.at(start) };
  }

  private parseImportFrom(): ImportFromNode {
    const start = this.advance();
    let level = 0;
    for (;;) {
      if (this.acceptOp('.')) level += 1;
      else if (this.acceptOp('...')) level += 3;
      else break;
    }
    const module = this.isKeyword('import') ? '' : this.parseDottedName();
    if (module === '' && level === 0) throw this.error('expected module name');
    this.expectKeyword('import');

    const names: AliasNode[] = [];
    const starToken = this.current;
    if (this.acceptOp('*')) {
      names.push({ kind: 'Alias', name: '*', asname: null, ...this.at(starToken) });
      return { kind: 'ImportFrom', module, level, names, ...this.at(start) };
    }

    const parenthesized = this.acceptOp('(');
    do {
      if (parenthesized && this.isOp(')')) break;
      const token = this.current;
      const name = this.expectName();
      const asname = this.acceptKeyword('as') ? this.expectName() : null;
      names.push({ kind: 'Alias', name, asname, ...this.at(token) });
    } while (this.acceptOp(','));
    if (parenthesized) this.expectOp(')');
    return { kind: 'ImportFrom', module, level, names, ...this.at(start) };
  }

  // ─── Expressions ───────────────────────────────────────────────────

  private parseStarExpressions(): ExprNode {
    const start = this.current;
    const first = this.parseStarOrTest();
    if (!this.isOp(',')) return first;
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.atExpressionEnd() || this.isKeyword('in')) break;
      elements.push(this.parseStarOrTest());
    }
    return { kind: 'Tuple', elements, ...this.at(start) };
  }

  private parseStarOrTest(): ExprNode {
    const token = this.current;
    if (this.acceptOp('*')) {
      return { kind: 'Starred', value: this.parseBitOr(), ...this.at(token) };
    }
    return this.parseNamedExpr();
  }

  /** Assignment targets of `for`, `del` and comprehensions; stops before `in` */
  private parseTargetList(): ExprNode {
    const start = this.current;
    const parseTarget = (): ExprNode => {
      const token = this.current;
      if (this.acceptOp('*')) return { kind: 'Starred', value: this.parseBitOr(), ...this.at(token) };
      return this.parseBitOr();
    };
    const first = parseTarget();
    if (!this.isOp(',')) return first;
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.isKeyword('in') || this.atExpressionEnd()) break;
      elements.push(parseTarget());
    }
    return { kind: 'Tuple', elements, ...this.at(start) };
  }

  private parseNamedExpr(): ExprNode {
    const token = this.current;
    if (token.type === 'NAME' && !KEYWORDS.has(token.value) && this.isOp(':=', this.peek())) {
      this.advance();
      this.advance();
      const target: NameNode = { kind: 'Name', id: token.value, ...this.at(token) };
      return { kind: 'NamedExpr', target, value: this.parseTest(), ...this.at(token) };
    }
    return this.parseTest();
  }

  private parseTest(): ExprNode {
    if (this.isKeyword('lambda')) return this.parseLambda();
    const body = this.parseOrTest();
    if (!this.acceptKeyword('if')) return body;
    const test = this.parseOrTest();
    this.expectKeyword('else');
    const orelse = this.parseTest();
    return { kind: 'IfExp', test, body, orelse, line: body.line, column: body.column };
  }

  private parseLambda(): ExprNode {
    const start = this.advance();
    const params = this.parseParameters(':', false);
    this.expectOp(':');
    return { kind: 'Lambda', params, body: this.parseTest(), ...this.at(start) };
  }

  private parseOrTest(): ExprNode {
    const first = this.parseAndTest();
    if (!this.isKeyword('or')) return first;
    const values = [first];
    while (this.acceptKeyword('or')) values.push(this.parseAndTest());
    return { kind: 'BoolOp', op: 'or', values, line: first.line, column: first.column };
  }

  private parseAndTest(): ExprNode {
    const first = this.parseNotTest();
    if (!this.isKeyword('and')) return first;
    const values = [first];
    while (this.acceptKeyword('and')) values.push(this.parseNotTest());
    return { kind: 'BoolOp', op: 'and', values, line: first.line, column: first.column };
  }

  private parseNotTest(): ExprNode {
    const token = this.current;
    if (this.acceptKeyword('not')) {
      return { kind: 'UnaryOp', op: 'not', operand: this.parseNotTest(), ...this.at(token) };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExprNode {
    const left = this.parseBitOr();
    const ops: string[] = [];
    const comparators: ExprNode[] = [];
    for (;;) {
      const op = this.acceptComparisonOperator();
      if (op === null) break;
      ops.push(op);
      comparators.push(this.parseBitOr());
    }
    if (ops.length === 0) return left;
    return { kind: 'Compare', left, ops, comparators, line: left.line, column: left.column };
  }

  private acceptComparisonOperator(): string | null {
    const token = this.current;
    if (token.type === 'OP' && COMPARISON.has(token.value)) {
      this.advance();
      return token.value;
    }
    if (this.acceptKeyword('in')) return 'in';
    if (this.isKeyword('not') && this.isKeyword('in', this.peek())) {
      this.advance();
      this.advance();
      return 'not in';
    }
    if (this.acceptKeyword('is')) {
      return this.acceptKeyword('not') ? 'is not' : 'is';
    }
    return null;
  }

  private parseBinary(operators: readonly string[], operand: () => ExprNode): ExprNode {
    let left = operand();
    for (;;) {
      const token = this.current;
      if (token.type !== 'OP' || !operators.includes(token.value)) return left;
      this.advance();
      const right = operand();
      left = { kind: 'BinOp', op: token.value, left, right, line: left.line, column: left.column };
    }
  }

  private parseBitOr(): ExprNode {
    return this.parseBinary(['|'], () => this.parseBitXor());
  }

  private parseBitXor(): ExprNode {
    return this.parseBinary(['^'], () => this.parseBitAnd());
  }

  private parseBitAnd(): ExprNode {
    return this.parseBinary(['&'], () => this.parseShift());
  }

  private parseShift(): ExprNode {
    return this.parseBinary(['<<', '>>'], () => this.parseArith());
  }

  private parseArith(): ExprNode {
    return this.parseBinary(['+', '-'], () => this.parseTerm());
  }

  private parseTerm(): ExprNode {
    return this.parseBinary(['*', '/', '//', '%', '@'], () => this.parseFactor());
  }

  private parseFactor(): ExprNode {
    const token = this.current;
    if (this.isOp('-') || this.isOp('+') || this.isOp('~')) {
      this.advance();
      const op = token.value === '-' ? '-' : token.value === '+' ? '+' : '~';
      return { kind: 'UnaryOp', op, operand: this.parseFactor(), ...this.at(token) };
    }
    return this.parsePower();
  }

  private parsePower(): ExprNode {
    const base = this.parseAwaitPrimary();
    if (!this.acceptOp('**')) return base;
    return { kind: 'BinOp', op: '**', left: base, right: this.parseFactor(), line: base.line, column: base.column };
  }

  private parseAwaitPrimary(): ExprNode {
    const token = this.current;
    if (this.acceptKeyword('await')) {
      return { kind: 'Await', value: this.parsePrimary(), ...this.at(token) };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExprNode {
    let node = this.parseAtom();
    for (;;) {
      const position = { line: node.line, column: node.column };
      if (this.acceptOp('.')) {
        node = { kind: 'Attribute', value: node, attr: this.expectName(), ...position };
      } else if (this.acceptOp('(')) {
        const { args, keywords } = this.parseCallArguments();
        this.expectOp(')');
        node = { kind: 'Call', func: node, args, keywords, ...position };
      } else if (this.acceptOp('[')) {
        const slice = this.parseSubscriptList();
        this.expectOp(']');
        node = { kind: 'Subscript', value: node, slice, ...position };
      } else {
        return node;
      }
    }
  }

  private parseCallArguments(): { args: ExprNode[]; keywords: KeywordNode[] } {
    const args: ExprNode[] = [];
    const keywords: KeywordNode[] = [];
    while (!this.isOp(')')) {
      const token = this.current;
      if (this.acceptOp('**')) {
        keywords.push({ kind: 'Keyword', arg: null, value: this.parseTest(), ...this.at(token) });
      } else if (this.acceptOp('*')) {
        args.push({ kind: 'Starred', value: this.parseTest(), ...this.at(token) });
      } else if (token.type === 'NAME' && this.isOp('=', this.peek())) {
        this.advance();
        this.advance();
        keywords.push({ kind: 'Keyword', arg: token.value, value: this.parseTest(), ...this.at(token) });
      } else {
        const value = this.parseNamedExpr();
        args.push(this.atComprehension() ? this.parseComprehension('generator', value, null, token) : value);
      }
      if (!this.acceptOp(',')) break;
    }
    return { args, keywords };
  }

  private parseSubscriptList(): ExprNode {
    const start = this.current;
    const first = this.parseSliceItem();
    if (!this.isOp(',')) return first;
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.isOp(']')) break;
      elements.push(this.parseSliceItem());
    }
    return { kind: 'Tuple', elements, ...this.at(start) };
  }

  private parseSliceItem(): ExprNode {
    const start = this.current;
    let lower: ExprNode | null = null;
    if (!this.isOp(':')) {
      lower = this.isOp('*') ? this.parseStarOrTest() : this.parseNamedExpr();
      if (!this.isOp(':')) return lower;
    }
    this.expectOp(':');
    const upper = this.isOp(':') || this.isOp(']') || this.isOp(',') ? null : this.parseTest();
    let step: ExprNode | null = null;
    if (this.acceptOp(':') && !this.isOp(']') && !this.isOp(',')) step = this.parseTest();
    return { kind: 'Slice', lower, upper, step, ...this.at(start) };
  }

  private parseAtom(): ExprNode {
    const token = this.current;
    switch (token.type) {
      case 'NAME':
        if (token.value === 'True' || token.value === 'False') {
          this.advance();
          return this.constant('bool', token.value, token);
        }
        if (token.value === 'None') {
          this.advance();
          return this.constant('None', 'None', token);
        }
        if (KEYWORDS.has(token.value)) throw this.error('invalid syntax');
        this.advance();
        return { kind: 'Name', id: token.value, ...this.at(token) };
      case 'NUMBER':
        this.advance();
        return this.constant(numberType(token.value), token.value, token);
      case 'STRING':
        return this.parseStrings();
      case 'OP':
        if (token.value === '(') return this.parseParenthesized();
        if (token.value === '[') return this.parseListDisplay();
        if (token.value === '{') return this.parseBraceDisplay();
        if (token.value === '...') {
          this.advance();
          return this.constant('Ellipsis', '...', token);
        }
        break;
    }
    throw this.error('invalid syntax');
  }

  private constant(type: ConstantNode['type'], value: string, token: Token, formatted = false): ConstantNode {
    return { kind: 'Constant', type, value, formatted, ...this.at(token) };
  }

  /** Adjacent literals concatenate: `"a" "b"` is one constant */
  private parseStrings(): ExprNode {
    const start = this.current;
    let type: 'str' | 'bytes' | null = null;
    let value = '';
    let formatted = false;
    while (this.current.type === 'STRING') {
      const decoded = decodeString(this.advance());
      type = type ?? decoded.type;
      value += decoded.value;
      formatted = formatted || decoded.formatted;
    }
    return this.constant(type ?? 'str', value, start, formatted);
  }

  private parseYield(): ExprNode {
    const start = this.advance();
    if (this.acceptKeyword('from')) {
      return { kind: 'Yield', value: this.parseTest(), isFrom: true, ...this.at(start) };
    }
    const value = this.atExpressionEnd() ? null : this.parseStarExpressions();
    return { kind: 'Yield', value, isFrom: false, ...this.at(start) };
  }

  private parseParenthesized(): ExprNode {
    const start = this.advance();
    if (this.acceptOp(')')) return { kind: 'Tuple', elements: [], ...this.at(start) };
    if (this.isKeyword('yield')) {
      const value = this.parseYield();
      this.expectOp(')');
      return value;
    }
    const first = this.parseStarOrTest();
    if (this.atComprehension()) {
      const comprehension = this.parseComprehension('generator', first, null, start);
      this.expectOp(')');
      return comprehension;
    }
    if (!this.isOp(',')) {
      this.expectOp(')');
      return first;
    }
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.isOp(')')) break;
      elements.push(this.parseStarOrTest());
    }
    this.expectOp(')');
    return { kind: 'Tuple', elements, ...this.at(start) };
  }

  private parseListDisplay(): ExprNode {
    const start = this.advance();
    if (this.acceptOp(']')) return { kind: 'List', elements: [], ...this.at(start) };
    const first = this.parseStarOrTest();
    if (this.atComprehension()) {
      const comprehension = this.parseComprehension('list', first, null, start);
      this.expectOp(']');
      return comprehension;
    }
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.isOp(']')) break;
      elements.push(this.parseStarOrTest());
    }
    this.expectOp(']');
    return { kind: 'List', elements, ...this.at(start) };
  }

  private parseBraceDisplay(): ExprNode {
    const start = this.advance();
    if (this.acceptOp('}')) return { kind: 'Dict', keys: [], values: [], ...this.at(start) };

    const keys: (ExprNode | null)[] = [];
    const values: ExprNode[] = [];
    const parseDictEntry = (): void => {
      if (this.acceptOp('**')) {
        keys.push(null);
        values.push(this.parseBitOr());
        return;
      }
      keys.push(this.parseTest());
      this.expectOp(':');
      values.push(this.parseTest());
    };

    if (this.isOp('**')) {
      parseDictEntry();
    } else {
      const first = this.parseStarOrTest();
      if (!this.acceptOp(':')) {
        // Set display or set comprehension
        if (this.atComprehension()) {
          const comprehension = this.parseComprehension('set', first, null, start);
          this.expectOp('}');
          return comprehension;
        }
        const elements = [first];
        while (this.acceptOp(',')) {
          if (this.isOp('}')) break;
          elements.push(this.parseStarOrTest());
        }
        this.expectOp('}');
        return { kind: 'Set', elements, ...this.at(start) };
      }
      const value = this.parseTest();
      if (this.atComprehension()) {
        const comprehension = this.parseComprehension('dict', first, value, start);
        this.expectOp('}');
        return comprehension;
      }
      keys.push(first);
      values.push(value);
    }

    while (this.acceptOp(',')) {
      if (this.isOp('}')) break;
      parseDictEntry();
    }
    this.expectOp('}');
    return { kind: 'Dict', keys, values, ...this.at(start) };
  }

  private parseComprehension(
    collection: ComprehensionNode['collection'],
    element: ExprNode,
    value: ExprNode | null,
    start: Token,
  ): ComprehensionNode {
    const generators: ComprehensionForNode[] = [];
    while (this.atComprehension()) {
      const token = this.current;
      this.acceptKeyword('async');
      this.expectKeyword('for');
      const target = this.parseTargetList();
      this.expectKeyword('in');
      const iter = this.parseOrTest();
      const conditions: ExprNode[] = [];
      while (this.acceptKeyword('if')) conditions.push(this.parseOrTest());
      generators.push({ kind: 'ComprehensionFor', target, iter, conditions, ...this.at(token) });
    }
    return { kind: 'Comprehension', collection, element, value, generators, ...this.at(start) };
  }
}

function numberType(text: string): 'int' | 'float' | 'complex' {
  if (/^0[xXoObB]/.test(text)) return 'int';
  if (/[jJ]$/.test(text)) return 'complex';
  return /[.eE]/.test(text) ? 'float' : 'int';
}

/** Names a case pattern binds; `_`, class names and dotted values bind nothing */
function patternCaptures(pattern: ExprNode): NameNode[] {
  switch (pattern.kind) {
    case 'Name':
      return pattern.id === '_' ? [] : [pattern];
    case 'Starred':
      return patternCaptures(pattern.value);
    case 'Tuple':
    case 'List':
      return pattern.elements.flatMap(patternCaptures);
    case 'Dict':
      return pattern.values.flatMap(patternCaptures);
    case 'Call':
      return [...pattern.args, ...pattern.keywords.map(keyword => keyword.value)].flatMap(patternCaptures);
    case 'BinOp':
      // Alternatives must bind the same names
      return pattern.op === '|' ? patternCaptures(pattern.left) : [];
    default:
      return [];
  }
}
