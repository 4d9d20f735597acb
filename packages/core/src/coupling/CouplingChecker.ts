/**
 * CouplingChecker - drives the analyzer over every body of one module.
 *
 * Each function, method, class body and lambda gets its own StrangerMap;
 * the module body has one too. Statements are visited in source order,
 * calls pre-order (outer call before the calls nested in it). Decorators,
 * default values and base classes run in the enclosing body and are
 * checked with its map.
 */
import type {
  PyNode,
  StmtNode,
  DiagnosticSink,
  Logger,
  ModuleRecord,
  StrangerMap,
  Violation,
} from '@demeter-lint/types';
import { childNodes } from '@demeter-lint/python-ast';
import { silentLogger } from '../logging/Logger.js';
import type { StructuralCouplingAnalyzer } from './StructuralCouplingAnalyzer.js';

export interface CouplingCheckerOptions {
  logger?: Logger;
  /** Receives every violation as it is found */
  sink?: DiagnosticSink;
}

export class CouplingChecker {
  private readonly logger: Logger;
  private readonly sink: DiagnosticSink | null;

  constructor(
    private readonly analyzer: StructuralCouplingAnalyzer,
    options: CouplingCheckerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sink = options.sink ?? null;
  }

  checkModule(module: ModuleRecord): Violation[] {
    const violations: Violation[] = [];
    this.visitBody(module.node.body, violations);
    this.logger.debug('Checked module', { module: module.name, violations: violations.length });
    return violations;
  }

  private visitBody(body: readonly StmtNode[], violations: Violation[]): void {
    const strangers: StrangerMap = new Map();
    for (const statement of body) {
      this.visit(statement, strangers, violations);
    }
  }

  private visit(node: PyNode, strangers: StrangerMap, violations: Violation[]): void {
    switch (node.kind) {
      case 'FunctionDef':
        for (const decorator of node.decorators) this.visit(decorator, strangers, violations);
        for (const param of node.params) this.visit(param, strangers, violations);
        if (node.returns) this.visit(node.returns, strangers, violations);
        this.visitBody(node.body, violations);
        return;
      case 'ClassDef':
        for (const child of [...node.decorators, ...node.bases, ...node.keywords]) {
          this.visit(child, strangers, violations);
        }
        this.visitBody(node.body, violations);
        return;
      case 'Lambda': {
        for (const param of node.params) this.visit(param, strangers, violations);
        this.visit(node.body, new Map(), violations);
        return;
      }
      case 'Assign':
      case 'AnnAssign':
        this.visitChildren(node, strangers, violations);
        this.analyzer.recordAssign(node, strangers);
        return;
      case 'Call':
        this.report(this.analyzer.checkCall(node, strangers), violations);
        this.visitChildren(node, strangers, violations);
        return;
      default:
        this.visitChildren(node, strangers, violations);
    }
  }

  private visitChildren(node: PyNode, strangers: StrangerMap, violations: Violation[]): void {
    for (const child of childNodes(node)) {
      this.visit(child, strangers, violations);
    }
  }

  private report(found: Violation[], violations: Violation[]): void {
    for (const violation of found) {
      violations.push(violation);
      this.sink?.emit(violation.code, violation.message, violation.locations, violation.provenance);
    }
  }
}
