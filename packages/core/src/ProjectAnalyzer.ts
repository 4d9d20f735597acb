/**
 * ProjectAnalyzer - checks every Python file of a project.
 *
 * Flow:
 * ```
 * discover .py files → include/exclude/test filters (minimatch)
 *   → module names from sourceRoots → Program (plus on-demand loader
 *   for stubs/ and searchPaths) → CouplingChecker per module
 *   → DiagnosticCollector
 * ```
 *
 * A file that cannot be read or parsed becomes a diagnostic and the run
 * goes on without it.
 */
import { readdirSync, readFileSync, existsSync, statSync } from 'fs';
import { join, relative, resolve, sep, basename } from 'path';
import { minimatch } from 'minimatch';
import type { Logger, ModuleRecord, Violation } from '@demeter-lint/types';
import { Program, PythonSyntaxError } from '@demeter-lint/python-ast';
import type { ModuleSource } from '@demeter-lint/python-ast';
import type { LinterConfig } from './config/ConfigLoader.js';
import { DiagnosticCollector, CollectorSink } from './diagnostics/DiagnosticCollector.js';
import { FileAccessError, LanguageError, AnalysisError } from './errors/LinterError.js';
import { silentLogger } from './logging/Logger.js';
import { QNameResolver } from './resolution/QNameResolver.js';
import { DefaultProvenanceOracle } from './provenance/ProvenanceOracle.js';
import { FileStubResolver, STUBS_DIR } from './provenance/StubResolver.js';
import { ProvenanceClassifier } from './provenance/ProvenanceClassifier.js';
import { StructuralCouplingAnalyzer } from './coupling/StructuralCouplingAnalyzer.js';
import { CouplingChecker } from './coupling/CouplingChecker.js';

/** Directories never descended into */
const SKIPPED_DIRS = new Set(['__pycache__', '.venv', 'venv', 'node_modules', 'site-packages']);

export interface ProjectAnalyzerOptions {
  logger?: Logger;
}

export interface AnalysisResult {
  collector: DiagnosticCollector;
  violations: Violation[];
  /** Checked files, relative to the project root */
  files: string[];
  program: Program;
}

interface ModuleName {
  name: string;
  isPackage: boolean;
}

export class ProjectAnalyzer {
  private readonly projectRoot: string;
  private readonly logger: Logger;
  private readonly sourceRoots: string[];

  constructor(
    projectPath: string,
    private readonly config: LinterConfig,
    options: ProjectAnalyzerOptions = {},
  ) {
    this.projectRoot = resolve(projectPath);
    this.logger = options.logger ?? silentLogger;
    // Most specific root first
    this.sourceRoots = config.sourceRoots
      .map(root => resolve(this.projectRoot, root))
      .sort((a, b) => b.length - a.length);
  }

  /**
   * @throws FileAccessError when the project directory does not exist
   */
  analyze(): AnalysisResult {
    if (!existsSync(this.projectRoot) || !statSync(this.projectRoot).isDirectory()) {
      throw new FileAccessError(
        `Project directory not found: ${this.projectRoot}`,
        'ERR_PROJECT_NOT_FOUND',
        { filePath: this.projectRoot },
        'Check the path passed to `demeter-lint check`'
      );
    }

    const collector = new DiagnosticCollector();
    const oracle = new DefaultProvenanceOracle(this.projectRoot);
    const program = new Program({
      loader: name => this.loadModule(name),
      isKnownModule: name => oracle.isStdlibModule(name),
      logger: this.logger,
    });

    const files = this.discoverFiles();
    this.logger.info('Checking files', { count: files.length });

    const records: { file: string; record: ModuleRecord }[] = [];
    for (const file of files) {
      const record = this.addFile(program, file, collector);
      if (record) records.push({ file, record });
    }

    const resolver = new QNameResolver(program, { logger: this.logger });
    const classifier = new ProvenanceClassifier(program, resolver, oracle, { logger: this.logger });
    const analyzer = new StructuralCouplingAnalyzer(
      program,
      { resolver, classifier, oracle, stubs: new FileStubResolver() },
      {
        projectRoot: this.projectRoot,
        allowedLodRoots: this.config.allowedLodRoots,
        allowedLodMethods: this.config.allowedLodMethods,
        layerMap: this.config.layerMap,
      },
      { logger: this.logger, isTestFile: file => this.isTestFile(file) },
    );
    const checker = new CouplingChecker(analyzer, {
      logger: this.logger,
      sink: new CollectorSink(collector, 'coupling', this.projectRoot),
    });

    const violations: Violation[] = [];
    for (const { file, record } of records) {
      try {
        violations.push(...checker.checkModule(record));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.debug('Checker failed', { module: record.name, error: message });
        collector.addError('coupling', new AnalysisError(
          `Analysis failed for ${this.relativePath(file)}: ${message}`,
          'ERR_ANALYSIS_INTERNAL',
          { filePath: this.relativePath(file), module: record.name },
          'Report this file to the demeter-lint maintainers'
        ));
      }
    }

    return { collector, violations, files: records.map(({ file }) => this.relativePath(file)), program };
  }

  // ─── Discovery ─────────────────────────────────────────────────────

  /**
   * Absolute paths of the `.py` files to check, sorted.
   * Test files and files filtered out by include/exclude are left out.
   */
  discoverFiles(): string[] {
    const found: string[] = [];
    const visit = (dir: string): void => {
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        if (entry.name.startsWith('.')) continue;
        const path = join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!SKIPPED_DIRS.has(entry.name)) visit(path);
        } else if (entry.isFile() && entry.name.endsWith('.py')) {
          found.push(path);
        }
      }
    };
    visit(this.projectRoot);

    return found
      .filter(file => !this.shouldSkip(this.relativePath(file)) && !this.isTestFile(file))
      .sort();
  }

  private shouldSkip(relativePath: string): boolean {
    const { include, exclude } = this.config;
    if (exclude && exclude.some(pattern => minimatch(relativePath, pattern, { dot: true }))) {
      return true;
    }
    if (include) {
      return !include.some(pattern => minimatch(relativePath, pattern, { dot: true }));
    }
    return false;
  }

  isTestFile(file: string): boolean {
    const relativePath = this.relativePath(file);
    return this.config.testPatterns.some(pattern => minimatch(relativePath, pattern, { dot: true }));
  }

  /** Project-relative path with forward slashes */
  relativePath(file: string): string {
    return relative(this.projectRoot, resolve(this.projectRoot, file)).split(sep).join('/');
  }

  /**
   * Dotted module name of a file under the most specific source root
   * containing it (the project root when none does).
   */
  moduleNameFor(file: string): ModuleName {
    const absolute = resolve(this.projectRoot, file);
    const root = this.sourceRoots.find(candidate => absolute.startsWith(candidate + sep)) ?? this.projectRoot;
    const parts = relative(root, absolute).replace(/\.pyi?$/, '').split(sep);
    const isPackage = parts[parts.length - 1] === '__init__';
    if (isPackage) parts.pop();
    const name = parts.length > 0 ? parts.join('.') : basename(root);
    return { name, isPackage };
  }

  // ─── Loading ───────────────────────────────────────────────────────

  private addFile(program: Program, file: string, collector: DiagnosticCollector): ModuleRecord | null {
    const relativePath = this.relativePath(file);
    let source: string;
    try {
      source = readFileSync(file, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      collector.addError('discovery', new FileAccessError(
        `Cannot read ${relativePath}: ${message}`,
        'ERR_FILE_UNREADABLE',
        { filePath: relativePath },
        'Check file permissions'
      ));
      return null;
    }

    const { name, isPackage } = this.moduleNameFor(file);
    if (program.modules().some(record => record.name === name)) {
      this.logger.warn('Duplicate module name, skipping file', { module: name, file: relativePath });
      return null;
    }

    try {
      return program.addModule({ name, source, file, isPackage, origin: 'source' });
    } catch (error) {
      if (!(error instanceof PythonSyntaxError)) throw error;
      collector.addError('parser', new LanguageError(
        `Cannot parse ${relativePath}: ${error.message}`,
        'ERR_PARSE_FAILURE',
        { filePath: relativePath, lineNumber: error.line, column: error.column, module: name },
        'Fix the syntax error; the file was skipped'
      ));
      return null;
    }
  }

  /**
   * Modules imported by the project but not among the checked files:
   * other sources under the source roots, then stubs/, then searchPaths.
   */
  private loadModule(name: string): ModuleSource | null {
    const path = name.split('.');
    const candidates: { file: string; isPackage: boolean; origin: ModuleSource['origin'] }[] = [];

    for (const root of this.sourceRoots) {
      candidates.push(
        { file: join(root, ...path) + '.py', isPackage: false, origin: 'source' },
        { file: join(root, ...path, '__init__.py'), isPackage: true, origin: 'source' },
      );
    }
    const stubs = join(this.projectRoot, STUBS_DIR);
    candidates.push(
      { file: join(stubs, ...path) + '.pyi', isPackage: false, origin: 'stub' },
      { file: join(stubs, ...path, '__init__.pyi'), isPackage: true, origin: 'stub' },
    );
    for (const searchPath of this.config.searchPaths) {
      const dir = resolve(this.projectRoot, searchPath);
      candidates.push(
        { file: join(dir, ...path) + '.pyi', isPackage: false, origin: 'source' },
        { file: join(dir, ...path) + '.py', isPackage: false, origin: 'source' },
        { file: join(dir, ...path, '__init__.pyi'), isPackage: true, origin: 'source' },
        { file: join(dir, ...path, '__init__.py'), isPackage: true, origin: 'source' },
      );
    }

    for (const candidate of candidates) {
      if (!existsSync(candidate.file)) continue;
      try {
        return { name, source: readFileSync(candidate.file, 'utf-8'), ...candidate };
      } catch (error) {
        this.logger.warn('Cannot read imported module', {
          module: name,
          file: candidate.file,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
    }
    return null;
  }
}
