/**
 * Shared setup for tests that need a parsed Python program
 */

import { Program, walk } from '@demeter-lint/python-ast';
import type { ModuleSource, ProgramOptions } from '@demeter-lint/python-ast';
import { DefaultProvenanceOracle } from '@demeter-lint/core';
import type { ClassValue, InferredValue, Logger, ModuleRecord, PyNode, PyNodeKind } from '@demeter-lint/types';

export const PROJECT_ROOT = '/project';

export type NodeOfKind<K extends PyNodeKind> = Extract<PyNode, { kind: K }>;

export interface TestProgram {
  program: Program;
  oracle: DefaultProvenanceOracle;
  record: ModuleRecord;
}

/**
 * Program with one source module `name` at /project/<name as path>.py.
 * Stdlib names are known, nothing else is loadable unless `modules` has it.
 */
export function buildProgram(
  source: string,
  name = 'app.service',
  modules: Record<string, string> = {},
  create: (options: ProgramOptions) => Program = options => new Program(options),
): TestProgram {
  const oracle = new DefaultProvenanceOracle(PROJECT_ROOT);
  const program = create({
    isKnownModule: moduleName => oracle.isStdlibModule(moduleName),
    loader: (moduleName): ModuleSource | null => {
      const text = modules[moduleName];
      if (text === undefined) return null;
      return { name: moduleName, source: text, file: fileFor(moduleName) };
    },
  });
  const record = program.addModule({ name, source, file: fileFor(name) });
  return { program, oracle, record };
}

/** Program whose type queries all throw; scopes and lookups still work */
export class FailingProgram extends Program {
  infer(): InferredValue[] {
    throw new Error('inference failed');
  }

  enclosingClass(): ClassValue | null {
    throw new Error('enclosing class failed');
  }

  findClass(): ClassValue | null {
    throw new Error('class lookup failed');
  }

  ancestors(): ClassValue[] {
    throw new Error('ancestry failed');
  }
}

export function fileFor(moduleName: string): string {
  return `${PROJECT_ROOT}/${moduleName.split('.').join('/')}.py`;
}

function isKind<K extends PyNodeKind>(node: PyNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

export function findAll<K extends PyNodeKind>(root: PyNode, kind: K): NodeOfKind<K>[] {
  const found: NodeOfKind<K>[] = [];
  walk(root, node => {
    if (isKind(node, kind)) found.push(node);
  });
  return found;
}

/** First node of `kind` (pre-order) matching `predicate`; throws when none does */
export function findNode<K extends PyNodeKind>(
  root: PyNode,
  kind: K,
  predicate: (node: NodeOfKind<K>) => boolean = () => true,
): NodeOfKind<K> {
  const match = findAll(root, kind).find(predicate);
  if (!match) throw new Error(`No ${kind} node found`);
  return match;
}

/** Call whose callee is an attribute access `.attr` */
export function findMethodCall(root: PyNode, attr: string): NodeOfKind<'Call'> {
  return findNode(root, 'Call', call => call.func.kind === 'Attribute' && call.func.attr === attr);
}

export interface CapturingLogger extends Logger {
  messages: { level: string; message: string; context?: Record<string, unknown> }[];
}

export function capturingLogger(): CapturingLogger {
  const messages: CapturingLogger['messages'] = [];
  const record = (level: string) => (message: string, context?: Record<string, unknown>): void => {
    messages.push({ level, message, context });
  };
  return {
    messages,
    error: record('error'),
    warn: record('warn'),
    info: record('info'),
    debug: record('debug'),
    trace: record('trace'),
  };
}
