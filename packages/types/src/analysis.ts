/**
 * Analysis Types - qualified names, provenance and violations
 */

import type { PyNode } from './python.js';

// === QUALIFIED NAMES ===

export interface ResolvedQName {
  readonly kind: 'resolved';
  /** Fully qualified dotted name, e.g. `builtins.str`, `pkg.models.User` */
  readonly name: string;
}

export interface UnresolvedQName {
  readonly kind: 'unresolved';
}

export type QName = ResolvedQName | UnresolvedQName;

export const UNRESOLVED: UnresolvedQName = Object.freeze({ kind: 'unresolved' });

export function resolvedQName(name: string): ResolvedQName {
  return { kind: 'resolved', name };
}

export function isResolved(qname: QName): qname is ResolvedQName {
  return qname.kind === 'resolved';
}

// === PROVENANCE ===

export type ProvenanceClass =
  | 'primitive'
  | 'stdlib'
  | 'external'
  | 'local'
  | 'protocol'
  | 'fluent'
  | 'unknown';

// === VIOLATIONS ===

/** W9006 - train-wreck chain or stranger hand-off; W9019 - missing stub */
export type ViolationCode = 'W9006' | 'W9019';

export interface SourceLocation {
  readonly file: string | null;
  readonly line: number;
  readonly column: number;
}

export interface Violation {
  readonly code: ViolationCode;
  readonly message: string;
  readonly messageArgs: readonly string[];
  readonly locations: readonly SourceLocation[];
  readonly node: PyNode;
  /** Provenance of the offending receiver, when one could be classified */
  readonly provenance: ProvenanceClass;
}

/**
 * Names in one function body currently holding stranger call results.
 * Owned by the walker for that body.
 */
export type StrangerMap = Map<string, boolean>;

// === COLLABORATORS ===

export interface StubResolver {
  hasStub(moduleName: string, projectRoot: string): boolean;
}

export interface ProvenanceOracle {
  isStdlibModule(moduleName: string): boolean;
  isExternalDependency(filePath: string): boolean;
}

export interface DiagnosticSink {
  emit(code: string, message: string, locations: readonly SourceLocation[], provenance?: ProvenanceClass): void;
}
