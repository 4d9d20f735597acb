/**
 * Builtin namespace table, loaded once from data/builtins.json.
 *
 * Class names are stored unqualified (`str`); every return type is a
 * fully qualified name (`builtins.list`, `io.TextIOWrapper`).
 */
import { readFileSync } from 'fs';

export interface BuiltinTable {
  /** class name → unqualified base names */
  classes: Map<string, string[]>;
  /** function name → return QName, null when it depends on the arguments */
  functions: Map<string, string | null>;
  /** module-level dunder names and singletons → QName of their type */
  constants: Map<string, string>;
  /** class QName → method name → return QName */
  methods: Map<string, Map<string, string | null>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringMap(value: unknown, section: string): Map<string, string | null> {
  if (!isRecord(value)) throw new Error(`builtins.json: "${section}" must be an object`);
  const result = new Map<string, string | null>();
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== null && typeof entry !== 'string') {
      throw new Error(`builtins.json: "${section}.${key}" must be a string or null`);
    }
    result.set(key, entry);
  }
  return result;
}

export function parseBuiltinTable(raw: unknown): BuiltinTable {
  if (!isRecord(raw)) throw new Error('builtins.json: expected an object');

  const classes = new Map<string, string[]>();
  if (!isRecord(raw.classes)) throw new Error('builtins.json: "classes" must be an object');
  for (const [name, bases] of Object.entries(raw.classes)) {
    if (!Array.isArray(bases) || !bases.every((base): base is string => typeof base === 'string')) {
      throw new Error(`builtins.json: bases of "${name}" must be a string array`);
    }
    classes.set(name, bases);
  }

  const constants = new Map<string, string>();
  for (const [name, qname] of stringMap(raw.constants, 'constants')) {
    if (qname !== null) constants.set(name, qname);
  }

  const methods = new Map<string, Map<string, string | null>>();
  if (!isRecord(raw.methods)) throw new Error('builtins.json: "methods" must be an object');
  for (const [owner, table] of Object.entries(raw.methods)) {
    methods.set(owner, stringMap(table, `methods.${owner}`));
  }

  return { classes, functions: stringMap(raw.functions, 'functions'), constants, methods };
}

let table: BuiltinTable | null = null;

export function builtins(): BuiltinTable {
  if (!table) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../data/builtins.json', import.meta.url), 'utf-8'));
    table = parseBuiltinTable(raw);
  }
  return table;
}

export function isBuiltinName(name: string): boolean {
  const data = builtins();
  return data.classes.has(name) || data.functions.has(name) || data.constants.has(name);
}

export function isBuiltinClass(name: string): boolean {
  return builtins().classes.has(name);
}

/**
 * Return type of `<classQName>.<method>()`, searching builtin bases.
 * undefined when the method is not in the table.
 */
export function builtinMethodReturn(classQName: string, method: string): string | null | undefined {
  const data = builtins();
  const seen = new Set<string>();
  const queue = [classQName];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    const found = data.methods.get(current)?.get(method);
    if (found !== undefined) return found;
    if (current.startsWith('builtins.')) {
      const bases = data.classes.get(current.slice('builtins.'.length)) ?? [];
      queue.push(...bases.map(base => `builtins.${base}`));
    }
  }
  return undefined;
}
