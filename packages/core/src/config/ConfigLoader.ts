import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { isLogLevel } from '@demeter-lint/types';
import type { LogLevel } from '@demeter-lint/types';
import { ConfigError } from '../errors/LinterError.js';

/**
 * demeter-lint configuration schema.
 *
 * Location: .demeter-lint/config.yaml (preferred) or .demeter-lint/config.json
 *
 * Example config.yaml:
 *
 * ```yaml
 * sourceRoots:
 *   - src
 * exclude:
 *   - "**\/migrations/**"
 * allowedLodRoots:
 *   - pydantic
 * allowedLodMethods:
 *   - myapp.services.Registry.lookup
 * layerMap:
 *   myapp.domain: Domain
 *   myapp.api.schemas: DTO
 * ```
 */
export interface LinterConfig {
  /**
   * Directories (relative to the project root) that module names are
   * derived from. `src/pkg/mod.py` under root `src` is module `pkg.mod`.
   */
  sourceRoots: string[];

  /** Glob patterns (minimatch) for files to check; undefined means all */
  include?: string[];

  /** Glob patterns (minimatch) for files to skip */
  exclude?: string[];

  /**
   * Module prefixes whose objects may be chained freely.
   * Always merged with DEFAULT_LOD_ROOTS.
   */
  allowedLodRoots: string[];

  /** Fully qualified callables exempt from the chain check */
  allowedLodMethods: string[];

  /**
   * Module prefix → layer name. Receivers from a layer whose name contains
   * "domain" or "dto" are plain data and may be chained.
   */
  layerMap: Record<string, string>;

  /** Glob patterns for test files, which are never checked */
  testPatterns: string[];

  /** Extra directories searched for imported modules (site-packages, vendored code) */
  searchPaths: string[];

  logLevel?: LogLevel;
}

export const DEFAULT_LOD_ROOTS: readonly string[] = [
  'builtins',
  'typing',
  'importlib',
  'pathlib',
  'ast',
  'os',
  'json',
  'yaml',
  'logging',
];

export const DEFAULT_TEST_PATTERNS: readonly string[] = [
  '**/tests/**',
  '**/test_*.py',
  '**/*_test.py',
  '**/conftest.py',
];

export const CONFIG_DIR = '.demeter-lint';

export const DEFAULT_CONFIG: LinterConfig = {
  sourceRoots: ['.'],
  allowedLodRoots: [...DEFAULT_LOD_ROOTS],
  allowedLodMethods: [],
  layerMap: {},
  testPatterns: [...DEFAULT_TEST_PATTERNS],
  searchPaths: [],
};

/**
 * Load config from a project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * A file that does not parse is reported through `logger.warn` and the
 * defaults are used. A file that parses but has the wrong shape throws
 * ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): LinterConfig {
  const configDir = join(projectPath, CONFIG_DIR);
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  let parsed: unknown;
  let source: string;

  if (existsSync(yamlPath)) {
    source = yamlPath;
    try {
      parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else if (existsSync(jsonPath)) {
    source = jsonPath;
    try {
      parsed = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else {
    return DEFAULT_CONFIG;
  }

  // Empty file
  if (parsed === undefined || parsed === null) {
    return DEFAULT_CONFIG;
  }

  // Validation stays outside the parse try/catch - shape errors must throw
  return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed, source, logger));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, source: string): ConfigError {
  return new ConfigError(
    `Config error: ${message}`,
    'ERR_CONFIG_INVALID',
    { filePath: source },
    `Fix ${CONFIG_DIR}/ config or delete it to use defaults`
  );
}

/**
 * Validate a list of non-empty strings. undefined/null means "not set".
 * @throws ConfigError
 */
export function validateStringList(value: unknown, field: string, source = 'config'): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalid(`${field} must be an array, got ${typeof value}`, source);
  }
  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    if (typeof item !== 'string') {
      throw invalid(`${field}[${i}] must be a string, got ${typeof item}`, source);
    }
    if (!item.trim()) {
      throw invalid(`${field}[${i}] cannot be empty or whitespace-only`, source);
    }
    result.push(item);
  }
  return result;
}

/**
 * Validate include/exclude patterns.
 * Warns (does not throw) on an empty include list, which matches nothing.
 * @throws ConfigError
 */
export function validatePatterns(
  include: unknown,
  exclude: unknown,
  logger: { warn: (msg: string) => void },
  source = 'config'
): { include?: string[]; exclude?: string[] } {
  const includeList = validateStringList(include, 'include', source);
  if (includeList && includeList.length === 0) {
    logger.warn('Warning: include is an empty array - no files will be checked');
  }
  return { include: includeList, exclude: validateStringList(exclude, 'exclude', source) };
}

/**
 * Validate layerMap: an object of module prefix → layer name.
 * @throws ConfigError
 */
export function validateLayerMap(value: unknown, source = 'config'): Record<string, string> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw invalid(`layerMap must be an object, got ${Array.isArray(value) ? 'array' : typeof value}`, source);
  }
  const result: Record<string, string> = {};
  for (const [prefix, layer] of Object.entries(value)) {
    if (typeof layer !== 'string' || !layer.trim()) {
      throw invalid(`layerMap.${prefix} must be a non-empty string`, source);
    }
    result[prefix] = layer;
  }
  return result;
}

/**
 * Check the parsed file against the schema.
 * @throws ConfigError
 */
export function validateConfig(
  parsed: unknown,
  source: string,
  logger: { warn: (msg: string) => void } = console
): Partial<LinterConfig> {
  if (!isRecord(parsed)) {
    throw invalid(`expected a mapping at the top level, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`, source);
  }

  const { include, exclude } = validatePatterns(parsed.include, parsed.exclude, logger, source);

  let logLevel: LogLevel | undefined;
  if (parsed.logLevel !== undefined && parsed.logLevel !== null) {
    if (!isLogLevel(parsed.logLevel)) {
      throw invalid(`logLevel must be one of silent, errors, warnings, info, debug; got ${String(parsed.logLevel)}`, source);
    }
    logLevel = parsed.logLevel;
  }

  return {
    sourceRoots: validateStringList(parsed.sourceRoots, 'sourceRoots', source),
    include,
    exclude,
    allowedLodRoots: validateStringList(parsed.allowedLodRoots, 'allowedLodRoots', source),
    allowedLodMethods: validateStringList(parsed.allowedLodMethods, 'allowedLodMethods', source),
    layerMap: validateLayerMap(parsed.layerMap, source),
    testPatterns: validateStringList(parsed.testPatterns, 'testPatterns', source),
    searchPaths: validateStringList(parsed.searchPaths, 'searchPaths', source),
    logLevel,
  };
}

/**
 * Merge user config with defaults.
 * Safe roots are additive; every other field replaces its default.
 */
export function mergeConfig(
  defaults: LinterConfig,
  user: Partial<LinterConfig>
): LinterConfig {
  const roots = new Set([...defaults.allowedLodRoots, ...(user.allowedLodRoots ?? [])]);
  return {
    sourceRoots: user.sourceRoots ?? defaults.sourceRoots,
    // undefined means "no filtering"
    include: user.include ?? undefined,
    exclude: user.exclude ?? undefined,
    allowedLodRoots: [...roots],
    allowedLodMethods: user.allowedLodMethods ?? defaults.allowedLodMethods,
    layerMap: user.layerMap ?? defaults.layerMap,
    testPatterns: user.testPatterns ?? defaults.testPatterns,
    searchPaths: user.searchPaths ?? defaults.searchPaths,
    logLevel: user.logLevel ?? defaults.logLevel,
  };
}
