/**
 * @demeter-lint/core - Type resolution, provenance and Law-of-Demeter checks
 */

// Error types
export {
  LinterError,
  ConfigError,
  FileAccessError,
  LanguageError,
  AnalysisError,
} from './errors/LinterError.js';
export type { ErrorContext, ErrorSeverity, LinterErrorJSON } from './errors/LinterError.js';

// Logging
export { RunLogger, LogFileTarget, terminalTarget, createLogger, silentLogger } from './logging/Logger.js';
export type { Logger, LogLevel, LogEntry, LogSeverity, LogTarget } from './logging/Logger.js';

// Diagnostics
export * from './diagnostics/index.js';

// Config
export * from './config/index.js';

// Type resolution
export * from './resolution/index.js';

// Provenance
export * from './provenance/index.js';

// Coupling
export * from './coupling/index.js';

// Project driver
export { ProjectAnalyzer } from './ProjectAnalyzer.js';
export type { ProjectAnalyzerOptions, AnalysisResult } from './ProjectAnalyzer.js';

// Version
export { LINTER_VERSION } from './version.js';
