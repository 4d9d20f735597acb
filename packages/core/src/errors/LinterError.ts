/**
 * LinterError - Error hierarchy for demeter-lint
 *
 * All errors extend the native Error class so they can travel through
 * ordinary throw/catch and still be reported as diagnostics.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation errors (fatal)
 * - FileAccessError: File system access errors (error)
 * - LanguageError: Unparseable Python sources (warning)
 * - AnalysisError: Internal analyzer failures (error)
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  column?: number;
  module?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of LinterError
 */
export interface LinterErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all demeter-lint errors.
 */
export abstract class LinterError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for the diagnostics log
   */
  toJSON(): LinterErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config parsing, validation, wrong field types
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_PATTERN
 */
export class ConfigError extends LinterError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable files, missing project root
 *
 * Severity: error
 * Codes: ERR_FILE_UNREADABLE, ERR_PROJECT_NOT_FOUND
 */
export class FileAccessError extends LinterError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Language error - Python source that does not parse
 *
 * Severity: warning (always)
 * Codes: ERR_PARSE_FAILURE
 */
export class LanguageError extends LinterError {
  readonly code: string;
  readonly severity = 'warning' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Analysis error - a checker failed on one module
 *
 * Severity: error
 * Codes: ERR_ANALYSIS_INTERNAL
 */
export class AnalysisError extends LinterError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
