import { CodesitterErrorCode } from './codes.js';

// Re-export for consumers
export { CodesitterErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all codesitter errors
 */
export class CodesitterError extends Error {
  constructor(
    message: string,
    public readonly code: CodesitterErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'CodesitterError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for structured log output
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

/**
 * Configuration errors (reading, YAML syntax, schema validation)
 */
export class ConfigError extends CodesitterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CodesitterErrorCode.CONFIG_INVALID, context, 'medium', true);
    this.name = 'ConfigError';
  }
}

/**
 * The syntax tree provider could not produce a usable tree for a file.
 */
export class ParseError extends CodesitterError {
  constructor(
    message: string,
    public readonly file?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, CodesitterErrorCode.PARSE_FAILED, { ...context, file }, 'medium', true);
    this.name = 'ParseError';
  }
}

/**
 * A language enrichment hook threw while decorating an element.
 * Never propagated out of extraction; logged and attached to nothing.
 */
export class EnrichmentError extends CodesitterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CodesitterErrorCode.ENRICHMENT_FAILED, context, 'low', true);
    this.name = 'EnrichmentError';
  }
}

/**
 * A call or import extraction pass failed for a whole file.
 */
export class RelationshipError extends CodesitterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CodesitterErrorCode.RELATIONSHIP_QUERY_FAILED, context, 'low', true);
    this.name = 'RelationshipError';
  }
}

/**
 * No analyzer is registered for a filename or language.
 */
export class NoAnalyzerError extends CodesitterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CodesitterErrorCode.NO_ANALYZER, context, 'low', true);
    this.name = 'NoAnalyzerError';
  }
}

/**
 * Registration was attempted on a registry that has already been sealed.
 */
export class RegistrySealedError extends CodesitterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CodesitterErrorCode.REGISTRY_SEALED, context, 'high', false);
    this.name = 'RegistrySealedError';
  }
}

/**
 * An analyzer plugin module could not be imported or has the wrong shape.
 */
export class PluginLoadError extends CodesitterError {
  constructor(
    message: string,
    public readonly source?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, CodesitterErrorCode.PLUGIN_LOAD_FAILED, { ...context, source }, 'medium', true);
    this.name = 'PluginLoadError';
  }
}

/**
 * Helper function to wrap unknown errors with context
 * @param context - Context message describing what operation failed
 * @returns CodesitterError with proper message and context
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>,
): CodesitterError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const wrappedError = new CodesitterError(
    `${context}: ${message}`,
    CodesitterErrorCode.INTERNAL_ERROR,
    additionalContext,
  );

  // Preserve original stack trace if available
  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is a CodesitterError
 */
export function isCodesitterError(error: unknown): error is CodesitterError {
  return error instanceof CodesitterError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
