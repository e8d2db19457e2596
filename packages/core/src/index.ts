/**
 * @codesitter/core - shared plumbing for the codesitter extractors
 *
 * Errors, logging, configuration and the Result type used by
 * @codesitter/parser and by hosts that embed it.
 */

// =============================================================================
// ERRORS
// =============================================================================

export {
  CodesitterError,
  CodesitterErrorCode,
  ConfigError,
  ParseError,
  EnrichmentError,
  RelationshipError,
  NoAnalyzerError,
  RegistrySealedError,
  PluginLoadError,
  wrapError,
  isCodesitterError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';

// =============================================================================
// LOGGING
// =============================================================================

export { consoleLogger, createJsonLogger, silentLogger, withLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
  codesitterConfigSchema,
  defaultConfig,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_MAX_ERROR_RATIO,
  DEFAULT_PLUGIN_DIRECTORY,
} from './config/schema.js';
export type { CodesitterConfig, ExtractionConfig } from './config/schema.js';
export {
  loadConfig,
  resolveConfigPath,
  createLoggerFromConfig,
  CONFIG_DIR,
  CONFIG_FILENAME,
} from './config/loader.js';

// =============================================================================
// UTILITIES
// =============================================================================

export { Ok, Err, isOk, tryResult } from './utils/result.js';
export type { Result } from './utils/result.js';
