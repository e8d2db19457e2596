/**
 * Error codes for all codesitter errors.
 * Used to identify error types programmatically.
 */
export enum CodesitterErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Parsing
  PARSE_FAILED = 'PARSE_FAILED',

  // Extraction
  ENRICHMENT_FAILED = 'ENRICHMENT_FAILED',
  RELATIONSHIP_QUERY_FAILED = 'RELATIONSHIP_QUERY_FAILED',

  // Analyzers
  NO_ANALYZER = 'NO_ANALYZER',
  REGISTRY_SEALED = 'REGISTRY_SEALED',
  PLUGIN_LOAD_FAILED = 'PLUGIN_LOAD_FAILED',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
