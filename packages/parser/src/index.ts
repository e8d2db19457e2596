// @codesitter/parser - structural extraction of elements, calls and imports

// =============================================================================
// TYPES
// =============================================================================

export type {
  ElementKind,
  SourceRange,
  FieldInfo,
  ParameterInfo,
  ElementMetadata,
  ExtractedElement,
  CallRelationship,
  ImportType,
  ImportRelationship,
  FileMetadata,
} from './types.js';
export { ELEMENT_KINDS } from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export { ANONYMOUS_NAME, MODULE_CALLER, QUALIFIED_NAME_SEPARATOR } from './constants.js';

// =============================================================================
// EXTRACTION
// =============================================================================

export { parseSource, clearParserCache, topLevelErrorRatio } from './ast/parser.js';
export type { ParseOptions } from './ast/parser.js';
export { PatternTable, UNIVERSAL_PATTERNS } from './ast/patterns.js';
export type { PatternOverride } from './ast/patterns.js';
export { ElementExtractor } from './ast/extractor.js';
export type {
  ElementExtractorOptions,
  ExtractionLanguage,
  NodeMatch,
  MatchedElement,
  UnnamedMatch,
} from './ast/extractor.js';
export { collectFunctionScopes, extractCallRelationships } from './ast/relationships/calls.js';
export type { FunctionScope, CallExtractionOptions } from './ast/relationships/calls.js';
export { extractImportRelationships } from './ast/relationships/imports.js';

// =============================================================================
// LANGUAGES
// =============================================================================

export {
  LANGUAGE_IDS,
  getLanguage,
  detectLanguage,
  getAllLanguages,
  grammarFor,
} from './ast/languages/registry.js';
export type { SupportedLanguage } from './ast/languages/registry.js';
export type {
  LanguageDefinition,
  TreeSitterLanguage,
  ElementEnricher,
  CallSyntax,
  CallNodeFields,
  ImportExtractor,
} from './ast/languages/types.js';
export { typescriptDefinition } from './ast/languages/typescript.js';
export { javascriptDefinition } from './ast/languages/javascript.js';
export { pythonDefinition } from './ast/languages/python.js';
export { javaDefinition } from './ast/languages/java.js';

// =============================================================================
// ANALYZERS
// =============================================================================

export type { Analyzer } from './analyzers/types.js';
export { isAnalyzer } from './analyzers/types.js';
export { AnalyzerRegistry } from './analyzers/registry.js';
export type { AnalyzerRegistryOptions } from './analyzers/registry.js';
export { DefaultAnalyzer, DEFAULT_LANGUAGES, createDefaultAnalyzers } from './analyzers/default.js';
export { TreeSitterAnalyzer } from './analyzers/tree-sitter-analyzer.js';
export type { TreeSitterAnalyzerOptions } from './analyzers/tree-sitter-analyzer.js';
export { discoverAnalyzers, loadAnalyzerModule, findPluginFiles } from './analyzers/plugins.js';
export type { DiscoveryResult, PluginFailure } from './analyzers/plugins.js';
export { createBuiltinRegistry, createAnalyzerRegistry, analyzeFile } from './analyzers/factory.js';
export type { CreateRegistryOptions, FileAnalysis } from './analyzers/factory.js';
