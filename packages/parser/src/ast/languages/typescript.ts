import TypeScript from 'tree-sitter-typescript';
import type { LanguageDefinition } from './types.js';
import {
  JavaScriptEnricher,
  JavaScriptImportExtractor,
  JAVASCRIPT_CALL_SYNTAX,
  JAVASCRIPT_FUNCTION_VALUE_TYPES,
  JAVASCRIPT_IDENTIFIER_TYPES,
  TYPESCRIPT_PATTERNS,
  extractJavaScriptMetadata,
} from './javascript.js';

export const typescriptDefinition: LanguageDefinition = {
  id: 'typescript',
  extensions: ['ts', 'tsx', 'mts', 'cts'],
  grammar: TypeScript.typescript,
  grammarVariants: { tsx: TypeScript.tsx },
  patterns: TYPESCRIPT_PATTERNS,
  identifierTypes: JAVASCRIPT_IDENTIFIER_TYPES,
  functionValueTypes: JAVASCRIPT_FUNCTION_VALUE_TYPES,
  enricher: new JavaScriptEnricher(),
  calls: JAVASCRIPT_CALL_SYNTAX,
  importExtractor: new JavaScriptImportExtractor(),
  extractMetadata: extractJavaScriptMetadata,
};
