import type Parser from 'tree-sitter';
import type { ExtractedElement, FileMetadata, ImportRelationship } from '../../types.js';
import type { PatternOverride } from '../patterns.js';

/**
 * Tree-sitter language grammar object. Grammar packages and the core
 * binding disagree on its type, so it is passed through opaquely.
 */
export type TreeSitterLanguage = unknown;

/**
 * Attaches language-specific metadata to a freshly built element.
 *
 * Implementations only write `element.metadata`; children, name and range
 * are owned by the extractor. Throwing is allowed: the extractor logs the
 * failure and keeps the element.
 */
export interface ElementEnricher {
  enrich(element: ExtractedElement, node: Parser.SyntaxNode): void;
}

/**
 * Where a call node keeps its callee and argument list.
 */
export interface CallNodeFields {
  callee: string;
  arguments: string;
}

export interface CallSyntax {
  /** Call node types, e.g. `call_expression` → { callee: 'function', arguments: 'arguments' } */
  calls: Readonly<Record<string, CallNodeFields>>;
  /** Member access node types → field holding the accessed name */
  memberAccess: Readonly<Record<string, string>>;
  /** Callee node types taken verbatim (identifiers, `super`) */
  calleeLeafTypes: readonly string[];
  /** Callee node types searched for their first identifier (e.g. `generic_type`) */
  calleeWrapperTypes: readonly string[];
}

/**
 * Turns one import node into relationships.
 */
export interface ImportExtractor {
  /** Node types handed to {@link ImportExtractor.extractImport} */
  importNodeTypes: readonly string[];
  extractImport(node: Parser.SyntaxNode, filename: string): ImportRelationship[];
}

/**
 * Complete definition for a language supported by structural extraction.
 *
 * Each supported language has a single definition file that assembles
 * grammar, pattern overrides, enrichment, relationship syntax and file
 * heuristics into one place.
 */
export interface LanguageDefinition {
  /** Language identifier (e.g., 'typescript', 'python') */
  id: string;

  /** File extensions without dots (e.g., ['ts', 'tsx']) */
  extensions: string[];

  /** Tree-sitter grammar used for every extension without a variant */
  grammar: TreeSitterLanguage;

  /** Per-extension grammar variants (e.g. tsx) */
  grammarVariants?: Readonly<Record<string, TreeSitterLanguage>>;

  /** Adjustments applied on top of the universal pattern table */
  patterns: readonly PatternOverride[];

  /** Node types accepted as a declaration's name */
  identifierTypes: readonly string[];

  /** Value node types that promote a variable to a function */
  functionValueTypes: readonly string[];

  /** Node types whose subtrees hold no elements (e.g. Java varargs declarators) */
  skippedTypes?: readonly string[];

  enricher: ElementEnricher;

  calls: CallSyntax;

  importExtractor: ImportExtractor;

  /** Approximate whole-file flags; does not parse */
  extractMetadata(filename: string, content: string): FileMetadata;
}
