import type {
  CallRelationship,
  ExtractedElement,
  FileMetadata,
  ImportRelationship,
} from '../types.js';

/**
 * Capability interface every language analyzer implements.
 *
 * Built-in analyzers wrap a tree-sitter grammar; plugins can implement it
 * any way they like as long as the shape matches.
 */
export interface Analyzer {
  /** Language identifier, unique within a registry */
  readonly language: string;

  /** File extensions without dots, matched case-insensitively */
  readonly extensions: readonly string[];

  /**
   * Element forest of a file.
   * @throws ParseError when the file cannot be parsed
   */
  extractStructure(filename: string, content: string): ExtractedElement[];

  /** Call sites in source order. Never throws. */
  extractCalls(filename: string, content: string): CallRelationship[];

  /** Import relationships in source order. Never throws. */
  extractImports(filename: string, content: string): ImportRelationship[];

  /** Approximate whole-file flags */
  extractMetadata(filename: string, content: string): FileMetadata;
}

const ANALYZER_METHODS = ['extractStructure', 'extractCalls', 'extractImports', 'extractMetadata'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Structural check used when loading analyzers from plugin modules.
 */
export function isAnalyzer(value: unknown): value is Analyzer {
  if (!isRecord(value)) return false;
  if (typeof value.language !== 'string' || value.language.length === 0) return false;
  if (!Array.isArray(value.extensions) || !value.extensions.every(ext => typeof ext === 'string')) {
    return false;
  }
  return ANALYZER_METHODS.every(method => typeof value[method] === 'function');
}

/**
 * Why `value` is not an analyzer, for error messages.
 */
export function describeAnalyzerShapeError(value: unknown): string {
  if (!isRecord(value)) return 'export is not an object';
  if (typeof value.language !== 'string' || value.language.length === 0) {
    return 'missing a valid "language" property';
  }
  if (!Array.isArray(value.extensions)) return 'missing an "extensions" array';
  const missing = ANALYZER_METHODS.filter(method => typeof value[method] !== 'function');
  if (missing.length > 0) return `missing method(s): ${missing.join(', ')}`;
  return 'extensions must be strings';
}
