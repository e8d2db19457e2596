import type { Analyzer } from './types.js';
import type { CallRelationship, ExtractedElement, FileMetadata, ImportRelationship } from '../types.js';

/**
 * Analyzer for file types without structural support: claims the
 * extensions so files are recognised, and extracts nothing.
 */
export class DefaultAnalyzer implements Analyzer {
  constructor(
    readonly language: string,
    readonly extensions: readonly string[],
  ) {}

  extractStructure(_filename: string, _content: string): ExtractedElement[] {
    return [];
  }

  extractCalls(_filename: string, _content: string): CallRelationship[] {
    return [];
  }

  extractImports(_filename: string, _content: string): ImportRelationship[] {
    return [];
  }

  extractMetadata(_filename: string, _content: string): FileMetadata {
    return {};
  }
}

/**
 * Languages recognised without structural extraction.
 */
export const DEFAULT_LANGUAGES: ReadonlyArray<{ language: string; extensions: string[] }> = [
  { language: 'html', extensions: ['html', 'htm'] },
  { language: 'css', extensions: ['css', 'scss', 'sass'] },
  { language: 'json', extensions: ['json'] },
  { language: 'yaml', extensions: ['yaml', 'yml'] },
  { language: 'toml', extensions: ['toml'] },
  { language: 'xml', extensions: ['xml'] },
  { language: 'bash', extensions: ['sh', 'bash'] },
  { language: 'c', extensions: ['c'] },
  { language: 'cpp', extensions: ['cpp', 'cc', 'cxx'] },
  { language: 'rust', extensions: ['rs'] },
  { language: 'go', extensions: ['go'] },
  { language: 'ruby', extensions: ['rb'] },
  { language: 'php', extensions: ['php'] },
  { language: 'swift', extensions: ['swift'] },
  { language: 'kotlin', extensions: ['kt'] },
];

export function createDefaultAnalyzers(): DefaultAnalyzer[] {
  return DEFAULT_LANGUAGES.map(({ language, extensions }) => new DefaultAnalyzer(language, extensions));
}

/**
 * Returned by the registry for files no analyzer claims.
 */
export const UNKNOWN_ANALYZER = new DefaultAnalyzer('unknown', []);
