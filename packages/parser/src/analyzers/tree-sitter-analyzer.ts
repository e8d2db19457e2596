import type Parser from 'tree-sitter';
import {
  RelationshipError,
  getErrorMessage,
  silentLogger,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_MAX_ERROR_RATIO,
  type ExtractionConfig,
  type Logger,
} from '@codesitter/core';
import type { Analyzer } from './types.js';
import type {
  CallRelationship,
  ExtractedElement,
  FileMetadata,
  ImportRelationship,
} from '../types.js';
import type { LanguageDefinition } from '../ast/languages/types.js';
import { grammarFor } from '../ast/languages/registry.js';
import { parseSource } from '../ast/parser.js';
import { PatternTable } from '../ast/patterns.js';
import { ElementExtractor, type ExtractionLanguage } from '../ast/extractor.js';
import { collectFunctionScopes, extractCallRelationships } from '../ast/relationships/calls.js';
import { extractImportRelationships } from '../ast/relationships/imports.js';

export interface TreeSitterAnalyzerOptions {
  logger?: Logger;
  extraction?: Partial<ExtractionConfig>;
}

/**
 * Analyzer backed by a tree-sitter grammar and a {@link LanguageDefinition}.
 *
 * Structure extraction rejects unusable trees with a ParseError.
 * Relationship passes are best-effort: they accept any tree the parser
 * returns and report failures as an empty list.
 */
export class TreeSitterAnalyzer implements Analyzer {
  readonly language: string;
  readonly extensions: readonly string[];

  private readonly extraction: ExtractionLanguage;
  private readonly logger: Logger;
  private readonly contextWindow: number;
  private readonly maxErrorRatio: number;

  constructor(
    private readonly definition: LanguageDefinition,
    options: TreeSitterAnalyzerOptions = {},
  ) {
    this.language = definition.id;
    this.extensions = definition.extensions;
    this.logger = options.logger ?? silentLogger;
    this.contextWindow = options.extraction?.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.maxErrorRatio = options.extraction?.maxErrorRatio ?? DEFAULT_MAX_ERROR_RATIO;
    this.extraction = {
      patterns: PatternTable.build(definition.patterns),
      identifierTypes: new Set(definition.identifierTypes),
      functionValueTypes: new Set(definition.functionValueTypes),
      skippedTypes: new Set(definition.skippedTypes),
      enricher: definition.enricher,
    };
  }

  extractStructure(filename: string, content: string): ExtractedElement[] {
    const tree = parseSource(content, grammarFor(this.definition, filename), {
      filename,
      maxErrorRatio: this.maxErrorRatio,
    });

    const extractor = new ElementExtractor(this.extraction, {
      logger: this.logger,
      filename,
      onUnnamed: match =>
        this.logger.debug(`Dropped unnamed ${match.nodeType} at ${filename}:${match.range.startLine}`),
    });
    return extractor.extract(tree.rootNode);
  }

  extractCalls(filename: string, content: string): CallRelationship[] {
    return this.bestEffort('calls', filename, content, root => {
      // Scopes only need names and ranges; enrichment is skipped.
      const scopeExtractor = new ElementExtractor({ ...this.extraction, enricher: undefined });
      const scopes = collectFunctionScopes(scopeExtractor.extract(root));

      return extractCallRelationships(
        root,
        content,
        this.definition.calls,
        this.extraction.identifierTypes,
        scopes,
        { filename, contextWindow: this.contextWindow, logger: this.logger },
      );
    });
  }

  extractImports(filename: string, content: string): ImportRelationship[] {
    return this.bestEffort('imports', filename, content, root =>
      extractImportRelationships(root, filename, this.definition.importExtractor, this.logger),
    );
  }

  extractMetadata(filename: string, content: string): FileMetadata {
    return this.definition.extractMetadata(filename, content);
  }

  private bestEffort<T>(
    pass: string,
    filename: string,
    content: string,
    run: (root: Parser.SyntaxNode) => T[],
  ): T[] {
    try {
      const tree = parseSource(content, grammarFor(this.definition, filename), {
        filename,
        maxErrorRatio: 1,
      });
      return run(tree.rootNode);
    } catch (error) {
      const failure = new RelationshipError(
        `Failed to extract ${pass} from ${filename}: ${getErrorMessage(error)}`,
        { file: filename, language: this.language },
      );
      this.logger.error(`[${failure.code}] ${failure.message}`);
      return [];
    }
  }
}
