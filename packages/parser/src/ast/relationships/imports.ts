import type Parser from 'tree-sitter';
import { getErrorMessage, silentLogger, type Logger } from '@codesitter/core';
import type { ImportRelationship } from '../../types.js';
import type { ImportExtractor } from '../languages/types.js';

/**
 * Run a language's import extractor over every import node under `root`.
 * A node that fails is logged and skipped.
 */
export function extractImportRelationships(
  root: Parser.SyntaxNode,
  filename: string,
  extractor: ImportExtractor,
  logger: Logger = silentLogger,
): ImportRelationship[] {
  const imports: ImportRelationship[] = [];

  for (const node of root.descendantsOfType([...extractor.importNodeTypes])) {
    try {
      imports.push(...extractor.extractImport(node, filename));
    } catch (error) {
      logger.warning(
        `Skipping import at ${filename}:${node.startPosition.row + 1}: ${getErrorMessage(error)}`,
      );
    }
  }

  return imports;
}
