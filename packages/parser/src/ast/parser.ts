import Parser from 'tree-sitter';
import { ParseError, getErrorMessage, DEFAULT_MAX_ERROR_RATIO } from '@codesitter/core';
import type { TreeSitterLanguage } from './languages/types.js';

/**
 * Cache for parser instances, one per grammar object
 */
const parserCache = new Map<TreeSitterLanguage, Parser>();

function getParser(grammar: TreeSitterLanguage): Parser {
  let parser = parserCache.get(grammar);
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(grammar);
    parserCache.set(grammar, parser);
  }
  return parser;
}

export interface ParseOptions {
  /** Used in error context only */
  filename?: string;
  /** Share of the source covered by top-level ERROR nodes that makes the tree unusable */
  maxErrorRatio?: number;
}

/**
 * Share of `content` covered by ERROR nodes directly under the root.
 */
export function topLevelErrorRatio(root: Parser.SyntaxNode, contentLength: number): number {
  if (contentLength === 0) return 0;
  if (root.type === 'ERROR') return 1;

  let covered = 0;
  for (const child of root.children) {
    if (child.type === 'ERROR') {
      covered += child.endIndex - child.startIndex;
    }
  }
  return covered / contentLength;
}

/**
 * Parse source code into a syntax tree.
 *
 * Local syntax errors are tolerated: tree-sitter recovers around them and
 * the rest of the file still yields elements. The tree is rejected when the
 * root itself is an ERROR node or when top-level ERROR nodes cover more than
 * `maxErrorRatio` of the text.
 *
 * **Known Limitation:** Tree-sitter may throw "Invalid argument" on very large
 * inputs when its read buffer is smaller than the source, so the buffer is
 * sized from the content.
 *
 * @throws ParseError when no usable tree can be produced
 */
export function parseSource(
  content: string,
  grammar: TreeSitterLanguage,
  options: ParseOptions = {},
): Parser.Tree {
  const { filename, maxErrorRatio = DEFAULT_MAX_ERROR_RATIO } = options;

  let tree: Parser.Tree;
  try {
    tree = getParser(grammar).parse(content, undefined, {
      bufferSize: Math.max(32 * 1024, content.length * 2 + 1),
    });
  } catch (error) {
    throw new ParseError(`Parser failed: ${getErrorMessage(error)}`, filename);
  }

  const ratio = topLevelErrorRatio(tree.rootNode, content.length);
  if (tree.rootNode.type === 'ERROR' || ratio > maxErrorRatio) {
    throw new ParseError('Source could not be parsed', filename, {
      errorRatio: Number(ratio.toFixed(3)),
      maxErrorRatio,
    });
  }

  return tree;
}

/**
 * Clear parser cache (useful for testing)
 */
export function clearParserCache(): void {
  parserCache.clear();
}
