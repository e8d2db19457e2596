import type Parser from 'tree-sitter';

/**
 * Find a doc comment (`/** ... *\/`) immediately above `anchor`.
 *
 * Sibling nodes of the types in `skipTypes` (decorators, annotations)
 * between the comment and the declaration are stepped over. The comment
 * must end on the line before the first of them, or on the same line.
 */
export function findDocComment(
  anchor: Parser.SyntaxNode,
  commentTypes: readonly string[],
  skipTypes: readonly string[] = [],
): string | undefined {
  let top = anchor;
  let sibling = anchor.previousNamedSibling;

  while (sibling && skipTypes.includes(sibling.type)) {
    top = sibling;
    sibling = sibling.previousNamedSibling;
  }

  if (!sibling || !commentTypes.includes(sibling.type)) return undefined;
  if (!sibling.text.startsWith('/**')) return undefined;
  if (top.startPosition.row - sibling.endPosition.row > 1) return undefined;

  return cleanDocComment(sibling.text);
}

/**
 * Strip the comment delimiters and leading asterisks, keeping line breaks.
 */
export function cleanDocComment(text: string): string {
  return text
    .replace(/^\/\*\*/, '')
    .replace(/\*\/$/, '')
    .split('\n')
    .map(line => line.replace(/^\s*\*?\s?/, '').trimEnd())
    .join('\n')
    .trim();
}
