import type Parser from 'tree-sitter';
import type { FieldInfo, SourceRange } from '../types.js';

/**
 * Fields tried, in order, when looking for an element's declared name.
 */
export const NAME_FIELDS = ['name', 'identifier', 'declarator'] as const;

export function rangeOf(node: Parser.SyntaxNode): SourceRange {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
    startByte: node.startIndex,
    endByte: node.endIndex,
  };
}

/**
 * Named children of `node` that carry a grammar field name.
 * When a field repeats (e.g. several `name` fields in one import), the
 * first occurrence is kept.
 */
export function getFieldNodes(node: Parser.SyntaxNode): Map<string, Parser.SyntaxNode> {
  const fields = new Map<string, Parser.SyntaxNode>();
  const cursor = node.walk();

  if (!cursor.gotoFirstChild()) return fields;
  do {
    const fieldName = cursor.currentFieldName;
    if (fieldName && cursor.nodeIsNamed && !fields.has(fieldName)) {
      fields.set(fieldName, cursor.currentNode);
    }
  } while (cursor.gotoNextSibling());

  return fields;
}

/**
 * All children of `node` under one field name, in source order.
 */
export function getFieldChildren(node: Parser.SyntaxNode, fieldName: string): Parser.SyntaxNode[] {
  const result: Parser.SyntaxNode[] = [];
  const cursor = node.walk();

  if (!cursor.gotoFirstChild()) return result;
  do {
    if (cursor.currentFieldName === fieldName && cursor.nodeIsNamed) {
      result.push(cursor.currentNode);
    }
  } while (cursor.gotoNextSibling());

  return result;
}

export function describeFields(fieldNodes: Map<string, Parser.SyntaxNode>): Record<string, FieldInfo> {
  const fields: Record<string, FieldInfo> = {};
  for (const [name, child] of fieldNodes) {
    fields[name] = {
      nodeType: child.type,
      text: child.text,
      startLine: child.startPosition.row + 1,
      endLine: child.endPosition.row + 1,
    };
  }
  return fields;
}

/**
 * Depth-first search (node first) for an identifier-like node.
 */
export function findIdentifier(
  node: Parser.SyntaxNode,
  identifierTypes: ReadonlySet<string>,
): Parser.SyntaxNode | null {
  if (identifierTypes.has(node.type)) return node;
  for (const child of node.namedChildren) {
    const found = findIdentifier(child, identifierTypes);
    if (found) return found;
  }
  return null;
}

/**
 * Resolve a declaration's name: the name-like fields first (directly or
 * anywhere inside them), then the node's direct named children.
 *
 * When a name field exists but holds no identifier (a destructuring
 * pattern), there is no name; the children are not scanned, since one of
 * them would be the initializer.
 */
export function resolveName(
  node: Parser.SyntaxNode,
  identifierTypes: ReadonlySet<string>,
): string | null {
  let sawNameField = false;
  for (const field of NAME_FIELDS) {
    const fieldNode = node.childForFieldName(field);
    if (!fieldNode) continue;
    sawNameField = true;
    const identifier = findIdentifier(fieldNode, identifierTypes);
    if (identifier) return identifier.text;
  }
  if (sawNameField) return null;

  for (const child of node.namedChildren) {
    if (identifierTypes.has(child.type)) return child.text;
  }

  return null;
}

export function findChildOfType(
  node: Parser.SyntaxNode,
  types: string | readonly string[],
): Parser.SyntaxNode | null {
  const wanted = typeof types === 'string' ? [types] : types;
  for (const child of node.namedChildren) {
    if (wanted.includes(child.type)) return child;
  }
  return null;
}

/**
 * Remove one pair of matching quotes (', ", `) around a string literal.
 */
export function stripQuotes(text: string): string {
  return text.replace(/^(['"`])(.*)\1$/s, '$2');
}

/**
 * Split argument text on commas that are not nested inside brackets or
 * string literals. Outer parentheses are removed first.
 */
export function splitTopLevel(text: string): string[] {
  let inner = text.trim();
  if (inner.startsWith('(') && inner.endsWith(')')) {
    inner = inner.slice(1, -1);
  }

  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = '';

  for (let i = 0; i < inner.length; i++) {
    const ch = inner[i];

    if (quote) {
      current += ch;
      if (ch === '\\' && i + 1 < inner.length) {
        current += inner[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
    } else if (ch === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }

  parts.push(current.trim());
  return parts.filter(part => part.length > 0);
}

