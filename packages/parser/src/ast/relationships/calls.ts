import type Parser from 'tree-sitter';
import { getErrorMessage, silentLogger, DEFAULT_CONTEXT_WINDOW, type Logger } from '@codesitter/core';
import type { CallRelationship, ExtractedElement } from '../../types.js';
import { MODULE_CALLER } from '../../constants.js';
import { findIdentifier, splitTopLevel } from '../node-utils.js';
import type { CallNodeFields, CallSyntax } from '../languages/types.js';

/**
 * Byte span of a named function, used to attribute calls to a caller.
 */
export interface FunctionScope {
  qualifiedName: string;
  startByte: number;
  endByte: number;
}

export interface CallExtractionOptions {
  filename: string;
  /** Characters of source kept on each side of the call */
  contextWindow?: number;
  logger?: Logger;
}

/**
 * Flatten an element forest into the spans of its functions and methods.
 */
export function collectFunctionScopes(elements: readonly ExtractedElement[]): FunctionScope[] {
  const scopes: FunctionScope[] = [];
  const walk = (items: readonly ExtractedElement[]) => {
    for (const element of items) {
      if (element.kind === 'function') {
        scopes.push({
          qualifiedName: element.qualifiedName,
          startByte: element.range.startByte,
          endByte: element.range.endByte,
        });
      }
      walk(element.children);
    }
  };
  walk(elements);
  return scopes;
}

/**
 * Innermost scope containing [start, end), or the module sentinel.
 */
export function findCaller(scopes: readonly FunctionScope[], start: number, end: number): string {
  let best: FunctionScope | null = null;
  for (const scope of scopes) {
    if (scope.startByte <= start && end <= scope.endByte) {
      if (!best || scope.endByte - scope.startByte < best.endByte - best.startByte) {
        best = scope;
      }
    }
  }
  return best?.qualifiedName ?? MODULE_CALLER;
}

export function resolveCallee(
  node: Parser.SyntaxNode,
  syntax: CallSyntax,
  identifierTypes: ReadonlySet<string>,
): string | null {
  const memberField = syntax.memberAccess[node.type];
  if (memberField) {
    return node.childForFieldName(memberField)?.text ?? null;
  }
  if (syntax.calleeLeafTypes.includes(node.type)) {
    return node.text;
  }
  if (syntax.calleeWrapperTypes.includes(node.type)) {
    return findIdentifier(node, identifierTypes)?.text ?? null;
  }
  return null;
}

function buildCall(
  node: Parser.SyntaxNode,
  fields: CallNodeFields,
  content: string,
  scopes: readonly FunctionScope[],
  syntax: CallSyntax,
  identifierTypes: ReadonlySet<string>,
  options: CallExtractionOptions,
): CallRelationship | null {
  const calleeNode = node.childForFieldName(fields.callee);
  if (!calleeNode) return null;

  const callee = resolveCallee(calleeNode, syntax, identifierTypes);
  if (!callee) return null;

  const argumentsNode = node.childForFieldName(fields.arguments);
  const window = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;

  return {
    filename: options.filename,
    caller: findCaller(scopes, node.startIndex, node.endIndex),
    callee,
    arguments: argumentsNode ? splitTopLevel(argumentsNode.text) : [],
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
    context: content.slice(
      Math.max(0, node.startIndex - window),
      Math.min(content.length, node.endIndex + window),
    ),
  };
}

/**
 * Find every call site under `root`, in source order.
 *
 * Purely syntactic: the callee is the written name (the accessed member
 * for `a.b()`), never a resolved declaration. A call node that fails is
 * logged and skipped.
 */
export function extractCallRelationships(
  root: Parser.SyntaxNode,
  content: string,
  syntax: CallSyntax,
  identifierTypes: ReadonlySet<string>,
  scopes: readonly FunctionScope[],
  options: CallExtractionOptions,
): CallRelationship[] {
  const logger = options.logger ?? silentLogger;
  const calls: CallRelationship[] = [];

  for (const node of root.descendantsOfType(Object.keys(syntax.calls))) {
    const fields = syntax.calls[node.type];
    if (!fields) continue;
    try {
      const call = buildCall(node, fields, content, scopes, syntax, identifierTypes, options);
      if (call) calls.push(call);
    } catch (error) {
      logger.warning(
        `Skipping call at ${options.filename}:${node.startPosition.row + 1}: ${getErrorMessage(error)}`,
      );
    }
  }

  return calls;
}
