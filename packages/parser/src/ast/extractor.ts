import type Parser from 'tree-sitter';
import { EnrichmentError, getErrorMessage, silentLogger, type Logger } from '@codesitter/core';
import type { ElementKind, ExtractedElement, SourceRange } from '../types.js';
import { ANONYMOUS_NAME, QUALIFIED_NAME_SEPARATOR } from '../constants.js';
import { PatternTable } from './patterns.js';
import { describeFields, getFieldNodes, rangeOf, resolveName } from './node-utils.js';
import type { ElementEnricher } from './languages/types.js';

/**
 * A node whose type maps to a kind but whose name could not be resolved.
 * No element is produced; its children are still visited.
 */
export interface UnnamedMatch {
  status: 'unnamed';
  kind: ElementKind;
  nodeType: string;
  range: SourceRange;
}

export interface MatchedElement {
  status: 'matched';
  element: ExtractedElement;
}

export type NodeMatch = MatchedElement | UnnamedMatch;

/**
 * Language-specific inputs of the extractor.
 */
export interface ExtractionLanguage {
  patterns: PatternTable;
  identifierTypes: ReadonlySet<string>;
  functionValueTypes: ReadonlySet<string>;
  /** Node types whose subtrees are never searched for elements */
  skippedTypes?: ReadonlySet<string>;
  enricher?: ElementEnricher;
}

export interface ElementExtractorOptions {
  logger?: Logger;
  /** Observer for dropped matches; does not affect traversal */
  onUnnamed?: (match: UnnamedMatch) => void;
  /** Used in log messages only */
  filename?: string;
}

/**
 * Walks a syntax tree depth-first and builds the element forest.
 *
 * A node whose type maps to a kind becomes an element; its subtree is
 * walked once more only to collect nested elements as its children, so no
 * node contributes to two elements. Nodes without a kind are transparent.
 */
export class ElementExtractor {
  private readonly logger: Logger;
  private readonly onUnnamed?: (match: UnnamedMatch) => void;
  private readonly filename?: string;

  constructor(
    private readonly language: ExtractionLanguage,
    options: ElementExtractorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.onUnnamed = options.onUnnamed;
    this.filename = options.filename;
  }

  extract(root: Parser.SyntaxNode): ExtractedElement[] {
    const elements: ExtractedElement[] = [];
    this.visit(root, '', elements);
    return elements;
  }

  /**
   * Classify a single node without descending past it (children of a
   * matched node are still collected).
   *
   * @returns null when the node type has no kind
   */
  match(node: Parser.SyntaxNode, prefix: string): NodeMatch | null {
    const kind = this.language.patterns.kindFor(node.type);
    if (!kind) return null;

    const name = resolveName(node, this.language.identifierTypes);
    if (name === null && kind !== 'variable') {
      return { status: 'unnamed', kind, nodeType: node.type, range: rangeOf(node) };
    }

    const resolved = name ?? ANONYMOUS_NAME;
    const qualifiedName = prefix ? `${prefix}${QUALIFIED_NAME_SEPARATOR}${resolved}` : resolved;
    const fieldNodes = getFieldNodes(node);

    const element: ExtractedElement = {
      kind: this.promote(kind, fieldNodes.get('value')),
      name: resolved,
      qualifiedName,
      nodeType: node.type,
      range: rangeOf(node),
      text: node.text,
      fields: describeFields(fieldNodes),
      metadata: {},
      children: [],
    };

    this.visitChildren(node, qualifiedName, element.children);
    this.enrich(element, node);

    return { status: 'matched', element };
  }

  private visit(node: Parser.SyntaxNode, prefix: string, out: ExtractedElement[]): void {
    if (this.language.skippedTypes?.has(node.type)) return;

    const result = this.match(node, prefix);

    if (result === null) {
      this.visitChildren(node, prefix, out);
      return;
    }

    if (result.status === 'unnamed') {
      this.onUnnamed?.(result);
      this.visitChildren(node, prefix, out);
      return;
    }

    out.push(result.element);
  }

  private visitChildren(node: Parser.SyntaxNode, prefix: string, out: ExtractedElement[]): void {
    for (const child of node.namedChildren) {
      this.visit(child, prefix, out);
    }
  }

  /**
   * A variable bound to an inline function (arrow, function expression,
   * lambda) is reported as a function.
   */
  private promote(kind: ElementKind, value: Parser.SyntaxNode | undefined): ElementKind {
    if (kind === 'variable' && value && this.language.functionValueTypes.has(value.type)) {
      return 'function';
    }
    return kind;
  }

  private enrich(element: ExtractedElement, node: Parser.SyntaxNode): void {
    if (!this.language.enricher) return;
    try {
      this.language.enricher.enrich(element, node);
    } catch (error) {
      const failure = new EnrichmentError(
        `Enrichment failed for ${element.kind} "${element.qualifiedName}": ${getErrorMessage(error)}`,
        { file: this.filename, nodeType: node.type, line: element.range.startLine },
      );
      this.logger.warning(`[${failure.code}] ${failure.message}`);
    }
  }
}
