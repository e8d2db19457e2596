import Python from 'tree-sitter-python';
import type Parser from 'tree-sitter';
import type {
  ElementMetadata,
  ExtractedElement,
  FileMetadata,
  ImportRelationship,
  ParameterInfo,
} from '../../types.js';
import type { CallSyntax, ElementEnricher, ImportExtractor, LanguageDefinition } from './types.js';
import { findChildOfType, getFieldChildren } from '../node-utils.js';
import { isTestPath, uniqueMatches } from '../../metadata.js';

// =============================================================================
// ENRICHMENT
// =============================================================================

/**
 * Python element enrichment
 *
 * Decorators live on the `decorated_definition` wrapper around a function
 * or class, and docstrings are the first statement of the body.
 */
export class PythonEnricher implements ElementEnricher {
  enrich(element: ExtractedElement, node: Parser.SyntaxNode): void {
    if (element.kind === 'function') {
      this.enrichFunction(element.metadata, node);
    } else if (element.kind === 'class') {
      this.enrichClass(element.metadata, node);
    }
  }

  private enrichFunction(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    metadata.async = node.children.some(child => child.type === 'async');

    const params = node.childForFieldName('parameters');
    if (params) metadata.parameters = extractPythonParameters(params);

    const returnType = node.childForFieldName('return_type');
    if (returnType) metadata.returnType = returnType.text;

    let container = node.parent;
    if (container?.type === 'decorated_definition') container = container.parent;
    metadata.isMethod = container?.type === 'block' && container.parent?.type === 'class_definition';

    this.setDecorators(metadata, node);
    this.setDocstring(metadata, node);
  }

  private enrichClass(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const superclasses = node.childForFieldName('superclasses');
    const bases = (superclasses?.namedChildren ?? []).filter(
      child => child.type !== 'keyword_argument' && child.type !== 'comment',
    );

    if (bases.length > 0) metadata.extends = bases.map(base => base.text);

    const metaclass = superclasses?.namedChildren.find(
      child => child.type === 'keyword_argument' && child.childForFieldName('name')?.text === 'metaclass',
    );
    metadata.abstract =
      bases.some(base => base.text === 'ABC' || base.text.endsWith('.ABC')) ||
      Boolean(metaclass?.childForFieldName('value')?.text.endsWith('ABCMeta'));

    this.setDecorators(metadata, node);
    this.setDocstring(metadata, node);
  }

  private setDecorators(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    if (node.parent?.type !== 'decorated_definition') return;
    const decorators = node.parent.namedChildren
      .filter(child => child.type === 'decorator')
      .map(child => child.text);
    if (decorators.length > 0) metadata.decorators = decorators;
  }

  private setDocstring(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const first = node.childForFieldName('body')?.namedChild(0);
    if (first?.type !== 'expression_statement') return;
    const literal = first.namedChild(0);
    if (literal?.type !== 'string') return;
    metadata.docstring = cleanDocstring(literal.text);
  }
}

/**
 * Remove string prefix and quotes, then the common indentation.
 */
export function cleanDocstring(literal: string): string {
  const body = literal.replace(/^[rRuUbBfF]*("""|'''|"|')([\s\S]*)\1$/, '$2');
  const lines = body.split('\n');
  const indents = lines
    .slice(1)
    .filter(line => line.trim().length > 0)
    .map(line => line.length - line.trimStart().length);
  const indent = indents.length > 0 ? Math.min(...indents) : 0;

  return [lines[0], ...lines.slice(1).map(line => line.slice(indent))]
    .join('\n')
    .trim();
}

export function extractPythonParameters(params: Parser.SyntaxNode): ParameterInfo[] {
  const result: ParameterInfo[] = [];

  for (const param of params.namedChildren) {
    switch (param.type) {
      case 'identifier':
        result.push({ name: param.text, optional: false });
        break;
      case 'typed_parameter': {
        const name = param.namedChild(0);
        const type = param.childForFieldName('type');
        const splat = name?.type === 'list_splat_pattern' || name?.type === 'dictionary_splat_pattern';
        result.push({
          name: name?.text ?? param.text,
          ...(type && { type: type.text }),
          optional: splat,
        });
        break;
      }
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = param.childForFieldName('name');
        const type = param.childForFieldName('type');
        const value = param.childForFieldName('value');
        result.push({
          name: name?.text ?? param.text,
          ...(type && { type: type.text }),
          optional: true,
          ...(value && { default: value.text }),
        });
        break;
      }
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        result.push({ name: param.text, optional: true });
        break;
      // keyword_separator (*), positional_separator (/), comments
      default:
        break;
    }
  }

  return result;
}

// =============================================================================
// IMPORTS
// =============================================================================

export class PythonImportExtractor implements ImportExtractor {
  readonly importNodeTypes = ['import_statement', 'import_from_statement'];

  extractImport(node: Parser.SyntaxNode, filename: string): ImportRelationship[] {
    const line = node.startPosition.row + 1;

    if (node.type === 'import_statement') {
      // `import a.b, c as d` → one relationship per module
      return getFieldChildren(node, 'name').map(child => {
        const module = child.type === 'aliased_import' ? child.childForFieldName('name')?.text ?? child.text : child.text;
        return {
          filename,
          importedFrom: module,
          importedItems: [importedName(child)],
          importType: 'module',
          line,
        };
      });
    }

    const moduleName = node.childForFieldName('module_name');
    if (!moduleName) return [];

    if (findChildOfType(node, 'wildcard_import')) {
      return [{ filename, importedFrom: moduleName.text, importedItems: ['*'], importType: 'wildcard', line }];
    }

    return [
      {
        filename,
        importedFrom: moduleName.text,
        importedItems: getFieldChildren(node, 'name').map(importedName),
        importType: 'named',
        line,
      },
    ];
  }
}

function importedName(node: Parser.SyntaxNode): string {
  if (node.type !== 'aliased_import') return node.text;
  const name = node.childForFieldName('name');
  const alias = node.childForFieldName('alias');
  return name && alias ? `${name.text} as ${alias.text}` : node.text;
}

// =============================================================================
// CALLS
// =============================================================================

export const PYTHON_CALL_SYNTAX: CallSyntax = {
  calls: {
    call: { callee: 'function', arguments: 'arguments' },
  },
  memberAccess: { attribute: 'attribute' },
  calleeLeafTypes: ['identifier'],
  calleeWrapperTypes: [],
};

// =============================================================================
// FILE METADATA
// =============================================================================

const TEST_MARKERS = ['def test_', 'def Test', 'pytest', 'unittest'];

export function extractPythonMetadata(filename: string, content: string): FileMetadata {
  const metadata: FileMetadata = {};

  const decorators = uniqueMatches(/^[ \t]*(@[\w.]+)/gm, content);
  if (decorators.length > 0) {
    metadata.decorators = decorators;
    if (decorators.includes('@property')) metadata.hasProperties = true;
    if (decorators.includes('@staticmethod') || decorators.includes('@classmethod')) {
      metadata.hasSpecialMethods = true;
    }
  }

  if (content.includes('async def')) metadata.hasAsyncFunctions = true;
  if (content.includes('->') || content.includes(': ')) metadata.hasTypeHints = true;
  if (content.includes('"""') || content.includes("'''")) metadata.hasDocstrings = true;
  if (TEST_MARKERS.some(marker => content.includes(marker))) metadata.hasTests = true;
  if (content.includes('class ')) metadata.hasClasses = true;
  if (isTestPath(filename)) metadata.isTestFile = true;

  return metadata;
}

// =============================================================================
// DEFINITION
// =============================================================================

export const pythonDefinition: LanguageDefinition = {
  id: 'python',
  extensions: ['py', 'pyw', 'pyi'],
  grammar: Python,
  patterns: [{ nodeTypes: ['import_from_statement'], kind: 'import' }],
  identifierTypes: ['identifier'],
  functionValueTypes: [],
  enricher: new PythonEnricher(),
  calls: PYTHON_CALL_SYNTAX,
  importExtractor: new PythonImportExtractor(),
  extractMetadata: extractPythonMetadata,
};
