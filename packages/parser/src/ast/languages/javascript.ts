import JavaScript from 'tree-sitter-javascript';
import type Parser from 'tree-sitter';
import type {
  ElementMetadata,
  ExtractedElement,
  FileMetadata,
  ImportRelationship,
  ImportType,
  ParameterInfo,
} from '../../types.js';
import type { CallSyntax, ElementEnricher, ImportExtractor, LanguageDefinition } from './types.js';
import type { PatternOverride } from '../patterns.js';
import { findChildOfType, stripQuotes } from '../node-utils.js';
import { findDocComment } from '../comments.js';
import { MODIFIER_SCAN_LENGTH } from '../../constants.js';
import { isTestPath } from '../../metadata.js';

// =============================================================================
// PATTERNS
// =============================================================================

/**
 * `variable_declaration` (the `var` statement) wraps declarators just like
 * `lexical_declaration`, so it is made transparent here.
 */
export const JAVASCRIPT_PATTERNS: readonly PatternOverride[] = [
  { nodeTypes: ['variable_declaration'], kind: null },
  { nodeTypes: ['generator_function_declaration'], kind: 'function' },
];

export const TYPESCRIPT_PATTERNS: readonly PatternOverride[] = [
  ...JAVASCRIPT_PATTERNS,
  { nodeTypes: ['interface_declaration'], kind: 'interface' },
  { nodeTypes: ['type_alias_declaration'], kind: 'type' },
  { nodeTypes: ['enum_declaration'], kind: 'enum' },
  { nodeTypes: ['abstract_class_declaration'], kind: 'class' },
  { nodeTypes: ['internal_module', 'module'], kind: 'namespace' },
];

export const JAVASCRIPT_IDENTIFIER_TYPES = [
  'identifier',
  'type_identifier',
  'property_identifier',
  'private_property_identifier',
];

export const JAVASCRIPT_FUNCTION_VALUE_TYPES = [
  'arrow_function',
  'function_expression',
  'function',
  'generator_function',
];

const DECLARATION_WRAPPERS = new Set(['export_statement', 'lexical_declaration', 'variable_declaration']);

// =============================================================================
// ENRICHMENT
// =============================================================================

/**
 * JavaScript / TypeScript element enrichment
 *
 * Both grammars share node shapes for everything handled here; the
 * TypeScript-only nodes (interfaces, enums, type aliases, annotations)
 * simply never occur in JavaScript trees.
 */
export class JavaScriptEnricher implements ElementEnricher {
  enrich(element: ExtractedElement, node: Parser.SyntaxNode): void {
    switch (element.kind) {
      case 'function':
        if (node.type === 'variable_declarator') {
          this.enrichVariable(element.metadata, node);
          const value = node.childForFieldName('value');
          if (value) this.enrichFunction(element.metadata, value, node);
        } else {
          this.enrichFunction(element.metadata, node, node);
        }
        break;
      case 'class':
        this.enrichClass(element.metadata, node);
        break;
      case 'interface':
        this.enrichInterface(element.metadata, node);
        break;
      case 'variable':
        this.enrichVariable(element.metadata, node);
        break;
      case 'type':
        this.setGenerics(element.metadata, node);
        this.setExport(element.metadata, node);
        break;
      case 'enum':
        this.enrichEnum(element.metadata, node);
        break;
      case 'namespace':
        this.setExport(element.metadata, node);
        break;
    }

    const docstring = findDocComment(documentationAnchor(node), ['comment'], ['decorator']);
    if (docstring) element.metadata.docstring = docstring;
  }

  /**
   * @param fn - the function-like node (declaration, method, arrow)
   * @param declaration - the node whose position decides export status
   */
  private enrichFunction(
    metadata: ElementMetadata,
    fn: Parser.SyntaxNode,
    declaration: Parser.SyntaxNode,
  ): void {
    const params = fn.childForFieldName('parameters') ?? fn.childForFieldName('parameter');
    metadata.async = fn.children.some(child => child.type === 'async');
    metadata.generator = fn.type.startsWith('generator_') || fn.children.some(child => child.type === '*');

    if (params) {
      metadata.parameters =
        params.type === 'identifier'
          ? [{ name: params.text, optional: false }]
          : extractParameters(params);
    }

    const returnType = fn.childForFieldName('return_type');
    if (returnType) {
      metadata.returnType = returnType.namedChild(0)?.text ?? stripTypeColon(returnType.text);
    }

    this.setGenerics(metadata, fn);

    if (fn.type === 'method_definition') {
      metadata.static = fn.children.some(child => child.type === 'static');
      const accessibility = findChildOfType(fn, 'accessibility_modifier');
      if (accessibility) metadata.accessibility = accessibility.text;
      const decorators = collectDecorators(fn);
      if (decorators.length > 0) metadata.decorators = decorators;
    }

    this.setExport(metadata, declaration);
  }

  private enrichClass(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    metadata.abstract =
      node.type === 'abstract_class_declaration' ||
      /\babstract\b/.test(node.text.slice(0, MODIFIER_SCAN_LENGTH));

    const heritage = findChildOfType(node, 'class_heritage');
    if (heritage) {
      const extendsClause = findChildOfType(heritage, 'extends_clause');
      if (extendsClause) {
        metadata.extends = extendsClause.text.replace(/^extends\s+/, '');
      } else {
        // JavaScript grammar: class_heritage holds the superclass expression directly
        const value = heritage.namedChild(0);
        if (value && value.type !== 'implements_clause') metadata.extends = value.text;
      }

      const implementsClause = findChildOfType(heritage, 'implements_clause');
      if (implementsClause) {
        metadata.implements = implementsClause.namedChildren.map(child => child.text);
      }
    }

    const decorators = collectDecorators(node);
    if (decorators.length > 0) metadata.decorators = decorators;

    this.setGenerics(metadata, node);
    this.setExport(metadata, node);
  }

  private enrichInterface(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const extendsClause = findChildOfType(node, 'extends_type_clause');
    if (extendsClause) {
      metadata.extends = extendsClause.namedChildren.map(child => child.text);
    }
    this.setGenerics(metadata, node);
    this.setExport(metadata, node);
  }

  private enrichVariable(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const keyword = node.parent?.child(0)?.type;
    if (keyword === 'const' || keyword === 'let' || keyword === 'var') {
      metadata.kind = keyword;
    }

    const typeAnnotation = node.childForFieldName('type');
    if (typeAnnotation) metadata.type = stripTypeColon(typeAnnotation.text);

    this.setExport(metadata, node);
  }

  private enrichEnum(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const body = node.childForFieldName('body');
    if (body) {
      metadata.members = body.namedChildren
        .filter(child => child.type !== 'comment')
        .map(child => child.childForFieldName('name')?.text ?? child.text);
    }
    metadata.const = node.children.some(child => child.type === 'const');
    this.setExport(metadata, node);
  }

  private setGenerics(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const typeParameters = node.childForFieldName('type_parameters');
    if (typeParameters) metadata.generics = typeParameters.text;
  }

  /**
   * Exported when the parent or grandparent is an `export` statement.
   * Deeper nesting (a method of an exported class) does not count.
   */
  private setExport(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const wrapper = [node.parent, node.parent?.parent].find(
      ancestor => ancestor?.type === 'export_statement',
    );
    metadata.exported = Boolean(wrapper);
    if (wrapper?.children.some(child => child.type === 'default')) {
      metadata.defaultExport = true;
    }
  }
}

export function stripTypeColon(text: string): string {
  return text.replace(/^:\s*/, '').trim();
}

/**
 * Parameters of a `formal_parameters` node, for both grammars.
 */
export function extractParameters(params: Parser.SyntaxNode): ParameterInfo[] {
  const result: ParameterInfo[] = [];

  for (const param of params.namedChildren) {
    switch (param.type) {
      case 'comment':
        break;
      case 'required_parameter':
      case 'optional_parameter': {
        const pattern = param.childForFieldName('pattern');
        const type = param.childForFieldName('type');
        const value = param.childForFieldName('value');
        result.push({
          name: pattern?.text ?? param.text,
          ...(type && { type: stripTypeColon(type.text) }),
          optional: param.type === 'optional_parameter' || value !== null,
          ...(value && { default: value.text }),
        });
        break;
      }
      case 'assignment_pattern': {
        const left = param.childForFieldName('left');
        const right = param.childForFieldName('right');
        result.push({
          name: left?.text ?? param.text,
          optional: true,
          ...(right && { default: right.text }),
        });
        break;
      }
      case 'rest_pattern':
        result.push({ name: param.text, optional: true });
        break;
      default:
        result.push({ name: param.text, optional: false });
    }
  }

  return result;
}

/**
 * Decorators written on a declaration: its own children, then decorator
 * siblings directly above it (class members, and the decorators of an
 * `export` statement wrapping a class).
 */
function collectDecorators(node: Parser.SyntaxNode): string[] {
  const preceding: Parser.SyntaxNode[] = [];
  let sibling = node.previousNamedSibling;
  while (sibling?.type === 'decorator') {
    preceding.unshift(sibling);
    sibling = sibling.previousNamedSibling;
  }

  const own = node.namedChildren.filter(child => child.type === 'decorator');
  return [...preceding, ...own].map(decorator => decorator.text);
}

/**
 * Node whose preceding sibling would hold the doc comment: declarators
 * and exported declarations are documented above their statement.
 */
function documentationAnchor(node: Parser.SyntaxNode): Parser.SyntaxNode {
  let anchor = node;
  while (anchor.parent && DECLARATION_WRAPPERS.has(anchor.parent.type)) {
    anchor = anchor.parent;
  }
  return anchor;
}

// =============================================================================
// IMPORTS
// =============================================================================

export function classifyImport(hasDefault: boolean, namedCount: number, hasNamespace: boolean): ImportType {
  if (hasNamespace) return 'namespace';
  if (hasDefault && namedCount > 0) return 'mixed';
  if (hasDefault) return 'default';
  if (namedCount > 0) return 'named';
  return 'unknown';
}

/**
 * ES module imports, re-exports with a source, and CommonJS `require()`
 * bindings.
 */
export class JavaScriptImportExtractor implements ImportExtractor {
  readonly importNodeTypes = [
    'import_statement',
    'export_statement',
    'lexical_declaration',
    'variable_declaration',
  ];

  extractImport(node: Parser.SyntaxNode, filename: string): ImportRelationship[] {
    switch (node.type) {
      case 'import_statement':
        return this.processImportStatement(node, filename);
      case 'export_statement':
        return this.processReExport(node, filename);
      default:
        return this.processRequireDeclaration(node, filename);
    }
  }

  private processImportStatement(node: Parser.SyntaxNode, filename: string): ImportRelationship[] {
    const line = node.startPosition.row + 1;
    const source = node.childForFieldName('source');

    if (!source) {
      // TypeScript `import x = require('y')`
      const requireClause = findChildOfType(node, 'import_require_clause');
      const name = requireClause && findChildOfType(requireClause, 'identifier');
      const from = requireClause
        ? requireClause.childForFieldName('source') ?? findChildOfType(requireClause, 'string')
        : null;
      if (!name || !from) return [];
      return [
        { filename, importedFrom: stripQuotes(from.text), importedItems: [name.text], importType: 'default', line },
      ];
    }

    let defaultName: string | null = null;
    let namespace: string | null = null;
    const named: string[] = [];

    const clause = findChildOfType(node, 'import_clause');
    for (const child of clause?.namedChildren ?? []) {
      if (child.type === 'identifier') {
        defaultName = child.text;
      } else if (child.type === 'named_imports') {
        named.push(...this.extractSpecifiers(child, 'import_specifier'));
      } else if (child.type === 'namespace_import') {
        const alias = findChildOfType(child, 'identifier');
        if (alias) namespace = `* as ${alias.text}`;
      }
    }

    const items = [
      ...(defaultName ? [defaultName] : []),
      ...named,
      ...(namespace ? [namespace] : []),
    ];

    return [
      {
        filename,
        importedFrom: stripQuotes(source.text),
        importedItems: items,
        importType: classifyImport(defaultName !== null, named.length, namespace !== null),
        line,
      },
    ];
  }

  private processReExport(node: Parser.SyntaxNode, filename: string): ImportRelationship[] {
    const source = node.childForFieldName('source');
    if (!source) return [];

    const base = { filename, importedFrom: stripQuotes(source.text), line: node.startPosition.row + 1 };

    const clause = findChildOfType(node, 'export_clause');
    if (clause) {
      return [{ ...base, importedItems: this.extractSpecifiers(clause, 'export_specifier'), importType: 'named' }];
    }

    const namespaceExport = findChildOfType(node, 'namespace_export');
    if (namespaceExport) {
      const alias = namespaceExport.namedChild(0);
      return [{ ...base, importedItems: [`* as ${alias?.text ?? ''}`], importType: 'namespace' }];
    }

    return [{ ...base, importedItems: ['*'], importType: 'wildcard' }];
  }

  /**
   * `const x = require('m')` and `const { a, b: c } = require('m')`.
   */
  private processRequireDeclaration(node: Parser.SyntaxNode, filename: string): ImportRelationship[] {
    const imports: ImportRelationship[] = [];

    for (const declarator of node.namedChildren) {
      if (declarator.type !== 'variable_declarator') continue;

      const from = requireSource(declarator.childForFieldName('value'));
      const binding = declarator.childForFieldName('name');
      if (!from || !binding) continue;

      const line = declarator.startPosition.row + 1;
      if (binding.type === 'object_pattern') {
        imports.push({
          filename,
          importedFrom: from,
          importedItems: binding.namedChildren.flatMap(destructuredName),
          importType: 'named',
          line,
        });
      } else {
        imports.push({ filename, importedFrom: from, importedItems: [binding.text], importType: 'default', line });
      }
    }

    return imports;
  }

  private extractSpecifiers(node: Parser.SyntaxNode, specifierType: string): string[] {
    const items: string[] = [];
    for (const specifier of node.namedChildren) {
      if (specifier.type !== specifierType) continue;
      const name = specifier.childForFieldName('name');
      const alias = specifier.childForFieldName('alias');
      if (!name) continue;
      items.push(alias ? `${name.text} as ${alias.text}` : name.text);
    }
    return items;
  }
}

function requireSource(value: Parser.SyntaxNode | null): string | null {
  if (value?.type !== 'call_expression') return null;
  if (value.childForFieldName('function')?.text !== 'require') return null;
  const firstArgument = value.childForFieldName('arguments')?.namedChild(0);
  if (firstArgument?.type !== 'string') return null;
  return stripQuotes(firstArgument.text);
}

function destructuredName(property: Parser.SyntaxNode): string[] {
  if (property.type === 'shorthand_property_identifier_pattern') return [property.text];
  if (property.type === 'pair_pattern') {
    const key = property.childForFieldName('key');
    const value = property.childForFieldName('value');
    if (key && value) return [`${key.text} as ${value.text}`];
  }
  return [];
}

// =============================================================================
// CALLS
// =============================================================================

export const JAVASCRIPT_CALL_SYNTAX: CallSyntax = {
  calls: {
    call_expression: { callee: 'function', arguments: 'arguments' },
    new_expression: { callee: 'constructor', arguments: 'arguments' },
  },
  memberAccess: { member_expression: 'property' },
  calleeLeafTypes: ['identifier', 'super'],
  calleeWrapperTypes: [],
};

// =============================================================================
// FILE METADATA
// =============================================================================

const TYPED_EXTENSIONS = /\.(ts|tsx|mts|cts)$/i;

/**
 * Approximate file flags; keyword checks are plain substring tests.
 */
export function extractJavaScriptMetadata(filename: string, content: string): FileMetadata {
  const metadata: FileMetadata = {};
  const lowerName = filename.toLowerCase();

  const reactHint = content.includes('React') || lowerName.includes('jsx') || lowerName.endsWith('.tsx');
  if (reactHint && /\b(function|const|class)\b/.test(content) && content.includes('return') && content.includes('<')) {
    metadata.isReactComponent = true;
  }

  if (TYPED_EXTENSIONS.test(lowerName)) {
    if (content.includes('interface ')) metadata.hasInterfaces = true;
    if (content.includes('type ')) metadata.hasTypeAliases = true;
    if (content.includes('enum ')) metadata.hasEnums = true;
  }

  if (content.includes('async ')) metadata.hasAsyncFunctions = true;
  if (isTestPath(filename)) metadata.isTestFile = true;

  return metadata;
}

// =============================================================================
// DEFINITION
// =============================================================================

export const javascriptDefinition: LanguageDefinition = {
  id: 'javascript',
  extensions: ['js', 'jsx', 'mjs', 'cjs'],
  grammar: JavaScript,
  patterns: JAVASCRIPT_PATTERNS,
  identifierTypes: JAVASCRIPT_IDENTIFIER_TYPES,
  functionValueTypes: JAVASCRIPT_FUNCTION_VALUE_TYPES,
  enricher: new JavaScriptEnricher(),
  calls: JAVASCRIPT_CALL_SYNTAX,
  importExtractor: new JavaScriptImportExtractor(),
  extractMetadata: extractJavaScriptMetadata,
};
