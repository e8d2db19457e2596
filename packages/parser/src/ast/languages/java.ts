import Java from 'tree-sitter-java';
import type Parser from 'tree-sitter';
import type {
  ElementMetadata,
  ExtractedElement,
  FileMetadata,
  ImportRelationship,
  ParameterInfo,
} from '../../types.js';
import type { CallSyntax, ElementEnricher, ImportExtractor, LanguageDefinition } from './types.js';
import { findChildOfType } from '../node-utils.js';
import { findDocComment } from '../comments.js';
import { isTestPath, uniqueMatches } from '../../metadata.js';

// =============================================================================
// ENRICHMENT
// =============================================================================

const ANNOTATION_TYPES = ['marker_annotation', 'annotation'];
const VISIBILITY_KEYWORDS = ['public', 'protected', 'private'];

interface Modifiers {
  annotations: string[];
  keywords: Set<string>;
}

function readModifiers(node: Parser.SyntaxNode | null): Modifiers {
  const modifiers = node ? findChildOfType(node, 'modifiers') : null;
  if (!modifiers) return { annotations: [], keywords: new Set() };

  return {
    annotations: modifiers.namedChildren
      .filter(child => ANNOTATION_TYPES.includes(child.type))
      .map(child => child.text),
    keywords: new Set(modifiers.children.map(child => child.type)),
  };
}

/**
 * Java element enrichment
 *
 * Everything Java says about a declaration before its name (annotations,
 * visibility, static/abstract/final) sits in one `modifiers` node. For
 * variables that node belongs to the enclosing field or local declaration.
 */
export class JavaEnricher implements ElementEnricher {
  enrich(element: ExtractedElement, node: Parser.SyntaxNode): void {
    const { metadata } = element;

    switch (node.type) {
      case 'method_declaration':
      case 'constructor_declaration':
        this.enrichMethod(metadata, node);
        break;
      case 'class_declaration':
      case 'record_declaration':
        this.enrichClass(metadata, node);
        break;
      case 'interface_declaration':
        this.applyModifiers(metadata, readModifiers(node));
        this.setGenerics(metadata, node);
        this.setInterfaceExtends(metadata, node);
        break;
      case 'enum_declaration':
        this.applyModifiers(metadata, readModifiers(node));
        this.setEnumMembers(metadata, node);
        break;
      case 'variable_declarator':
        this.enrichVariable(metadata, node);
        if (element.kind === 'function') this.enrichLambda(metadata, node);
        break;
    }

    const docAnchor = node.type === 'variable_declarator' ? node.parent : node;
    const docstring = docAnchor ? findDocComment(docAnchor, ['block_comment']) : undefined;
    if (docstring) metadata.docstring = docstring;
  }

  private enrichMethod(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    this.applyModifiers(metadata, readModifiers(node));

    const params = node.childForFieldName('parameters');
    if (params) metadata.parameters = extractJavaParameters(params);

    const returnType = node.childForFieldName('type');
    if (returnType) metadata.returnType = returnType.text;

    this.setGenerics(metadata, node);
  }

  private enrichClass(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    this.applyModifiers(metadata, readModifiers(node));

    const superclass = findChildOfType(node, 'superclass');
    const base = superclass?.namedChild(0);
    if (base) metadata.extends = base.text;

    const interfaces = findChildOfType(node, 'super_interfaces');
    const typeList = interfaces && findChildOfType(interfaces, 'type_list');
    if (typeList) metadata.implements = typeList.namedChildren.map(child => child.text);

    this.setGenerics(metadata, node);
  }

  private enrichVariable(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const declaration = node.parent;
    if (!declaration) return;

    const type = declaration.childForFieldName('type');
    if (type) metadata.type = type.text;

    if (declaration.type === 'field_declaration') {
      metadata.kind = 'field';
      this.applyModifiers(metadata, readModifiers(declaration));
    } else {
      metadata.kind = 'local';
      metadata.final = readModifiers(declaration).keywords.has('final');
    }
  }

  private enrichLambda(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const lambda = node.childForFieldName('value');
    const params = lambda?.childForFieldName('parameters');
    if (!params) return;

    if (params.type === 'formal_parameters') {
      metadata.parameters = extractJavaParameters(params);
    } else if (params.type === 'identifier') {
      metadata.parameters = [{ name: params.text, optional: false }];
    } else {
      // inferred_parameters: (a, b)
      metadata.parameters = params.namedChildren.map(child => ({ name: child.text, optional: false }));
    }
  }

  private applyModifiers(metadata: ElementMetadata, modifiers: Modifiers): void {
    const { annotations, keywords } = modifiers;
    if (annotations.length > 0) metadata.decorators = annotations;
    metadata.visibility = VISIBILITY_KEYWORDS.find(keyword => keywords.has(keyword)) ?? 'package';
    metadata.static = keywords.has('static');
    metadata.abstract = keywords.has('abstract');
    metadata.final = keywords.has('final');
  }

  private setGenerics(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const typeParameters = findChildOfType(node, 'type_parameters');
    if (typeParameters) metadata.generics = typeParameters.text;
  }

  private setInterfaceExtends(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const extendsInterfaces = findChildOfType(node, 'extends_interfaces');
    const typeList = extendsInterfaces && findChildOfType(extendsInterfaces, 'type_list');
    if (typeList) metadata.extends = typeList.namedChildren.map(child => child.text);
  }

  private setEnumMembers(metadata: ElementMetadata, node: Parser.SyntaxNode): void {
    const body = node.childForFieldName('body');
    if (!body) return;
    metadata.members = body.namedChildren
      .filter(child => child.type === 'enum_constant')
      .map(child => child.childForFieldName('name')?.text ?? child.text);
  }
}

export function extractJavaParameters(params: Parser.SyntaxNode): ParameterInfo[] {
  const result: ParameterInfo[] = [];

  for (const param of params.namedChildren) {
    if (param.type === 'formal_parameter') {
      const name = param.childForFieldName('name');
      const type = param.childForFieldName('type');
      result.push({
        name: name?.text ?? param.text,
        ...(type && { type: type.text }),
        optional: false,
      });
    } else if (param.type === 'spread_parameter') {
      // String... args
      const declarator = findChildOfType(param, 'variable_declarator');
      const type = param.namedChildren.find(child => child.type !== 'modifiers' && child !== declarator);
      result.push({
        name: declarator?.childForFieldName('name')?.text ?? param.text,
        ...(type && { type: `${type.text}...` }),
        optional: true,
      });
    }
  }

  return result;
}

// =============================================================================
// IMPORTS
// =============================================================================

const IMPORT_PATTERN = /import\s+(static\s+)?([A-Za-z_][\w.]*(?:\.\*)?)\s*;/;

/**
 * Java imports are simple enough to read from the declaration text.
 */
export class JavaImportExtractor implements ImportExtractor {
  readonly importNodeTypes = ['import_declaration'];

  extractImport(node: Parser.SyntaxNode, filename: string): ImportRelationship[] {
    const match = IMPORT_PATTERN.exec(node.text.replace(/\s*\.\s*/g, '.'));
    if (!match) return [];

    const isStatic = match[1] !== undefined;
    const path = match[2];
    const isWildcard = path.endsWith('.*');

    return [
      {
        filename,
        importedFrom: isWildcard ? path.slice(0, -2) : path,
        importedItems: isWildcard ? ['*'] : [path.slice(path.lastIndexOf('.') + 1)],
        importType: isStatic ? 'static' : isWildcard ? 'wildcard' : 'named',
        line: node.startPosition.row + 1,
      },
    ];
  }
}

// =============================================================================
// CALLS
// =============================================================================

export const JAVA_CALL_SYNTAX: CallSyntax = {
  calls: {
    method_invocation: { callee: 'name', arguments: 'arguments' },
    object_creation_expression: { callee: 'type', arguments: 'arguments' },
    explicit_constructor_invocation: { callee: 'constructor', arguments: 'arguments' },
  },
  memberAccess: {},
  calleeLeafTypes: ['identifier', 'type_identifier', 'super', 'this'],
  calleeWrapperTypes: ['generic_type'],
};

// =============================================================================
// FILE METADATA
// =============================================================================

const TEST_ANNOTATIONS = ['Test', 'BeforeEach', 'AfterEach'];

export function extractJavaMetadata(filename: string, content: string): FileMetadata {
  const metadata: FileMetadata = {};

  const annotations = uniqueMatches(/@([A-Z][a-zA-Z0-9]*)/g, content);
  if (annotations.length > 0) {
    metadata.annotations = annotations;
    if (annotations.includes('Override')) metadata.hasOverrides = true;
    if (annotations.some(annotation => TEST_ANNOTATIONS.includes(annotation))) metadata.isTest = true;
    if (annotations.includes('Deprecated')) metadata.hasDeprecated = true;
  }

  if (content.includes('public class')) metadata.hasPublicClass = true;
  if (content.includes('interface ')) metadata.hasInterface = true;
  if (content.includes('enum ')) metadata.hasEnum = true;
  if (content.includes('abstract ')) metadata.hasAbstract = true;
  if (isTestPath(filename)) metadata.isTestFile = true;

  return metadata;
}

// =============================================================================
// DEFINITION
// =============================================================================

export const javaDefinition: LanguageDefinition = {
  id: 'java',
  extensions: ['java'],
  grammar: Java,
  patterns: [
    { nodeTypes: ['constructor_declaration'], kind: 'function' },
    { nodeTypes: ['record_declaration'], kind: 'class' },
  ],
  identifierTypes: ['identifier', 'type_identifier'],
  functionValueTypes: ['lambda_expression'],
  // `String... args` declares its name through a variable_declarator
  skippedTypes: ['spread_parameter'],
  enricher: new JavaEnricher(),
  calls: JAVA_CALL_SYNTAX,
  importExtractor: new JavaImportExtractor(),
  extractMetadata: extractJavaMetadata,
};
