/**
 * Data model produced by structural extraction.
 *
 * Everything here is plain data: created per call, returned to the
 * caller and never mutated by the extractor afterwards.
 */

export const ELEMENT_KINDS = [
  'function',
  'class',
  'interface',
  'variable',
  'type',
  'enum',
  'import',
  'namespace',
] as const;

/**
 * Closed vocabulary of element categories shared by every language.
 */
export type ElementKind = (typeof ELEMENT_KINDS)[number];

/**
 * Position of an element in its source file.
 *
 * Lines are 1-based and inclusive. Offsets index the source string
 * (`content.slice(startByte, endByte) === element.text`).
 */
export interface SourceRange {
  startLine: number;
  endLine: number;
  startByte: number;
  endByte: number;
}

/**
 * A named child of an element's node, keyed by its grammar field name.
 */
export interface FieldInfo {
  nodeType: string;
  text: string;
  startLine: number;
  endLine: number;
}

export interface ParameterInfo {
  name: string;
  type?: string;
  optional: boolean;
  default?: string;
}

/**
 * Metadata attached by language enrichment.
 *
 * Known keys are typed; analyzers loaded as plugins may add their own.
 */
export interface ElementMetadata {
  exported?: boolean;
  defaultExport?: boolean;
  async?: boolean;
  generator?: boolean;
  parameters?: ParameterInfo[];
  returnType?: string;
  generics?: string;
  static?: boolean;
  abstract?: boolean;
  final?: boolean;
  /** TypeScript `public`/`private`/`protected` on class members */
  accessibility?: string;
  /** Java access modifier, `package` when none is written */
  visibility?: string;
  decorators?: string[];
  docstring?: string;
  /** Superclass name, or the list of base types for interfaces and Python classes */
  extends?: string | string[];
  implements?: string[];
  /** Declaration keyword: const/let/var, or field/local in Java */
  kind?: string;
  type?: string;
  members?: string[];
  const?: boolean;
  isMethod?: boolean;
  [key: string]: unknown;
}

export interface ExtractedElement {
  kind: ElementKind;
  /** Declared identifier; `<anonymous>` only for variables */
  name: string;
  /** Dot-joined names of enclosing elements plus own name */
  qualifiedName: string;
  /** Raw syntax node type that matched, e.g. `method_definition` */
  nodeType: string;
  range: SourceRange;
  text: string;
  fields: Record<string, FieldInfo>;
  metadata: ElementMetadata;
  children: ExtractedElement[];
}

export interface CallRelationship {
  filename: string;
  /** Qualified name of the innermost enclosing function, or `<module>` */
  caller: string;
  callee: string;
  arguments: string[];
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  context: string;
}

export type ImportType =
  | 'default'
  | 'named'
  | 'mixed'
  | 'namespace'
  | 'module'
  | 'wildcard'
  | 'static'
  | 'unknown';

export interface ImportRelationship {
  filename: string;
  importedFrom: string;
  importedItems: string[];
  importType: ImportType;
  /** 1-based */
  line: number;
}

/**
 * Cheap textual flags about a whole file. Approximate by nature:
 * a keyword inside a comment or string still counts.
 */
export type FileMetadata = Record<string, boolean | number | string | string[]>;
