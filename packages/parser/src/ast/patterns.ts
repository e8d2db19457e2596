import { ELEMENT_KINDS, type ElementKind } from '../types.js';

/**
 * Node types recognised in every language, grouped by kind.
 *
 * `lexical_declaration` is deliberately absent: it wraps
 * `variable_declarator`s and must stay transparent so each declarator
 * becomes its own element.
 */
export const UNIVERSAL_PATTERNS: Readonly<Record<ElementKind, readonly string[]>> = {
  function: [
    'function_declaration',
    'function_definition',
    'method_definition',
    'method_declaration',
    'function_item',
    'func_literal',
  ],
  class: ['class_declaration', 'class_definition', 'class_specifier', 'struct_item'],
  interface: ['interface_declaration', 'trait_item', 'protocol_declaration'],
  variable: ['variable_declaration', 'variable_declarator', 'const_item', 'let_declaration'],
  type: ['type_alias_declaration', 'type_definition', 'typedef_declaration', 'type_item'],
  enum: ['enum_declaration', 'enum_item', 'enum_specifier'],
  import: ['import_statement', 'import_declaration', 'use_declaration', 'import_spec'],
  namespace: [],
};

/**
 * A language-specific adjustment to the universal table.
 * `kind: null` removes the node types so they become transparent wrappers.
 */
export interface PatternOverride {
  nodeTypes: readonly string[];
  kind: ElementKind | null;
}

/**
 * Immutable node-type → element-kind lookup.
 *
 * Built from a base table (first kind listing a node type wins) and an
 * ordered list of overrides (later entries win).
 */
export class PatternTable {
  private constructor(private readonly kinds: ReadonlyMap<string, ElementKind>) {}

  static build(
    overrides: readonly PatternOverride[] = [],
    base: Readonly<Record<ElementKind, readonly string[]>> = UNIVERSAL_PATTERNS,
  ): PatternTable {
    const kinds = new Map<string, ElementKind>();

    for (const kind of ELEMENT_KINDS) {
      for (const nodeType of base[kind]) {
        if (!kinds.has(nodeType)) kinds.set(nodeType, kind);
      }
    }

    for (const override of overrides) {
      for (const nodeType of override.nodeTypes) {
        if (override.kind === null) {
          kinds.delete(nodeType);
        } else {
          kinds.set(nodeType, override.kind);
        }
      }
    }

    return new PatternTable(kinds);
  }

  kindFor(nodeType: string): ElementKind | undefined {
    return this.kinds.get(nodeType);
  }

  nodeTypesFor(kind: ElementKind): string[] {
    return [...this.kinds].filter(([, k]) => k === kind).map(([nodeType]) => nodeType);
  }

  get size(): number {
    return this.kinds.size;
  }
}
