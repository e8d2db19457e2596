import { describe, it, expect, vi } from 'vitest';
import type Parser from 'tree-sitter';
import type { Logger } from '@codesitter/core';
import { ElementExtractor, type ExtractionLanguage, type UnnamedMatch } from './extractor.js';
import { PatternTable } from './patterns.js';
import { parseSource } from './parser.js';
import { typescriptDefinition } from './languages/typescript.js';
import type { ExtractedElement } from '../types.js';

const USER_SERVICE = `
interface User {
  id: number;
  name: string;
}

class UserService {
  constructor(private users: User[]) {}

  getUser(id: number): User | undefined {
    return this.users.find(u => u.id === id);
  }

  async updateUser(id: number, name: string): Promise<void> {
    this.users = this.users.map(u => (u.id === id ? { ...u, name } : u));
  }
}

export const createUserService = () => new UserService([]);

function testCalls() {
  const service = createUserService();
  service.getUser(1);
}
`.trim();

function typescriptLanguage(overrides: Partial<ExtractionLanguage> = {}): ExtractionLanguage {
  return {
    patterns: PatternTable.build(typescriptDefinition.patterns),
    identifierTypes: new Set(typescriptDefinition.identifierTypes),
    functionValueTypes: new Set(typescriptDefinition.functionValueTypes),
    enricher: typescriptDefinition.enricher,
    ...overrides,
  };
}

function extract(code: string, language = typescriptLanguage()): ExtractedElement[] {
  const tree = parseSource(code, typescriptDefinition.grammar);
  return new ElementExtractor(language).extract(tree.rootNode);
}

function flatten(elements: readonly ExtractedElement[]): ExtractedElement[] {
  return elements.flatMap(element => [element, ...flatten(element.children)]);
}

function createMockLogger(): Logger {
  return { info: vi.fn(), warning: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe('ElementExtractor', () => {
  describe('element forest', () => {
    it('should extract top-level elements in source order', () => {
      const elements = extract(USER_SERVICE);

      expect(elements.map(e => [e.kind, e.name])).toEqual([
        ['interface', 'User'],
        ['class', 'UserService'],
        ['function', 'createUserService'],
        ['function', 'testCalls'],
      ]);
    });

    it('should nest methods under their class with qualified names', () => {
      const [, userService] = extract(USER_SERVICE);

      expect(userService.children.map(c => [c.kind, c.qualifiedName])).toEqual([
        ['function', 'UserService.constructor'],
        ['function', 'UserService.getUser'],
        ['function', 'UserService.updateUser'],
      ]);
    });

    it('should nest local variables under their function', () => {
      const testCalls = extract(USER_SERVICE)[3];

      expect(testCalls.children).toHaveLength(1);
      expect(testCalls.children[0].kind).toBe('variable');
      expect(testCalls.children[0].qualifiedName).toBe('testCalls.service');
    });

    it('should promote a variable bound to an arrow function', () => {
      const createUserService = extract(USER_SERVICE)[2];

      expect(createUserService.kind).toBe('function');
      expect(createUserService.nodeType).toBe('variable_declarator');
      expect(createUserService.metadata.kind).toBe('const');
      expect(createUserService.metadata.exported).toBe(true);
    });

    it('should keep element text equal to the source slice', () => {
      for (const element of flatten(extract(USER_SERVICE))) {
        expect(USER_SERVICE.slice(element.range.startByte, element.range.endByte)).toBe(element.text);
        expect(element.range.startLine).toBeLessThanOrEqual(element.range.endLine);
      }
    });

    it('should keep children inside their parent', () => {
      const check = (parent: ExtractedElement) => {
        for (const child of parent.children) {
          expect(child.range.startByte).toBeGreaterThanOrEqual(parent.range.startByte);
          expect(child.range.endByte).toBeLessThanOrEqual(parent.range.endByte);
          expect(child.qualifiedName).toBe(`${parent.qualifiedName}.${child.name}`);
          check(child);
        }
      };
      extract(USER_SERVICE).forEach(check);
    });

    it('should not overlap siblings', () => {
      const check = (siblings: readonly ExtractedElement[]) => {
        for (let i = 1; i < siblings.length; i++) {
          expect(siblings[i].range.startByte).toBeGreaterThanOrEqual(siblings[i - 1].range.endByte);
        }
        siblings.forEach(sibling => check(sibling.children));
      };
      check(extract(USER_SERVICE));
    });

    it('should produce identical results for identical input', () => {
      expect(extract(USER_SERVICE)).toEqual(extract(USER_SERVICE));
    });

    it('should return an empty forest for empty input', () => {
      expect(extract('')).toEqual([]);
    });
  });

  describe('fields', () => {
    it('should record field nodes with their lines', () => {
      const [fn] = extract('function add(a: number, b: number): number {\n  return a + b;\n}');

      expect(fn.fields.name).toEqual({ nodeType: 'identifier', text: 'add', startLine: 1, endLine: 1 });
      expect(fn.fields.parameters.text).toBe('(a: number, b: number)');
      expect(fn.fields.body.endLine).toBe(3);
    });
  });

  describe('names', () => {
    it('should report destructured variables as anonymous', () => {
      const [element] = extract('const { a, b } = source;');

      expect(element.kind).toBe('variable');
      expect(element.name).toBe('<anonymous>');
    });

    it('should drop unnamed matches but keep their children', () => {
      const unnamed: UnnamedMatch[] = [];
      const tree = parseSource("import './setup';\nfunction run() {}", typescriptDefinition.grammar);

      const elements = new ElementExtractor(typescriptLanguage(), {
        onUnnamed: match => unnamed.push(match),
      }).extract(tree.rootNode);

      expect(elements.map(e => e.name)).toEqual(['run']);
      expect(unnamed).toEqual([
        {
          status: 'unnamed',
          kind: 'import',
          nodeType: 'import_statement',
          range: { startLine: 1, endLine: 1, startByte: 0, endByte: 17 },
        },
      ]);
    });
  });

  describe('match', () => {
    it('should return null for node types without a kind', () => {
      const tree = parseSource('foo();', typescriptDefinition.grammar);
      const extractor = new ElementExtractor(typescriptLanguage());

      expect(extractor.match(tree.rootNode, '')).toBeNull();
    });

    it('should prefix the qualified name', () => {
      const tree = parseSource('class Inner {}', typescriptDefinition.grammar);
      const node: Parser.SyntaxNode | null = tree.rootNode.namedChild(0);
      if (!node) throw new Error('expected a class node');

      const result = new ElementExtractor(typescriptLanguage()).match(node, 'outer');

      expect(result?.status).toBe('matched');
      if (result?.status === 'matched') {
        expect(result.element.qualifiedName).toBe('outer.Inner');
      }
    });
  });

  describe('enrichment', () => {
    it('should extract structure without an enricher', () => {
      const [fn] = extract('async function go() {}', typescriptLanguage({ enricher: undefined }));

      expect(fn.name).toBe('go');
      expect(fn.metadata).toEqual({});
    });

    it('should keep the element and log when enrichment throws', () => {
      const logger = createMockLogger();
      const tree = parseSource('function boom() {}', typescriptDefinition.grammar);
      const language = typescriptLanguage({
        enricher: {
          enrich: () => {
            throw new Error('kaboom');
          },
        },
      });

      const elements = new ElementExtractor(language, { logger, filename: 'boom.ts' }).extract(tree.rootNode);

      expect(elements).toHaveLength(1);
      expect(elements[0].metadata).toEqual({});
      expect(logger.warning).toHaveBeenCalledWith(
        '[ENRICHMENT_FAILED] Enrichment failed for function "boom": kaboom',
      );
    });
  });
});
