import { describe, it, expect } from 'vitest';
import { TreeSitterAnalyzer } from '../../analyzers/tree-sitter-analyzer.js';
import { classifyImport, javascriptDefinition } from './javascript.js';

describe('JavaScript Language', () => {
  const analyzer = new TreeSitterAnalyzer(javascriptDefinition);

  describe('Structure', () => {
    it('should extract classes and methods', () => {
      const code = `
class Dog extends Animal {
  static create() { return new Dog(); }
  async *bark() {}
}`.trim();

      const [dog] = analyzer.extractStructure('dog.js', code);

      expect(dog.kind).toBe('class');
      expect(dog.metadata.extends).toBe('Animal');
      expect(dog.metadata.abstract).toBe(false);
      expect(dog.children.map(child => child.qualifiedName)).toEqual(['Dog.create', 'Dog.bark']);
      expect(dog.children[0].metadata.static).toBe(true);
      expect(dog.children[1].metadata).toMatchObject({ async: true, generator: true, static: false });
    });

    it('should not mistake a function named async for an async function', () => {
      const code = 'class Api {\n  async() {}\n}\nfunction async() {}';

      const [api, fn] = analyzer.extractStructure('api.js', code);

      expect(api.children[0].qualifiedName).toBe('Api.async');
      expect(api.children[0].metadata.async).toBe(false);
      expect(fn.name).toBe('async');
      expect(fn.metadata.async).toBe(false);
    });

    it('should make var statements transparent', () => {
      const elements = analyzer.extractStructure('legacy.js', 'var a = 1, b = function () {};');

      expect(elements.map(e => [e.kind, e.name, e.metadata.kind])).toEqual([
        ['variable', 'a', 'var'],
        ['function', 'b', 'var'],
      ]);
    });

    it('should read default parameter values', () => {
      const [fn] = analyzer.extractStructure('f.js', 'function f(a, b = 2, ...rest) {}');

      expect(fn.metadata.parameters).toEqual([
        { name: 'a', optional: false },
        { name: 'b', optional: true, default: '2' },
        { name: '...rest', optional: true },
      ]);
    });

    it('should mark exported declarations', () => {
      const [fn, value] = analyzer.extractStructure('m.mjs', 'export function run() {}\nexport const VALUE = 1;');

      expect(fn.metadata.exported).toBe(true);
      expect(value.metadata).toMatchObject({ exported: true, kind: 'const' });
    });
  });

  describe('Imports', () => {
    it('should extract CommonJS require bindings', () => {
      const code = [
        "const fs = require('fs');",
        "const { join, resolve: abs } = require('path');",
        "const local = compute('x');",
      ].join('\n');

      expect(analyzer.extractImports('server.js', code)).toEqual([
        { filename: 'server.js', importedFrom: 'fs', importedItems: ['fs'], importType: 'default', line: 1 },
        {
          filename: 'server.js',
          importedFrom: 'path',
          importedItems: ['join', 'resolve as abs'],
          importType: 'named',
          line: 2,
        },
      ]);
    });

    it('should extract ES module imports', () => {
      const [imp] = analyzer.extractImports('app.mjs', "import express, { Router } from 'express';");

      expect(imp).toMatchObject({ importedFrom: 'express', importedItems: ['express', 'Router'], importType: 'mixed' });
    });
  });

  describe('classifyImport', () => {
    it('should prefer namespace, then mixed, default and named', () => {
      expect(classifyImport(true, 1, true)).toBe('namespace');
      expect(classifyImport(true, 2, false)).toBe('mixed');
      expect(classifyImport(true, 0, false)).toBe('default');
      expect(classifyImport(false, 3, false)).toBe('named');
      expect(classifyImport(false, 0, false)).toBe('unknown');
    });
  });

  describe('File metadata', () => {
    it('should not report TypeScript flags for JavaScript files', () => {
      const code = 'const type = 1;\nasync function go() {}\n// interface enum';

      expect(analyzer.extractMetadata('src/go.js', code)).toEqual({ hasAsyncFunctions: true });
    });

    it('should detect JSX components', () => {
      const code = 'export function Card() { return <section />; }';

      expect(analyzer.extractMetadata('Card.jsx', code)).toEqual({ isReactComponent: true });
    });
  });
});
