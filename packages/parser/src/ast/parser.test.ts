import { describe, it, expect, beforeEach } from 'vitest';
import { ParseError } from '@codesitter/core';
import TypeScript from 'tree-sitter-typescript';
import Python from 'tree-sitter-python';
import { clearParserCache, parseSource, topLevelErrorRatio } from './parser.js';

describe('parseSource', () => {
  beforeEach(() => {
    clearParserCache();
  });

  it('should parse valid TypeScript', () => {
    const tree = parseSource('const x: number = 1;', TypeScript.typescript);

    expect(tree.rootNode.type).toBe('program');
  });

  it('should parse valid Python', () => {
    const tree = parseSource('def f():\n    return 1\n', Python);

    expect(tree.rootNode.type).toBe('module');
  });

  it('should parse empty input', () => {
    const tree = parseSource('', TypeScript.typescript);

    expect(tree.rootNode.namedChildCount).toBe(0);
  });

  it('should tolerate a local syntax error', () => {
    const code = [
      'function first() { return 1; }',
      'function second() { return 2; }',
      'function third() { return 3; }',
      'function broken( { }',
      'function fourth() { return 4; }',
      'function fifth() { return 5; }',
      'function sixth() { return 6; }',
    ].join('\n');

    const tree = parseSource(code, TypeScript.typescript);

    const names = tree.rootNode
      .descendantsOfType('function_declaration')
      .map(fn => fn.childForFieldName('name')?.text);
    expect(names).toContain('first');
  });

  it('should reject input that is mostly errors', () => {
    expect(() => parseSource(')))))))))', TypeScript.typescript, { filename: 'bad.ts' })).toThrow(ParseError);
  });

  it('should attach the file and error ratio to the error', () => {
    try {
      parseSource(')))))))))', TypeScript.typescript, { filename: 'bad.ts' });
      expect.unreachable('parseSource should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.context?.file).toBe('bad.ts');
        expect(error.context?.maxErrorRatio).toBe(0.5);
      }
    }
  });

  it('should reuse cached parsers across calls', () => {
    const a = parseSource('let a = 1;', TypeScript.typescript);
    const b = parseSource('let b = 2;', TypeScript.typescript);

    expect(a.rootNode.text).toBe('let a = 1;');
    expect(b.rootNode.text).toBe('let b = 2;');
  });
});

describe('topLevelErrorRatio', () => {
  it('should be zero for empty input', () => {
    const tree = parseSource('', TypeScript.typescript);

    expect(topLevelErrorRatio(tree.rootNode, 0)).toBe(0);
  });

  it('should be zero for a clean tree', () => {
    const code = 'let a = 1;';
    const tree = parseSource(code, TypeScript.typescript);

    expect(topLevelErrorRatio(tree.rootNode, code.length)).toBe(0);
  });
});
