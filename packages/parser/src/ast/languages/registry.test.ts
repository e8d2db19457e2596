import { describe, it, expect } from 'vitest';
import TypeScript from 'tree-sitter-typescript';
import {
  LANGUAGE_IDS,
  detectLanguage,
  extensionOf,
  getAllLanguages,
  getLanguage,
  grammarFor,
} from './registry.js';
import type { SupportedLanguage } from './registry.js';

describe('Language Registry', () => {
  describe('detectLanguage', () => {
    it('should detect TypeScript files', () => {
      expect(detectLanguage('app.ts')).toBe('typescript');
      expect(detectLanguage('component.tsx')).toBe('typescript');
      expect(detectLanguage('config.mts')).toBe('typescript');
    });

    it('should detect JavaScript files', () => {
      expect(detectLanguage('index.js')).toBe('javascript');
      expect(detectLanguage('component.jsx')).toBe('javascript');
      expect(detectLanguage('legacy.cjs')).toBe('javascript');
    });

    it('should detect Python files', () => {
      expect(detectLanguage('main.py')).toBe('python');
      expect(detectLanguage('stubs.pyi')).toBe('python');
    });

    it('should detect Java files', () => {
      expect(detectLanguage('Main.java')).toBe('java');
    });

    it('should return null for unsupported extensions', () => {
      expect(detectLanguage('main.rs')).toBeNull();
      expect(detectLanguage('README.md')).toBeNull();
      expect(detectLanguage('Makefile')).toBeNull();
    });

    it('should handle paths with directories', () => {
      expect(detectLanguage('src/utils/helper.ts')).toBe('typescript');
      expect(detectLanguage('/absolute/path/to/file.py')).toBe('python');
    });

    it('should be case-insensitive for extensions', () => {
      expect(detectLanguage('file.TS')).toBe('typescript');
      expect(detectLanguage('file.PY')).toBe('python');
    });
  });

  describe('extensionOf', () => {
    it('should return the lower-cased extension without the dot', () => {
      expect(extensionOf('src/App.TSX')).toBe('tsx');
      expect(extensionOf('archive.tar.gz')).toBe('gz');
      expect(extensionOf('Makefile')).toBe('');
    });
  });

  describe('getLanguage', () => {
    it('should return a definition for each supported language', () => {
      for (const lang of LANGUAGE_IDS) {
        const def = getLanguage(lang);
        expect(def.id).toBe(lang);
        expect(def.extensions.length).toBeGreaterThan(0);
        expect(def.grammar).toBeDefined();
        expect(def.enricher).toBeDefined();
        expect(def.importExtractor.importNodeTypes.length).toBeGreaterThan(0);
        expect(Object.keys(def.calls.calls).length).toBeGreaterThan(0);
      }
    });

    it('should throw for unregistered languages', () => {
      expect(() => getLanguage('swift' as SupportedLanguage)).toThrow(
        'No language definition registered for: swift',
      );
    });
  });

  describe('getAllLanguages', () => {
    it('should list every language once', () => {
      expect(getAllLanguages().map(def => def.id)).toEqual(['typescript', 'javascript', 'python', 'java']);
    });

    it('should not claim an extension twice', () => {
      const extensions = getAllLanguages().flatMap(def => def.extensions);
      expect(new Set(extensions).size).toBe(extensions.length);
    });
  });

  describe('grammarFor', () => {
    it('should pick the TSX grammar for .tsx files only', () => {
      const typescript = getLanguage('typescript');

      expect(grammarFor(typescript, 'App.tsx')).toBe(TypeScript.tsx);
      expect(grammarFor(typescript, 'app.ts')).toBe(TypeScript.typescript);
    });
  });
});
