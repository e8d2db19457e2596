import { describe, it, expect } from 'vitest';
import { isTestPath, uniqueMatches } from './metadata.js';

describe('isTestPath', () => {
  it('should recognise test paths', () => {
    expect(isTestPath('src/user.test.ts')).toBe(true);
    expect(isTestPath('spec/helpers.rb')).toBe(true);
    expect(isTestPath('src/__tests__/a.js')).toBe(true);
  });

  it('should reject ordinary sources', () => {
    expect(isTestPath('src/user.ts')).toBe(false);
  });
});

describe('uniqueMatches', () => {
  it('should collect distinct captures in order', () => {
    expect(uniqueMatches(/@(\w+)/g, '@b @a @b')).toEqual(['b', 'a']);
  });

  it('should return an empty list without matches', () => {
    expect(uniqueMatches(/@(\w+)/g, 'plain text')).toEqual([]);
  });
});
