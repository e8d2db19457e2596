import { describe, it, expect } from 'vitest';
import {
  CodesitterError,
  CodesitterErrorCode,
  ConfigError,
  ParseError,
  PluginLoadError,
  RegistrySealedError,
  wrapError,
  isCodesitterError,
  getErrorMessage,
  getErrorStack,
  type ErrorSeverity,
} from './index.js';

describe('CodesitterError', () => {
  it('should create error with all properties', () => {
    const error = new CodesitterError(
      'Test error',
      CodesitterErrorCode.PARSE_FAILED,
      { file: 'a.ts' },
      'high',
      false,
    );

    expect(error.message).toBe('Test error');
    expect(error.code).toBe(CodesitterErrorCode.PARSE_FAILED);
    expect(error.context).toEqual({ file: 'a.ts' });
    expect(error.severity).toBe('high');
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('CodesitterError');
  });

  it('should create error with defaults', () => {
    const error = new CodesitterError('Test error', CodesitterErrorCode.NO_ANALYZER);

    expect(error.context).toBeUndefined();
    expect(error.severity).toBe('medium');
    expect(error.recoverable).toBe(true);
    expect('retryable' in error).toBe(false);
  });

  it('should serialize to JSON correctly', () => {
    const error = new CodesitterError(
      'Test error',
      CodesitterErrorCode.CONFIG_INVALID,
      { path: '/test/path' },
      'high',
      false,
    );

    expect(error.toJSON()).toEqual({
      error: 'Test error',
      code: 'CONFIG_INVALID',
      severity: 'high',
      recoverable: false,
      context: { path: '/test/path' },
    });
  });

  it('should work with all severity levels', () => {
    const severities: ErrorSeverity[] = ['low', 'medium', 'high', 'critical'];

    severities.forEach(severity => {
      const error = new CodesitterError('Test', CodesitterErrorCode.INTERNAL_ERROR, undefined, severity);
      expect(error.severity).toBe(severity);
    });
  });

  it('should be instanceof Error', () => {
    const error = new CodesitterError('Test', CodesitterErrorCode.INTERNAL_ERROR);

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(CodesitterError);
    expect(error.stack).toContain('CodesitterError');
  });
});

describe('error subclasses', () => {
  it('should tag parse errors with the file', () => {
    const error = new ParseError('Unparseable', 'src/broken.ts', { ratio: 0.8 });

    expect(error.name).toBe('ParseError');
    expect(error.code).toBe(CodesitterErrorCode.PARSE_FAILED);
    expect(error.file).toBe('src/broken.ts');
    expect(error.context).toEqual({ ratio: 0.8, file: 'src/broken.ts' });
  });

  it('should tag plugin errors with their source', () => {
    const error = new PluginLoadError('Bad plugin', '/plugins/bad.mjs');

    expect(error.code).toBe(CodesitterErrorCode.PLUGIN_LOAD_FAILED);
    expect(error.context).toEqual({ source: '/plugins/bad.mjs' });
  });

  it('should mark sealed registry errors as unrecoverable', () => {
    const error = new RegistrySealedError('sealed');

    expect(error.recoverable).toBe(false);
    expect(error.severity).toBe('high');
  });

  it('should keep config errors recoverable', () => {
    const error = new ConfigError('Invalid');

    expect(error.code).toBe(CodesitterErrorCode.CONFIG_INVALID);
    expect(isCodesitterError(error)).toBe(true);
  });
});

describe('error helpers', () => {
  it('should wrap an Error and keep its stack as the cause', () => {
    const cause = new Error('boom');
    const wrapped = wrapError(cause, 'Loading plugin', { name: 'x' });

    expect(wrapped.message).toBe('Loading plugin: boom');
    expect(wrapped.code).toBe(CodesitterErrorCode.INTERNAL_ERROR);
    expect(wrapped.context).toEqual({ name: 'x' });
    expect(wrapped.stack).toContain('Caused by:');
  });

  it('should wrap non-Error values', () => {
    expect(wrapError('plain', 'Step').message).toBe('Step: plain');
  });

  it('should extract messages and stacks from unknown values', () => {
    expect(getErrorMessage(new Error('m'))).toBe('m');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorStack('nope')).toBeUndefined();
    expect(getErrorStack(new Error('s'))).toContain('Error: s');
  });

  it('should reject plain errors in the type guard', () => {
    expect(isCodesitterError(new Error('x'))).toBe(false);
  });
});
