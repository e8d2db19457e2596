import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, resolveConfigPath } from './loader.js';
import { ConfigError } from '../errors/index.js';

describe('loadConfig', () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codesitter-config-'));
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  function writeConfig(yaml: string): void {
    const configPath = resolveConfigPath(rootDir);
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, yaml);
  }

  it('should return defaults when no config file exists', () => {
    const config = loadConfig(rootDir, {});

    expect(config).toEqual({
      logging: { level: 'info', format: 'text' },
      extraction: { contextWindow: 50, maxErrorRatio: 0.5 },
      plugins: { directory: '.codesitter/analyzers', modules: [] },
    });
  });

  it('should merge a partial file with defaults', () => {
    writeConfig(['extraction:', '  contextWindow: 20', 'logging:', '  level: debug'].join('\n'));

    const config = loadConfig(rootDir, {});

    expect(config.extraction).toEqual({ contextWindow: 20, maxErrorRatio: 0.5 });
    expect(config.logging).toEqual({ level: 'debug', format: 'text' });
  });

  it('should return defaults for an empty file', () => {
    writeConfig('');

    expect(loadConfig(rootDir, {}).extraction.contextWindow).toBe(50);
  });

  it('should interpolate environment variables', () => {
    writeConfig(['plugins:', '  modules:', '    - ${PLUGIN_PKG}'].join('\n'));

    const config = loadConfig(rootDir, { PLUGIN_PKG: 'analyzer-kotlin' });

    expect(config.plugins.modules).toEqual(['analyzer-kotlin']);
  });

  it('should reject values that fail validation', () => {
    writeConfig(['extraction:', '  maxErrorRatio: 2'].join('\n'));

    expect(() => loadConfig(rootDir, {})).toThrow(ConfigError);
    expect(() => loadConfig(rootDir, {})).toThrow('extraction.maxErrorRatio');
  });

  it('should wrap YAML syntax errors', () => {
    writeConfig('logging: [unclosed');

    expect(() => loadConfig(rootDir, {})).toThrow(/Failed to parse/);
  });

  it('should let environment variables override the file', () => {
    writeConfig(['logging:', '  level: error'].join('\n'));

    const config = loadConfig(rootDir, {
      CODESITTER_LOG_LEVEL: 'debug',
      CODESITTER_LOG_FORMAT: 'json',
      CODESITTER_PLUGIN_DIR: '/opt/analyzers',
    });

    expect(config.logging).toEqual({ level: 'debug', format: 'json' });
    expect(config.plugins.directory).toBe('/opt/analyzers');
  });

  it('should reject an invalid environment override', () => {
    expect(() => loadConfig(rootDir, { CODESITTER_LOG_LEVEL: 'loud' })).toThrow(
      'Invalid environment override',
    );
  });
});
