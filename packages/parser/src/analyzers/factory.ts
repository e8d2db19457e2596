import * as path from 'path';
import {
  defaultConfig,
  isCodesitterError,
  isOk,
  tryResult,
  wrapError,
  Err,
  Ok,
  silentLogger,
  type CodesitterConfig,
  type CodesitterError,
  type Logger,
  type Result,
} from '@codesitter/core';
import { AnalyzerRegistry } from './registry.js';
import { createDefaultAnalyzers } from './default.js';
import { TreeSitterAnalyzer } from './tree-sitter-analyzer.js';
import { discoverAnalyzers, type DiscoveryResult } from './plugins.js';
import { getAllLanguages } from '../ast/languages/registry.js';
import type {
  CallRelationship,
  ExtractedElement,
  FileMetadata,
  ImportRelationship,
} from '../types.js';

export interface CreateRegistryOptions {
  config?: CodesitterConfig;
  logger?: Logger;
  /** Base for a relative plugin directory (default: cwd) */
  rootDir?: string;
}

/**
 * Registry with the no-op analyzers and every built-in language, not sealed.
 */
export function createBuiltinRegistry(options: CreateRegistryOptions = {}): AnalyzerRegistry {
  const logger = options.logger ?? silentLogger;
  const config = options.config ?? defaultConfig();
  const registry = new AnalyzerRegistry({ logger });

  for (const analyzer of createDefaultAnalyzers()) {
    registry.register(analyzer);
  }
  for (const definition of getAllLanguages()) {
    registry.register(new TreeSitterAnalyzer(definition, { logger, extraction: config.extraction }));
  }

  return registry;
}

/**
 * Built-ins, then plugins from the configured directory and modules.
 * The returned registry is sealed.
 */
export async function createAnalyzerRegistry(
  options: CreateRegistryOptions = {},
): Promise<{ registry: AnalyzerRegistry; plugins: DiscoveryResult }> {
  const logger = options.logger ?? silentLogger;
  const config = options.config ?? defaultConfig();
  const registry = createBuiltinRegistry({ ...options, config, logger });

  const directory = path.resolve(options.rootDir ?? process.cwd(), config.plugins.directory);
  const plugins = await discoverAnalyzers(
    registry,
    { directory, modules: config.plugins.modules },
    logger,
  );

  registry.seal();
  return { registry, plugins };
}

export interface FileAnalysis {
  filename: string;
  language: string;
  /** Err when the file could not be parsed; the other passes still ran */
  structure: Result<ExtractedElement[], CodesitterError>;
  calls: CallRelationship[];
  imports: ImportRelationship[];
  metadata: FileMetadata;
}

/**
 * Run every extraction pass for one file.
 */
export function analyzeFile(registry: AnalyzerRegistry, filename: string, content: string): FileAnalysis {
  const analyzer = registry.resolve(filename);

  const attempt = tryResult(() => analyzer.extractStructure(filename, content));
  let structure: Result<ExtractedElement[], CodesitterError>;
  if (isOk(attempt)) {
    structure = Ok(attempt.value);
  } else if (isCodesitterError(attempt.error)) {
    structure = Err(attempt.error);
  } else {
    structure = Err(wrapError(attempt.error, `Structure extraction failed for ${filename}`));
  }

  return {
    filename,
    language: analyzer.language,
    structure,
    calls: analyzer.extractCalls(filename, content),
    imports: analyzer.extractImports(filename, content),
    metadata: analyzer.extractMetadata(filename, content),
  };
}
