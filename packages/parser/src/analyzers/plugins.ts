/**
 * Analyzer plugins: modules whose default export (or `analyzer` /
 * `analyzers` export) is an Analyzer or an array of them.
 *
 * A plugin directory is scanned for `.js` / `.mjs` files; package
 * specifiers listed in config are imported as-is.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { PluginLoadError, getErrorMessage, silentLogger, type Logger } from '@codesitter/core';
import { describeAnalyzerShapeError, isAnalyzer, type Analyzer } from './types.js';
import type { AnalyzerRegistry } from './registry.js';

const PLUGIN_EXTENSIONS = new Set(['.js', '.mjs']);

export interface PluginFailure {
  source: string;
  error: PluginLoadError;
}

export interface DiscoveryResult {
  /** Languages registered, in load order */
  registered: string[];
  failed: PluginFailure[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function pickExport(mod: unknown): unknown {
  if (!isRecord(mod)) return mod;
  return mod.default ?? mod.analyzers ?? mod.analyzer;
}

/**
 * Import a plugin module and return the analyzers it exports.
 *
 * @param source - package name, or an absolute path to a plugin file
 * @throws PluginLoadError when the import fails or an export has the wrong shape
 */
export async function loadAnalyzerModule(source: string): Promise<Analyzer[]> {
  const specifier = path.isAbsolute(source) ? pathToFileURL(source).href : source;

  let mod: unknown;
  try {
    mod = await import(specifier);
  } catch (error) {
    throw new PluginLoadError(`Failed to load plugin "${source}": ${getErrorMessage(error)}`, source);
  }

  const exported = pickExport(mod);
  const candidates: unknown[] = Array.isArray(exported) ? exported : [exported];
  if (candidates.length === 0) {
    throw new PluginLoadError(`Plugin "${source}" exports no analyzers`, source);
  }

  const analyzers: Analyzer[] = [];
  for (const candidate of candidates) {
    if (!isAnalyzer(candidate)) {
      throw new PluginLoadError(
        `Plugin "${source}" is not a valid analyzer: ${describeAnalyzerShapeError(candidate)}`,
        source,
      );
    }
    analyzers.push(candidate);
  }
  return analyzers;
}

/**
 * Plugin files in a directory, sorted by name. A missing directory has none.
 */
export async function findPluginFiles(directory: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') return [];
    throw error;
  }

  return entries
    .filter(entry => PLUGIN_EXTENSIONS.has(path.extname(entry)))
    .sort()
    .map(entry => path.join(directory, entry));
}

/**
 * Load plugins from a directory and a list of module specifiers into
 * `registry`. Each failing plugin is logged and skipped.
 */
export async function discoverAnalyzers(
  registry: AnalyzerRegistry,
  sources: { directory?: string; modules?: readonly string[] },
  logger: Logger = silentLogger,
): Promise<DiscoveryResult> {
  const result: DiscoveryResult = { registered: [], failed: [] };

  const files = sources.directory ? await findPluginFiles(sources.directory) : [];
  if (sources.directory && files.length === 0) {
    logger.debug(`No analyzer plugins in ${sources.directory}`);
  }

  for (const source of [...files, ...(sources.modules ?? [])]) {
    try {
      for (const analyzer of await loadAnalyzerModule(source)) {
        registry.register(analyzer);
        result.registered.push(analyzer.language);
      }
    } catch (error) {
      const failure =
        error instanceof PluginLoadError
          ? error
          : new PluginLoadError(`Failed to register plugin "${source}": ${getErrorMessage(error)}`, source);
      logger.error(failure.message);
      result.failed.push({ source, error: failure });
    }
  }

  return result;
}
