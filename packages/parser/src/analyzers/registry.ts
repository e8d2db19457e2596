import {
  NoAnalyzerError,
  RegistrySealedError,
  silentLogger,
  type Logger,
} from '@codesitter/core';
import type { Analyzer } from './types.js';
import { UNKNOWN_ANALYZER } from './default.js';
import { extensionOf } from '../ast/languages/registry.js';

export interface AnalyzerRegistryOptions {
  logger?: Logger;
  /** Returned by {@link AnalyzerRegistry.resolve} for unclaimed files */
  fallback?: Analyzer;
}

function normalizeExtension(ext: string): string {
  return ext.replace(/^\./, '').toLowerCase();
}

/**
 * Maps languages and file extensions to analyzers.
 *
 * Populated at start-up, then sealed; lookups on a sealed registry are
 * read-only and safe to share.
 */
export class AnalyzerRegistry {
  private readonly analyzers = new Map<string, Analyzer>();
  private readonly extensionMap = new Map<string, string>();
  private readonly logger: Logger;
  private readonly fallback: Analyzer;
  private sealed = false;

  constructor(options: AnalyzerRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.fallback = options.fallback ?? UNKNOWN_ANALYZER;
  }

  /**
   * Register an analyzer. An analyzer for an already registered language
   * replaces it; an extension claimed by another language moves over.
   *
   * @throws RegistrySealedError after {@link seal}
   */
  register(analyzer: Analyzer): void {
    if (this.sealed) {
      throw new RegistrySealedError(
        `Cannot register "${analyzer.language}": analyzer registry is sealed`,
        { language: analyzer.language },
      );
    }

    const { language } = analyzer;
    if (this.analyzers.has(language)) {
      this.logger.warning(`Overwriting existing analyzer for ${language}`);
      for (const [ext, owner] of this.extensionMap) {
        if (owner === language) this.extensionMap.delete(ext);
      }
    }
    this.analyzers.set(language, analyzer);

    const extensions = analyzer.extensions.map(normalizeExtension);
    for (const ext of extensions) {
      const owner = this.extensionMap.get(ext);
      if (owner && owner !== language) {
        this.logger.warning(`Extension .${ext} moves from ${owner} to ${language}`);
      }
      this.extensionMap.set(ext, language);
    }

    this.logger.debug(`Registered ${language} analyzer for extensions: ${extensions.join(', ')}`);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Analyzer claiming the file's extension, or null.
   */
  find(filename: string): Analyzer | null {
    const language = this.extensionMap.get(extensionOf(filename));
    return (language && this.analyzers.get(language)) || null;
  }

  /**
   * Analyzer for a file, falling back to a no-op analyzer.
   */
  resolve(filename: string): Analyzer {
    return this.find(filename) ?? this.fallback;
  }

  /**
   * @throws NoAnalyzerError when no analyzer claims the file
   */
  require(filename: string): Analyzer {
    const analyzer = this.find(filename);
    if (!analyzer) {
      throw new NoAnalyzerError(`No analyzer registered for ${filename}`, { filename });
    }
    return analyzer;
  }

  get(language: string): Analyzer | undefined {
    return this.analyzers.get(language);
  }

  languages(): string[] {
    return [...this.analyzers.keys()];
  }

  /**
   * Extension (without dot) → language.
   */
  listSupportedExtensions(): Record<string, string> {
    return Object.fromEntries(this.extensionMap);
  }
}
