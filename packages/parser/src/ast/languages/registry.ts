import { extname } from 'path';
import type { LanguageDefinition, TreeSitterLanguage } from './types.js';
import { typescriptDefinition } from './typescript.js';
import { javascriptDefinition } from './javascript.js';
import { pythonDefinition } from './python.js';
import { javaDefinition } from './java.js';

/**
 * All built-in language definitions.
 * To add a new language, create a definition file and add it here.
 */
const definitions: LanguageDefinition[] = [
  typescriptDefinition,
  javascriptDefinition,
  pythonDefinition,
  javaDefinition,
];

/**
 * Canonical list of built-in language IDs.
 * To add a new language: add its ID here, then add its definition to `definitions` above.
 */
export const LANGUAGE_IDS = ['typescript', 'javascript', 'python', 'java'] as const;
export type SupportedLanguage = (typeof LANGUAGE_IDS)[number];

const languageRegistry = new Map<string, LanguageDefinition>();
const extensionMap = new Map<string, string>();

for (const def of definitions) {
  if (languageRegistry.has(def.id)) {
    throw new Error(`Duplicate language ID in registry: ${def.id}`);
  }
  languageRegistry.set(def.id, def);

  for (const ext of def.extensions) {
    if (extensionMap.has(ext)) {
      throw new Error(
        `Duplicate extension "${ext}" registered by "${def.id}" (already claimed by "${extensionMap.get(ext)}")`,
      );
    }
    extensionMap.set(ext, def.id);
  }
}

for (const id of LANGUAGE_IDS) {
  if (!languageRegistry.has(id)) {
    throw new Error(`Language "${id}" is in LANGUAGE_IDS but has no definition in the registry`);
  }
}

/**
 * Get the full definition of a built-in language.
 *
 * @throws Error if language is not registered
 */
export function getLanguage(language: SupportedLanguage): LanguageDefinition {
  const def = languageRegistry.get(language);
  if (!def) {
    throw new Error(`No language definition registered for: ${language}`);
  }
  return def;
}

/**
 * Lower-cased extension of a path, without the dot ('' when none).
 */
export function extensionOf(filePath: string): string {
  return extname(filePath).slice(1).toLowerCase();
}

/**
 * Detect which built-in language a file belongs to, based on extension.
 */
export function detectLanguage(filePath: string): string | null {
  return extensionMap.get(extensionOf(filePath)) ?? null;
}

export function getAllLanguages(): readonly LanguageDefinition[] {
  return definitions.slice();
}

/**
 * Grammar to parse `filePath` with: the extension's variant if the
 * language has one (e.g. tsx), else its default grammar.
 */
export function grammarFor(def: LanguageDefinition, filePath: string): TreeSitterLanguage {
  return def.grammarVariants?.[extensionOf(filePath)] ?? def.grammar;
}
