import { z } from 'zod';

export const DEFAULT_CONTEXT_WINDOW = 50;
export const DEFAULT_MAX_ERROR_RATIO = 0.5;
export const DEFAULT_PLUGIN_DIRECTORY = '.codesitter/analyzers';

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  })
  .default({});

const extractionSchema = z
  .object({
    /** Characters of source kept on each side of a call site */
    contextWindow: z.number().int().nonnegative().default(DEFAULT_CONTEXT_WINDOW),
    /** Share of the file covered by top-level ERROR nodes above which parsing fails */
    maxErrorRatio: z.number().min(0).max(1).default(DEFAULT_MAX_ERROR_RATIO),
  })
  .default({});

const pluginsSchema = z
  .object({
    directory: z.string().default(DEFAULT_PLUGIN_DIRECTORY),
    modules: z.array(z.string()).default([]),
  })
  .default({});

export const codesitterConfigSchema = z.object({
  logging: loggingSchema,
  extraction: extractionSchema,
  plugins: pluginsSchema,
});

export type CodesitterConfig = z.infer<typeof codesitterConfigSchema>;
export type ExtractionConfig = CodesitterConfig['extraction'];

/**
 * Configuration used when no config file exists.
 */
export function defaultConfig(): CodesitterConfig {
  return codesitterConfigSchema.parse({});
}
