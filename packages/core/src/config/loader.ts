/**
 * Loads `.codesitter/config.yml`.
 *
 * Missing file means defaults. `${VAR}` references are interpolated from
 * the environment before validation, and a few CODESITTER_* variables
 * override the file afterwards.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import { codesitterConfigSchema, defaultConfig, type CodesitterConfig } from './schema.js';
import { consoleLogger, createJsonLogger, withLevel, type Logger } from '../logger.js';

export const CONFIG_DIR = '.codesitter';
export const CONFIG_FILENAME = 'config.yml';

export function resolveConfigPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Interpolate environment variables in strings.
 * Supports ${VAR_NAME} syntax; unset variables become empty strings.
 */
function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{(\w+)\}/g, (_, varName: string) => env[varName] ?? '');
}

function interpolateConfig(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => interpolateConfig(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateConfig(value, env);
    }
    return result;
  }
  return obj;
}

function readConfigFile(configPath: string): unknown {
  try {
    return parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }
}

/**
 * Apply CODESITTER_* environment overrides on top of a validated config.
 */
function applyEnvOverrides(config: CodesitterConfig, env: NodeJS.ProcessEnv): CodesitterConfig {
  const overridden = codesitterConfigSchema.safeParse({
    logging: {
      level: env.CODESITTER_LOG_LEVEL || config.logging.level,
      format: env.CODESITTER_LOG_FORMAT || config.logging.format,
    },
    extraction: config.extraction,
    plugins: {
      ...config.plugins,
      directory: env.CODESITTER_PLUGIN_DIR || config.plugins.directory,
    },
  });

  if (!overridden.success) {
    throw new ConfigError(`Invalid environment override:\n${formatIssues(overridden.error.issues)}`);
  }
  return overridden.data;
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map(i => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

/**
 * Load and validate the config for a project root.
 *
 * @throws ConfigError when the file is not valid YAML or fails validation
 */
export function loadConfig(
  rootDir: string,
  env: NodeJS.ProcessEnv = process.env,
): CodesitterConfig {
  const configPath = resolveConfigPath(rootDir);

  if (!fs.existsSync(configPath)) {
    return applyEnvOverrides(defaultConfig(), env);
  }

  const parsed = readConfigFile(configPath);
  if (!parsed || typeof parsed !== 'object') {
    return applyEnvOverrides(defaultConfig(), env);
  }

  const result = codesitterConfigSchema.safeParse(interpolateConfig(parsed, env));
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${configPath}:\n${formatIssues(result.error.issues)}`, {
      path: configPath,
    });
  }

  return applyEnvOverrides(result.data, env);
}

/**
 * Build the logger a config asks for.
 */
export function createLoggerFromConfig(config: CodesitterConfig): Logger {
  const base = config.logging.format === 'json' ? createJsonLogger('codesitter') : consoleLogger;
  return withLevel(base, config.logging.level);
}
