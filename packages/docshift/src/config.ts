/**
 * Environment configuration
 * @module config
 */

import { ConfigurationError } from './errors.js';

/**
 * Languages a conditional block can be rendered for.
 */
export const TARGET_LANGUAGES = ['python', 'js'] as const;

export type TargetLanguage = (typeof TARGET_LANGUAGES)[number];

export const DEFAULT_TARGET_LANGUAGE: TargetLanguage = 'python';

/**
 * Values that switch the pipeline off when found in `DOCSHIFT_DISABLE`.
 */
const DISABLE_VALUES = new Set(['1', 'true', 'True']);

/**
 * Settings read from the environment once per build.
 */
export interface DocshiftConfig {
  /** Return every page untouched */
  disabled: boolean;
  /** Raw target language; validated when a page is built */
  targetLanguage: string;
  /** Directory receiving a copy of each page's final markdown */
  markdownOutputDir: string | null;
}

export function isTargetLanguage(value: string): value is TargetLanguage {
  return (TARGET_LANGUAGES as readonly string[]).includes(value);
}

/**
 * Narrows a raw selector to a target language.
 *
 * @throws {ConfigurationError} for anything other than `python` or `js`
 */
export function resolveTargetLanguage(value: string): TargetLanguage {
  if (!isTargetLanguage(value)) {
    throw new ConfigurationError(
      `target language must be 'python' or 'js', got '${value}'`
    );
  }
  return value;
}

/**
 * Reads the docshift settings from an environment map.
 *
 * @example
 * loadConfig({ DOCSHIFT_TARGET_LANGUAGE: 'js' })
 * // => { disabled: false, targetLanguage: 'js', markdownOutputDir: null }
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): DocshiftConfig {
  const disable = env.DOCSHIFT_DISABLE;
  const outputDir = env.DOCSHIFT_MD_OUTPUT_PATH;
  return {
    disabled: disable !== undefined && DISABLE_VALUES.has(disable),
    targetLanguage: env.DOCSHIFT_TARGET_LANGUAGE || DEFAULT_TARGET_LANGUAGE,
    markdownOutputDir: outputDir ? outputDir : null,
  };
}

let processConfig: DocshiftConfig | null = null;

/**
 * Settings from `process.env`, read on first use and kept for the build.
 */
export function getConfig(): DocshiftConfig {
  processConfig ??= loadConfig();
  return processConfig;
}
