/**
 * Type definitions for the page pipeline
 * @module pipeline/types
 */

import type { DocshiftConfig, TargetLanguage } from '../config.js';

/**
 * Identity of the page being built. Owned by the site generator.
 */
export interface PageIdentity {
  /** Page path relative to the docs root, with forward slashes */
  sourcePath: string;
  /** Absolute path of the source file */
  absoluteSourcePath: string;
  /** File the page renders to, relative to the site root */
  outputPath?: string;
  /** Whether the site serves `a/b/` instead of `a/b.html` */
  directoryUrls?: boolean;
}

/**
 * Steps delegated to the surrounding build. Each may be async; errors
 * they raise fail the page.
 */
export interface PageCollaborators {
  /** Turns a notebook file into markdown */
  convertNotebook?: (absoluteSourcePath: string) => string | Promise<string>;
  /** Rewrites autolinks / cross-references */
  rewriteAutolinks?: (
    markdown: string,
    pagePath: string,
    defaultScope: TargetLanguage
  ) => string | Promise<string>;
  /** Adds API reference links to code samples */
  injectReferenceLinks?: (markdown: string, absoluteSourcePath: string) => string | Promise<string>;
}

/**
 * Resolved settings for one page run.
 */
export interface PageTransformConfig {
  /** Language kept by conditional blocks */
  targetLanguage: TargetLanguage;
  /** Run the reference-link collaborator */
  addApiReferences: boolean;
  /** Drop inline base64 images at the end */
  removeBase64Images: boolean;
}

/**
 * Context passed from step to step.
 */
export interface PageContext {
  /** Current markdown */
  markdown: string;
  page: PageIdentity;
  config: PageTransformConfig;
}

/**
 * A page step: takes a context and returns the next one.
 */
export type PageTransform = (ctx: PageContext) => PageContext | Promise<PageContext>;

/**
 * Options for building a page pipeline.
 */
export interface PipelineOptions {
  collaborators?: PageCollaborators;
  /** Steps to run right after notebook conversion */
  afterConvert?: PageTransform[];
  /** Steps to run after every built-in transform */
  beforeOutput?: PageTransform[];
}

/**
 * Per-invocation options of {@link transformPage}.
 */
export interface TransformPageOptions extends PipelineOptions {
  /** Overrides the configured target language */
  targetLanguage?: string;
  /** @default true */
  addApiReferences?: boolean;
  /** @default false */
  removeBase64Images?: boolean;
  /** Environment settings; read from `process.env` when omitted */
  config?: DocshiftConfig;
}

/**
 * Options of {@link processPage}.
 */
export interface ProcessPageOptions extends TransformPageOptions {
  /** Overrides the configured markdown mirror directory */
  markdownOutputDir?: string | null;
}
