/**
 * Page pipeline orchestrator
 * @module pipeline/orchestrator
 */

import { DEFAULT_TARGET_LANGUAGE, getConfig, resolveTargetLanguage } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { savePageOutput } from '../output/mirror.js';
import {
  transformConditionalBlocks,
  transformExecPaths,
  transformHighlightLines,
  transformStripBase64Images,
} from '../transforms/index.js';
import { debugLog, debugTime, debugTimeEnd } from '../utils/debug.js';
import { isNotebookPath } from '../utils/paths.js';
import { pipe, tap, when } from './pipe.js';
import type {
  PageCollaborators,
  PageContext,
  PageIdentity,
  PageTransform,
  PageTransformConfig,
  PipelineOptions,
  ProcessPageOptions,
  TransformPageOptions,
} from './types.js';

/**
 * Default context values for page steps.
 */
const DEFAULT_CONTEXT: PageContext = {
  markdown: '',
  page: { sourcePath: '', absoluteSourcePath: '' },
  config: {
    targetLanguage: DEFAULT_TARGET_LANGUAGE,
    addApiReferences: true,
    removeBase64Images: false,
  },
};

/**
 * Creates a PageContext with default values.
 *
 * @example
 * const ctx = createContext({
 *   markdown: '# Streaming',
 *   page: { sourcePath: 'how-tos/streaming.md', absoluteSourcePath: '/docs/how-tos/streaming.md' },
 * });
 */
export function createContext(
  overrides: Partial<Omit<PageContext, 'config'>> & { config?: Partial<PageTransformConfig> } = {}
): PageContext {
  return {
    markdown: overrides.markdown ?? DEFAULT_CONTEXT.markdown,
    page: overrides.page ?? DEFAULT_CONTEXT.page,
    config: {
      ...DEFAULT_CONTEXT.config,
      ...overrides.config,
    },
  };
}

/**
 * Notebook pages are replaced by their converted markdown.
 */
function convertNotebookStep(collaborators: PageCollaborators): PageTransform {
  return async (ctx) => {
    if (!isNotebookPath(ctx.page.sourcePath)) {
      return ctx;
    }
    if (!collaborators.convertNotebook) {
      throw new ConfigurationError(
        `${ctx.page.sourcePath} is a notebook but no notebook converter is configured`
      );
    }
    return { ...ctx, markdown: await collaborators.convertNotebook(ctx.page.absoluteSourcePath) };
  };
}

function rewriteAutolinksStep(collaborators: PageCollaborators): PageTransform {
  return async (ctx) => {
    if (!collaborators.rewriteAutolinks) {
      return ctx;
    }
    return {
      ...ctx,
      markdown: await collaborators.rewriteAutolinks(
        ctx.markdown,
        ctx.page.sourcePath,
        ctx.config.targetLanguage
      ),
    };
  };
}

function injectReferenceLinksStep(collaborators: PageCollaborators): PageTransform {
  return async (ctx) => {
    if (!collaborators.injectReferenceLinks) {
      return ctx;
    }
    return {
      ...ctx,
      markdown: await collaborators.injectReferenceLinks(ctx.markdown, ctx.page.absoluteSourcePath),
    };
  };
}

/**
 * Creates the page pipeline.
 *
 * Step order:
 * 1. Notebook conversion (collaborator, notebooks only)
 * 2. afterConvert hooks
 * 3. Autolink rewriting (collaborator)
 * 4. Reference link injection (collaborator, when `addApiReferences`)
 * 5. Highlight markers → `hl_lines`
 * 6. Conditional blocks
 * 7. Exec fence paths
 * 8. Base64 image removal (when `removeBase64Images`)
 * 9. beforeOutput hooks
 */
export function createPagePipeline(options: PipelineOptions = {}): PageTransform {
  const { collaborators = {}, afterConvert = [], beforeOutput = [] } = options;

  return pipe<PageContext>(
    convertNotebookStep(collaborators),
    ...afterConvert,
    rewriteAutolinksStep(collaborators),
    when<PageContext>((ctx) => ctx.config.addApiReferences, injectReferenceLinksStep(collaborators)),
    transformHighlightLines,
    transformConditionalBlocks,
    transformExecPaths,
    when<PageContext>((ctx) => ctx.config.removeBase64Images, transformStripBase64Images),
    ...beforeOutput
  );
}

/**
 * Creates a pipeline from the given steps only, without built-ins.
 */
export function createCustomPipeline(...transforms: PageTransform[]): PageTransform {
  return pipe<PageContext>(...transforms);
}

/**
 * Runs one page through the pipeline and returns its final markdown.
 *
 * Returns `markdown` untouched when the pipeline is disabled. The target
 * language is checked before any step runs.
 *
 * @throws {ConfigurationError} for an unknown target language or a
 *   notebook page without converter; collaborator errors pass through
 */
export async function transformPage(
  markdown: string,
  page: PageIdentity,
  options: TransformPageOptions = {}
): Promise<string> {
  const env = options.config ?? getConfig();
  if (env.disabled) {
    return markdown;
  }

  const targetLanguage = resolveTargetLanguage(options.targetLanguage ?? env.targetLanguage);
  const pipeline = createPagePipeline(options);

  debugTime(page.sourcePath);
  try {
    const result = await pipeline(
      createContext({
        markdown,
        page,
        config: {
          targetLanguage,
          addApiReferences: options.addApiReferences ?? true,
          removeBase64Images: options.removeBase64Images ?? false,
        },
      })
    );
    return result.markdown;
  } finally {
    debugTimeEnd(page.sourcePath);
  }
}

/**
 * {@link transformPage}, then mirrors the result to the markdown output
 * directory when one is configured.
 */
export async function processPage(
  markdown: string,
  page: PageIdentity,
  options: ProcessPageOptions = {}
): Promise<string> {
  const outputDir = resolveMarkdownOutputDir(options);
  const run = pipe<string>(
    (input) => transformPage(input, page, options),
    tap(async (final) => {
      if (!outputDir) return;
      const file = await savePageOutput(final, outputDir, page.sourcePath);
      debugLog(`mirrored ${page.sourcePath} to ${file}`);
    })
  );
  return run(markdown);
}

/**
 * Mirror directory for a run: the per-invocation option when given,
 * otherwise `DOCSHIFT_MD_OUTPUT_PATH`. Empty means none.
 */
export function resolveMarkdownOutputDir(options: ProcessPageOptions = {}): string | null {
  const outputDir =
    options.markdownOutputDir !== undefined
      ? options.markdownOutputDir
      : (options.config ?? getConfig()).markdownOutputDir;
  return outputDir || null;
}
