/**
 * Context-aware transform wrappers for pipeline composition
 * @module transforms
 */

import { hasFenceMarkers } from '../fences/matcher.js';
import type { PageContext } from '../pipeline/types.js';
import { stripBase64Images } from './base64-images.js';
import { renderConditionalBlocks } from './conditional-blocks.js';
import { addPathToExecBlocks } from './exec-path.js';
import { highlightCodeBlocks } from './highlight-lines.js';

/**
 * Turns highlight marker comments into `hl_lines` attributes.
 */
export function transformHighlightLines(ctx: PageContext): PageContext {
  if (!hasFenceMarkers(ctx.markdown)) {
    return ctx;
  }
  return { ...ctx, markdown: highlightCodeBlocks(ctx.markdown) };
}

/**
 * Keeps the conditional blocks of the page's target language.
 */
export function transformConditionalBlocks(ctx: PageContext): PageContext {
  return {
    ...ctx,
    markdown: renderConditionalBlocks(ctx.markdown, ctx.config.targetLanguage),
  };
}

/**
 * Adds the page path to fences marked `exec="on"`.
 */
export function transformExecPaths(ctx: PageContext): PageContext {
  if (!hasFenceMarkers(ctx.markdown)) {
    return ctx;
  }
  return { ...ctx, markdown: addPathToExecBlocks(ctx.markdown, ctx.page.sourcePath) };
}

/**
 * Removes inline base64 images.
 */
export function transformStripBase64Images(ctx: PageContext): PageContext {
  return { ...ctx, markdown: stripBase64Images(ctx.markdown) };
}

// Re-export from sub-modules
export { highlightCodeBlocks, transpileHighlightFence, highlightMarkerFor, HL_LINES_ATTRIBUTE } from './highlight-lines.js';
export { renderConditionalBlocks, type ConditionalBlock } from './conditional-blocks.js';
export { addPathToExecBlocks, annotateExecFence } from './exec-path.js';
export { stripBase64Images } from './base64-images.js';
