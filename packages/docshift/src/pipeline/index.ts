/**
 * Page pipeline - public API
 *
 * @module pipeline
 *
 * @example
 * import { createPagePipeline, createContext } from 'docshift';
 *
 * const pipeline = createPagePipeline({
 *   collaborators: { rewriteAutolinks: myAutolinker },
 *   beforeOutput: [addEditLink],
 * });
 *
 * const result = await pipeline(createContext({ markdown, page }));
 */

export { pipe, when, tap, type Step } from './pipe.js';
export {
  createPagePipeline,
  createCustomPipeline,
  createContext,
  transformPage,
  processPage,
  resolveMarkdownOutputDir,
} from './orchestrator.js';
export type {
  PageIdentity,
  PageCollaborators,
  PageTransformConfig,
  PageContext,
  PageTransform,
  PipelineOptions,
  TransformPageOptions,
  ProcessPageOptions,
} from './types.js';
