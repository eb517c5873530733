/**
 * docshift - text rewriting for documentation builds.
 *
 * Rewrites page markdown before it is rendered (highlight markers,
 * language-conditional blocks, executable fence paths) and writes
 * redirect stubs for retired pages once the site is built.
 *
 * @module docshift
 */

// Configuration and errors
export {
  loadConfig,
  getConfig,
  resolveTargetLanguage,
  isTargetLanguage,
  TARGET_LANGUAGES,
  DEFAULT_TARGET_LANGUAGE,
  type DocshiftConfig,
  type TargetLanguage,
} from './config.js';
export { ConfigurationError } from './errors.js';

// Fences
export { matchFences, replaceFences, renderFence, hasFenceMarkers, type CodeFence } from './fences/matcher.js';

// Transforms
export * from './transforms/index.js';

// Pipeline
export * from './pipeline/index.js';

// Redirects
export { createRedirectTable, readRedirectTable, type RedirectEntry, type RedirectTable } from './redirects/table.js';
export {
  resolveRedirect,
  resolveRedirects,
  relativeUrl,
  type SiteLayout,
  type RedirectPlan,
  type ResolveRedirectsOptions,
} from './redirects/resolver.js';
export { renderRedirectStub } from './redirects/stub.js';
export { writeRedirects, generateRedirects } from './redirects/writer.js';

// Output
export { savePageOutput } from './output/mirror.js';
export {
  embedPageMarkdown,
  createMarkdownEmbedder,
  PAGE_MARKDOWN_SCRIPT_ID,
  type HtmlTransform,
  type PageMarkdown,
} from './html/embed-markdown.js';

// Paths
export {
  normalizePath,
  toMarkdownPath,
  splitAnchor,
  isNotebookPath,
  MARKDOWN_EXTENSION,
  NOTEBOOK_EXTENSION,
} from './utils/paths.js';
