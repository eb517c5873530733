/**
 * Page path helpers
 * @module utils/paths
 */

import path from 'node:path';

/**
 * Extension of pages that are rendered as markdown.
 */
export const MARKDOWN_EXTENSION = '.md';

/**
 * Extension of notebook pages, converted to markdown before rendering.
 */
export const NOTEBOOK_EXTENSION = '.ipynb';

/**
 * Normalizes path separators to forward slashes (Unix-style)
 */
export function normalizePath(value: string): string {
  return value.split(path.sep).join('/');
}

/**
 * Checks if a page identifier points at a notebook.
 */
export function isNotebookPath(pagePath: string): boolean {
  return pagePath.endsWith(NOTEBOOK_EXTENSION);
}

/**
 * Rewrites a notebook extension to the markdown one.
 * Other paths are returned unchanged.
 */
export function toMarkdownPath(pagePath: string): string {
  if (!isNotebookPath(pagePath)) return pagePath;
  return pagePath.slice(0, -NOTEBOOK_EXTENSION.length) + MARKDOWN_EXTENSION;
}

/**
 * Splits `path#anchor` at the first `#`.
 * The returned anchor keeps its leading `#`, or is empty.
 */
export function splitAnchor(target: string): { path: string; anchor: string } {
  const hashIndex = target.indexOf('#');
  if (hashIndex < 0) {
    return { path: target, anchor: '' };
  }
  return { path: target.slice(0, hashIndex), anchor: target.slice(hashIndex) };
}
