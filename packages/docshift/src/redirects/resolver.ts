/**
 * Redirect target resolution
 * @module redirects/resolver
 */

import path from 'node:path';
import { splitAnchor, toMarkdownPath } from '../utils/paths.js';
import type { RedirectEntry, RedirectTable } from './table.js';

/**
 * How the site generator maps page identifiers to files and URLs.
 */
export interface SiteLayout {
  /** File the page renders to, relative to the site root */
  outputPath(pagePath: string, directoryUrls: boolean): string;
  /** URL of the page, relative to the site root */
  url(pagePath: string, directoryUrls: boolean): string;
}

/**
 * A redirect ready to be written.
 */
export interface RedirectPlan {
  /** Retired page, normalized to markdown */
  oldPath: string;
  /** Where the stub is written, relative to the site root */
  outputPath: string;
  /** Stub target, relative to the stub's directory */
  target: string;
}

export interface ResolveRedirectsOptions {
  /** URL style the retired pages were published with */
  directoryUrls: boolean;
}

/**
 * Relative URL from `fromDir` to `url`, both relative to the site root.
 * A trailing slash on `url` is kept.
 *
 * @example
 * relativeUrl('c/d/', 'a/b') // => '../../c/d/'
 * relativeUrl('./', 'cloud')  // => '../'
 */
export function relativeUrl(url: string, fromDir: string): string {
  const relative = path.posix.relative(
    path.posix.join('/', fromDir),
    path.posix.join('/', url)
  );
  if (url.endsWith('/')) {
    return relative ? `${relative}/` : './';
  }
  return relative || '.';
}

/**
 * Resolves a single entry. The replacement page is always addressed with
 * directory-style URLs; the retired page keeps the site's URL style so the
 * stub lands where the old page used to be.
 */
export function resolveRedirect(
  entry: RedirectEntry,
  layout: SiteLayout,
  options: ResolveRedirectsOptions
): RedirectPlan {
  const oldPath = toMarkdownPath(entry.oldPath);
  const { path: newPath, anchor } = splitAnchor(entry.newTarget);

  const outputPath = layout.outputPath(oldPath, options.directoryUrls);
  const destination = layout.url(toMarkdownPath(newPath), true);
  const target = relativeUrl(destination, path.posix.dirname(outputPath)) + anchor;

  return { oldPath, outputPath, target };
}

/**
 * Resolves every entry of `table`, in table order. Each entry is resolved
 * on its own: a target that is itself retired is not followed.
 */
export function resolveRedirects(
  table: RedirectTable,
  layout: SiteLayout,
  options: ResolveRedirectsOptions
): RedirectPlan[] {
  return table.entries.map((entry) => resolveRedirect(entry, layout, options));
}
