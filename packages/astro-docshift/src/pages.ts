/**
 * Final markdown of loaded pages, shared by the loader and the integration
 * @module pages
 */

import type { PageMarkdown, SiteLayout } from 'docshift';

export interface LoadedPage {
  /** Page path under the docs root, notebooks renamed to `.md` */
  pagePath: string;
  /** Final markdown, frontmatter removed */
  markdown: string;
  title?: string;
}

/**
 * Loaded pages by entry id.
 */
export type PageRegistry = Map<string, LoadedPage>;

export function createPageRegistry(): PageRegistry {
  return new Map();
}

/**
 * Registry used when the loader and the integration are not given one.
 * Both run in the build process, so they meet here.
 */
export const loadedPages: PageRegistry = createPageRegistry();

export interface PageLookupOptions {
  directoryUrls: boolean;
  /** Route prefix the docs collection is served under, e.g. `docs` */
  routeBase?: string;
}

function siteUrl(routeBase: string, url: string): string {
  const relative = url === './' ? '' : url;
  return `/${routeBase ? `${routeBase}/` : ''}${relative}`;
}

/**
 * Maps built HTML files (relative to the output directory) to the
 * markdown of the page rendered there.
 */
export function createPageLookup(
  pages: PageRegistry,
  layout: SiteLayout,
  { directoryUrls, routeBase = '' }: PageLookupOptions
): (file: string) => PageMarkdown | undefined {
  const base = routeBase.replace(/^\/+|\/+$/g, '');
  const byFile = new Map<string, PageMarkdown>();

  for (const page of pages.values()) {
    const outputPath = layout.outputPath(page.pagePath, directoryUrls);
    byFile.set(base ? `${base}/${outputPath}` : outputPath, {
      markdown: page.markdown,
      title: page.title,
      url: siteUrl(base, layout.url(page.pagePath, directoryUrls)),
    });
  }

  return (file) => byFile.get(file);
}
