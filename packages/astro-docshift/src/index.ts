import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { AstroIntegration, AstroIntegrationLogger } from 'astro';
import { globby } from 'globby';
import {
  createMarkdownEmbedder,
  createRedirectTable,
  generateRedirects,
  readRedirectTable,
  type HtmlTransform,
  type RedirectTable,
  type SiteLayout,
} from 'docshift';
import { createPageLookup, loadedPages, type PageRegistry } from './pages.js';
import { directorySiteLayout } from './routes.js';

/**
 * Configuration options for the docshift integration.
 */
export interface DocshiftOptions {
  /**
   * Retired pages and their replacements: a table, an object of
   * `oldPath: newTarget` pairs, or the path of a JSON file holding one
   * (relative to the project root).
   */
  redirects?: RedirectTable | Readonly<Record<string, string>> | string;

  /**
   * Post-processors applied in order to every built HTML page, before
   * redirect stubs are written. They receive the page's path relative to
   * the output directory.
   */
  htmlTransforms?: HtmlTransform[];

  /**
   * Embeds each loaded page's final markdown in its built HTML as
   * `<script id="page-markdown-content" type="application/json">`.
   * `routeBase` is the route prefix the docs collection is served under.
   */
  embedMarkdown?: boolean | { routeBase?: string };

  /**
   * Pages recorded by {@link docshiftLoader}.
   * @default loadedPages
   */
  pages?: PageRegistry;

  /**
   * Maps pages to built files and URLs.
   * @default directorySiteLayout
   */
  layout?: SiteLayout;
}

function isRedirectTable(
  value: RedirectTable | Readonly<Record<string, string>>
): value is RedirectTable {
  return typeof value.get === 'function';
}

async function loadRedirects(
  redirects: DocshiftOptions['redirects'],
  rootDir: string
): Promise<RedirectTable> {
  if (redirects === undefined) {
    return createRedirectTable({});
  }
  if (typeof redirects === 'string') {
    return readRedirectTable(path.resolve(rootDir, redirects));
  }
  return isRedirectTable(redirects) ? redirects : createRedirectTable(redirects);
}

async function runHtmlTransforms(
  siteDir: string,
  transforms: readonly HtmlTransform[],
  logger: AstroIntegrationLogger
): Promise<void> {
  const files = await globby('**/*.html', { cwd: siteDir });
  let changed = 0;

  await Promise.all(
    files.map(async (file) => {
      const absolutePath = path.join(siteDir, file);
      const original = await readFile(absolutePath, 'utf8');
      let html = original;
      for (const transform of transforms) {
        html = await transform(html, file);
      }
      if (html !== original) {
        await writeFile(absolutePath, html, 'utf8');
        changed++;
      }
    })
  );

  logger.info(`Post-processed ${changed} of ${files.length} HTML pages`);
}

/**
 * Astro integration writing redirect stubs for retired pages and running
 * HTML post-processors once the site is built. Pages themselves go through
 * {@link docshiftLoader}.
 *
 * @example
 * ```js
 * // astro.config.mjs
 * import { defineConfig } from 'astro/config';
 * import docshift from 'astro-docshift';
 *
 * export default defineConfig({
 *   integrations: [
 *     docshift({
 *       redirects: 'docs/redirects.json',
 *     }),
 *   ],
 * });
 * ```
 */
export default function docshift(options: DocshiftOptions = {}): AstroIntegration {
  const {
    htmlTransforms = [],
    layout = directorySiteLayout,
    embedMarkdown = false,
    pages = loadedPages,
  } = options;
  let rootDir = process.cwd();
  let directoryUrls = true;

  return {
    name: 'astro-docshift',
    hooks: {
      'astro:config:done': ({ config }) => {
        rootDir = fileURLToPath(config.root);
        directoryUrls = config.build.format === 'directory';
      },
      'astro:build:done': async ({ dir, logger }) => {
        const siteDir = fileURLToPath(dir);

        const transforms = embedMarkdown
          ? [
              createMarkdownEmbedder(
                createPageLookup(pages, layout, {
                  directoryUrls,
                  routeBase: embedMarkdown === true ? '' : embedMarkdown.routeBase,
                })
              ),
              ...htmlTransforms,
            ]
          : htmlTransforms;
        if (transforms.length > 0) {
          await runHtmlTransforms(siteDir, transforms, logger);
        }

        const table = await loadRedirects(options.redirects, rootDir);
        if (table.entries.length === 0) {
          return;
        }
        const written = await generateRedirects(siteDir, table, layout, { directoryUrls });
        logger.info(`Wrote ${written.length} redirect pages`);
      },
    },
  };
}

export { docshiftLoader, type DocshiftLoaderOptions } from './loader.js';
export { directorySiteLayout } from './routes.js';
export {
  createPageRegistry,
  createPageLookup,
  loadedPages,
  type LoadedPage,
  type PageLookupOptions,
  type PageRegistry,
} from './pages.js';
