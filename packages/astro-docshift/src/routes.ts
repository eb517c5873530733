/**
 * Page files and URLs of a built Astro docs site
 * @module routes
 */

import path from 'node:path';
import { MARKDOWN_EXTENSION, type SiteLayout } from 'docshift';

/**
 * Pages rendered as their folder's index.
 */
const INDEX_PAGES = new Set(['index.md', 'README.md']);

interface PageParts {
  /** Folder with trailing slash, empty at the root */
  folder: string;
  /** File name without `.md` */
  stem: string;
  isIndex: boolean;
}

function splitPage(pagePath: string): PageParts {
  const dir = path.posix.dirname(pagePath);
  const name = path.posix.basename(pagePath);
  return {
    folder: dir === '.' ? '' : `${dir}/`,
    stem: name.slice(0, -MARKDOWN_EXTENSION.length),
    isIndex: INDEX_PAGES.has(name),
  };
}

function pageOutputPath(pagePath: string, directoryUrls: boolean): string {
  if (!pagePath.endsWith(MARKDOWN_EXTENSION)) {
    return pagePath;
  }
  const { folder, stem, isIndex } = splitPage(pagePath);
  if (isIndex) {
    return `${folder}index.html`;
  }
  return directoryUrls ? `${folder}${stem}/index.html` : `${folder}${stem}.html`;
}

function pageUrl(pagePath: string, directoryUrls: boolean): string {
  if (!pagePath.endsWith(MARKDOWN_EXTENSION)) {
    return encodeURI(pagePath);
  }
  if (!directoryUrls) {
    return encodeURI(pageOutputPath(pagePath, false));
  }
  const { folder, stem, isIndex } = splitPage(pagePath);
  const url = isIndex ? folder : `${folder}${stem}/`;
  return url ? encodeURI(url) : './';
}

/**
 * Layout of `build.format: 'directory'` and `'file'` sites.
 *
 * | page | directory | file |
 * |---|---|---|
 * | `a/b.md` | `a/b/index.html`, `a/b/` | `a/b.html` |
 * | `a/index.md` | `a/index.html`, `a/` | `a/index.html` |
 */
export const directorySiteLayout: SiteLayout = {
  outputPath: pageOutputPath,
  url: pageUrl,
};
