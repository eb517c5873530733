import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Loader, LoaderContext } from 'astro/loaders';
import { globby } from 'globby';
import {
  getConfig,
  isNotebookPath,
  normalizePath,
  resolveMarkdownOutputDir,
  savePageOutput,
  toMarkdownPath,
  transformPage,
  ConfigurationError,
  MARKDOWN_EXTENSION,
  type PageIdentity,
  type ProcessPageOptions,
} from 'docshift';
import { parseFrontmatter, type ParsedPage } from './frontmatter.js';
import { loadedPages, type PageRegistry } from './pages.js';

export interface DocshiftLoaderOptions extends ProcessPageOptions {
  /** Directory (relative to project root) holding the docs pages. */
  base: string;
  /** Glob pattern(s) selecting the pages, relative to `base`. */
  pattern?: string | string[];
  /**
   * Receives each page's final markdown for the integration's
   * `embedMarkdown` step.
   * @default loadedPages
   */
  pages?: PageRegistry;
}

/**
 * Content loader running every page of `base` through the docshift page
 * pipeline before Astro renders it.
 *
 * Entry ids are page paths without extension (`how-tos/streaming`). A
 * notebook and a markdown page that would share an id fail the load.
 * Pages whose source and settings are unchanged since the last build keep
 * their stored entry; their markdown is still mirrored and registered.
 *
 * @example
 * ```ts
 * // src/content.config.ts
 * import { defineCollection } from 'astro:content';
 * import { docshiftLoader } from 'astro-docshift/loader';
 *
 * export const collections = {
 *   docs: defineCollection({
 *     loader: docshiftLoader({ base: 'docs', targetLanguage: 'js' }),
 *   }),
 * };
 * ```
 */
export function docshiftLoader({
  base,
  pattern = '**/*.{md,ipynb}',
  pages = loadedPages,
  ...pageOptions
}: DocshiftLoaderOptions): Loader {
  return {
    name: 'docshift-loader',
    load: async (context) => {
      const { store, logger, meta, config, collection } = context;
      const rootDir = fileURLToPath(config.root);
      const contentDir = path.resolve(rootDir, base);
      const digestMetaKey = createDigestMetaKey(collection);

      logger.info(`Loading docs from ${base}`);

      const files = (await globby(pattern, { cwd: contentDir })).map(normalizePath).sort();
      const ids = assignEntryIds(files, logger);
      const previousDigests = readDigestMeta(meta.get(digestMetaKey));
      const nextDigests = new Map<string, string>();
      const settings = pageSettings(pageOptions);
      const outputDir = resolveMarkdownOutputDir(pageOptions);

      await Promise.all(
        [...ids].map(async ([id, sourcePath]) => {
          const absolutePath = path.join(contentDir, ...sourcePath.split('/'));

          try {
            const source = await readFile(absolutePath, 'utf8');
            const digest = context.generateDigest({ source, ...settings });
            nextDigests.set(id, digest);

            const cached = previousDigests.get(id) === digest ? store.get(id) : undefined;
            const page =
              cached && typeof cached.body === 'string'
                ? { markdown: cached.body, frontmatter: cached.data }
                : await syncPage(context, {
                    id,
                    source,
                    digest,
                    page: { sourcePath, absoluteSourcePath: absolutePath },
                    filePath: normalizePath(path.relative(rootDir, absolutePath)),
                    pageOptions,
                  });

            const pagePath = toMarkdownPath(sourcePath);
            pages.set(id, { pagePath, markdown: page.markdown, title: titleOf(page.frontmatter) });
            if (outputDir) {
              await savePageOutput(page.markdown, outputDir, sourcePath);
            }
          } catch (error) {
            logger.error(`Failed to load ${sourcePath}: ${errorMessage(error)}`);
            throw error;
          }
        })
      );

      for (const id of store.keys()) {
        if (!nextDigests.has(id)) {
          store.delete(id);
          pages.delete(id);
        }
      }
      meta.set(digestMetaKey, JSON.stringify(Object.fromEntries(nextDigests)));
    },
  };
}

async function syncPage(
  { parseData, renderMarkdown, store }: LoaderContext,
  {
    id,
    source,
    digest,
    page,
    filePath,
    pageOptions,
  }: {
    id: string;
    source: string;
    digest: string;
    page: PageIdentity;
    filePath: string;
    pageOptions: ProcessPageOptions;
  }
): Promise<{ markdown: string; frontmatter: Record<string, unknown> }> {
  // Notebooks carry no frontmatter of their own; the converter supplies it.
  const notebook = isNotebookPath(page.sourcePath);
  const input: ParsedPage = notebook ? { frontmatter: {}, content: source } : parseFrontmatter(source);

  const markdown = await transformPage(input.content, page, pageOptions);
  const { frontmatter, content } = notebook ? parseFrontmatter(markdown) : { ...input, content: markdown };

  const data = await parseData({ id, data: frontmatter, filePath: page.absoluteSourcePath });
  store.set({
    id,
    data,
    body: content,
    filePath,
    digest,
    rendered: await renderMarkdown(content),
  });
  return { markdown: content, frontmatter: data };
}

/**
 * Pairs every entry id with its page.
 *
 * @throws {ConfigurationError} when two pages load as the same entry
 */
function assignEntryIds(
  files: readonly string[],
  logger: LoaderContext['logger']
): Map<string, string> {
  const ids = new Map<string, string>();
  for (const sourcePath of files) {
    const id = toEntryId(sourcePath);
    const other = ids.get(id);
    if (other !== undefined) {
      const error = new ConfigurationError(`${other} and ${sourcePath} both load as entry '${id}'`);
      logger.error(error.message);
      throw error;
    }
    ids.set(id, sourcePath);
  }
  return ids;
}

function titleOf(frontmatter: Record<string, unknown>): string | undefined {
  return typeof frontmatter.title === 'string' ? frontmatter.title : undefined;
}

/**
 * Settings that change a page's output for the same source.
 */
function pageSettings(options: ProcessPageOptions): Record<string, unknown> {
  const env = options.config ?? getConfig();
  return {
    disabled: env.disabled,
    targetLanguage: options.targetLanguage ?? env.targetLanguage,
    addApiReferences: options.addApiReferences ?? true,
    removeBase64Images: options.removeBase64Images ?? false,
  };
}

function toEntryId(sourcePath: string): string {
  const markdownPath = toMarkdownPath(sourcePath);
  return markdownPath.endsWith(MARKDOWN_EXTENSION)
    ? markdownPath.slice(0, -MARKDOWN_EXTENSION.length)
    : markdownPath;
}

function createDigestMetaKey(collection: string): string {
  return `docshift:${collection}:digests`;
}

function readDigestMeta(rawValue?: string): Map<string, string> {
  if (!rawValue) {
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawValue);
  } catch {
    // Written by an older build; every page is reloaded.
    return new Map();
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return new Map();
  }
  return new Map(
    Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
