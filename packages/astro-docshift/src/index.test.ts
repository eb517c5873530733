import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createMarkdownEmbedder, createRedirectTable, embedPageMarkdown, renderRedirectStub } from 'docshift';
import docshift from './index.js';
import { docshiftLoader } from './loader.js';
import { createPageRegistry } from './pages.js';
import { createLoaderContext } from './testing/loader-context.js';

const PAGE = '<html><head><title>Guide</title></head><body></body></html>';

// Helper to run the integration hooks against a mocked Astro build
async function runBuild(
  integration: ReturnType<typeof docshift>,
  rootDir: string,
  format: 'directory' | 'file' = 'directory'
) {
  const configDone = integration.hooks['astro:config:done'];
  const buildDone = integration.hooks['astro:build:done'];
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

  await configDone?.({
    config: { root: pathToFileURL(`${rootDir}/`), build: { format } },
    logger,
  } as unknown as Parameters<NonNullable<typeof configDone>>[0]);
  await buildDone?.({
    dir: pathToFileURL(`${rootDir}/dist/`),
    logger,
  } as unknown as Parameters<NonNullable<typeof buildDone>>[0]);

  return logger;
}

describe('docshift integration', () => {
  let rootDir: string;
  let siteDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docshift-astro-'));
    siteDir = path.join(rootDir, 'dist');
    await fs.mkdir(path.join(siteDir, 'guide'), { recursive: true });
    await fs.writeFile(path.join(siteDir, 'index.html'), PAGE, 'utf-8');
    await fs.writeFile(path.join(siteDir, 'guide', 'index.html'), PAGE, 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  test('writes redirect stubs for directory-format sites', async () => {
    const logger = await runBuild(
      docshift({ redirects: { 'how-tos/old.ipynb': 'how-tos/new.md#part' } }),
      rootDir
    );

    const stub = await fs.readFile(path.join(siteDir, 'how-tos', 'old', 'index.html'), 'utf-8');
    expect(stub).toBe(renderRedirectStub('../new/#part'));
    expect(logger.info).toHaveBeenCalledWith('Wrote 1 redirect pages');
  });

  test('places stubs at file-format locations', async () => {
    await runBuild(
      docshift({ redirects: { 'how-tos/old.ipynb': 'how-tos/new.md#part' } }),
      rootDir,
      'file'
    );

    const stub = await fs.readFile(path.join(siteDir, 'how-tos', 'old.html'), 'utf-8');
    expect(stub).toBe(renderRedirectStub('new/#part'));
  });

  test('reads the redirect table from a JSON file under the project root', async () => {
    await fs.writeFile(path.join(rootDir, 'redirects.json'), '{"a.md": "b.md"}', 'utf-8');

    await runBuild(docshift({ redirects: 'redirects.json' }), rootDir);

    const stub = await fs.readFile(path.join(siteDir, 'a', 'index.html'), 'utf-8');
    expect(stub).toBe(renderRedirectStub('../b/'));
  });

  test('accepts a prebuilt redirect table', async () => {
    const table = createRedirectTable({ 'guide/old.md': 'guide/index.md' });

    await runBuild(docshift({ redirects: table }), rootDir);

    const stub = await fs.readFile(path.join(siteDir, 'guide', 'old', 'index.html'), 'utf-8');
    expect(stub).toBe(renderRedirectStub('../'));
  });

  test('runs html transforms on built pages before writing stubs', async () => {
    const seen: string[] = [];
    const logger = await runBuild(
      docshift({
        redirects: { 'old.md': 'guide.md' },
        htmlTransforms: [
          (html, file) => {
            seen.push(file);
            return html;
          },
          createMarkdownEmbedder((file) =>
            file === 'guide/index.html' ? { markdown: '# Guide' } : undefined
          ),
        ],
      }),
      rootDir
    );

    expect(seen.sort()).toEqual(['guide/index.html', 'index.html']);
    expect(await fs.readFile(path.join(siteDir, 'guide', 'index.html'), 'utf-8')).toBe(
      embedPageMarkdown(PAGE, { markdown: '# Guide' })
    );
    expect(await fs.readFile(path.join(siteDir, 'index.html'), 'utf-8')).toBe(PAGE);
    expect(logger.info).toHaveBeenCalledWith('Post-processed 1 of 2 HTML pages');
  });

  test('does nothing without redirects or transforms', async () => {
    const logger = await runBuild(docshift(), rootDir);

    expect(logger.info).not.toHaveBeenCalled();
    expect((await fs.readdir(siteDir)).sort()).toEqual(['guide', 'index.html']);
  });

  test('embeds the markdown of loaded pages in their built html', async () => {
    await fs.mkdir(path.join(rootDir, 'docs'), { recursive: true });
    await fs.writeFile(
      path.join(rootDir, 'docs', 'guide.md'),
      '---\ntitle: Guide\n---\n:::python\nHello\n:::\n',
      'utf-8'
    );
    const pages = createPageRegistry();
    const { context } = createLoaderContext(rootDir);
    await docshiftLoader({
      base: 'docs',
      pages,
      config: { disabled: false, targetLanguage: 'python', markdownOutputDir: null },
    }).load(context);

    await runBuild(docshift({ embedMarkdown: true, pages }), rootDir);

    const html = await fs.readFile(path.join(siteDir, 'guide', 'index.html'), 'utf-8');
    expect(html).toBe(embedPageMarkdown(PAGE, { markdown: 'Hello\n\n', title: 'Guide', url: '/guide/' }));
    expect(html).toContain(
      '<script id="page-markdown-content" type="application/json">' +
        '{"markdown":"Hello\\n\\n","title":"Guide","url":"/guide/"}</script></head>'
    );
    expect(await fs.readFile(path.join(siteDir, 'index.html'), 'utf-8')).toBe(PAGE);
  });
});
