/**
 * Embeds a page's markdown source in its rendered HTML
 * @module html/embed-markdown
 */

import { ConfigurationError } from '../errors.js';

/**
 * Post-processing step applied to a built HTML file.
 * `file` is the path of the page relative to the site root.
 */
export type HtmlTransform = (html: string, file: string) => string | Promise<string>;

/**
 * Markdown and metadata of a rendered page.
 */
export interface PageMarkdown {
  markdown: string;
  title?: string;
  url?: string;
}

export const PAGE_MARKDOWN_SCRIPT_ID = 'page-markdown-content';

/**
 * Serializes the payload so it cannot close the surrounding script tag.
 */
function toScriptJson(page: PageMarkdown): string {
  return JSON.stringify({
    markdown: page.markdown,
    title: page.title || 'Page Content',
    url: page.url || '',
  })
    .replace(/<\//g, '\\u003c/')
    .replace(/<script/g, '\\u003cscript');
}

/**
 * Inserts the page markdown as a JSON script right before `</head>`.
 * Pages without markdown are returned unchanged.
 *
 * @throws {ConfigurationError} when the document has no `</head>`
 */
export function embedPageMarkdown(html: string, page: PageMarkdown): string {
  if (!page.markdown) {
    return html;
  }
  if (!html.includes('</head>')) {
    throw new ConfigurationError(
      'HTML does not contain </head> tag. Cannot inject markdown content.'
    );
  }
  const script =
    `<script id="${PAGE_MARKDOWN_SCRIPT_ID}" type="application/json">` +
    `${toScriptJson(page)}</script>`;
  return html.replace('</head>', () => `${script}</head>`);
}

/**
 * Wraps {@link embedPageMarkdown} as an HTML post-processor. `lookup`
 * returns the markdown of the page built at `file`, if any.
 */
export function createMarkdownEmbedder(
  lookup: (file: string) => PageMarkdown | undefined | Promise<PageMarkdown | undefined>
): HtmlTransform {
  return async (html, file) => {
    const page = await lookup(file);
    return page ? embedPageMarkdown(html, page) : html;
  };
}
