/**
 * Frontmatter parsing for docs pages.
 * Uses gray-matter, the parser Astro's own markdown pipeline relies on.
 * @module frontmatter
 */

import matter from 'gray-matter';

export interface ParsedPage {
  /** Parsed frontmatter as an object */
  frontmatter: Record<string, unknown>;
  /** Content after frontmatter */
  content: string;
}

/**
 * Splits a page into frontmatter and content.
 * Invalid YAML throws; the caller reports the page.
 */
export function parseFrontmatter(source: string): ParsedPage {
  const result = matter(source);
  return {
    frontmatter: result.data,
    content: result.content,
  };
}
