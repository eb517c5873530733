/**
 * Inline image payload removal
 * @module transforms/base64-images
 */

const BASE64_IMAGE_PATTERN = /!\[.*?\]\(data:image\/[^;]+;base64,[^)]+\)/g;

/**
 * Removes markdown images whose source is an inline base64 data URI.
 * Notebook outputs embed plots this way, which bloats mirrored markdown.
 */
export function stripBase64Images(markdown: string): string {
  if (!markdown.includes(';base64,')) {
    return markdown;
  }
  return markdown.replace(BASE64_IMAGE_PATTERN, '');
}
