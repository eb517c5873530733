/**
 * Language-conditional `:::python` / `:::js` blocks
 * @module transforms/conditional-blocks
 */

import { isTargetLanguage, resolveTargetLanguage } from '../config.js';

/**
 * A `:::<language>` ... `:::` region located in a page.
 */
export interface ConditionalBlock {
  indent: string;
  language: string;
  /** Text between the delimiter lines */
  content: string;
  /** The matched text, delimiters included */
  raw: string;
}

/**
 * Opener at line start, content captured lazily, closer at the opener's
 * indentation. The closer may carry extra whitespace around `:::`, and
 * nothing else on its line.
 */
const CONDITIONAL_PATTERN =
  /^(?<indent>[ \t]*):::(?<language>\w+)\s*\n(?<content>(?:[^\n]*\n)*?)\k<indent>[ \t]*:::[ \t]*$/gm;

/**
 * Resolves one conditional block against the target language.
 */
function renderBlock(block: ConditionalBlock, target: string): string {
  if (!isTargetLanguage(block.language)) {
    return block.raw;
  }
  return block.language === target ? block.content : '';
}

/**
 * Keeps the content of blocks written for `targetLanguage` and drops the
 * blocks written for the other one. Blocks tagged with anything else (for
 * example `:::note`) are left exactly as written.
 *
 * @throws {ConfigurationError} when `targetLanguage` is not `python` or `js`
 *
 * @example
 * renderConditionalBlocks(':::python\nA\n:::\n:::js\nB\n:::\n', 'python')
 * // => 'A\n\n\n'
 */
export function renderConditionalBlocks(markdown: string, targetLanguage: string): string {
  const target = resolveTargetLanguage(targetLanguage);
  if (!markdown.includes(':::')) {
    return markdown;
  }

  return markdown.replace(
    CONDITIONAL_PATTERN,
    (raw: string, indent: string, language: string, content: string) =>
      renderBlock({ indent, language, content, raw }, target)
  );
}
