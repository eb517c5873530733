/**
 * Source path attribute for executable fences
 * @module transforms/exec-path
 */

import { appendAttribute, replaceFences, renderFence, type CodeFence } from '../fences/matcher.js';

const EXEC_MARKER = /(?:^|\s)exec="on"(?:\s|$)/;
const PATH_ATTRIBUTE = /(?:^|\s)path=/;

/**
 * Tags a fence marked `exec="on"` with the page it came from, so snippet
 * runners can find fixtures recorded for that page.
 */
export function annotateExecFence(fence: CodeFence, sourcePath: string): string {
  if (!EXEC_MARKER.test(fence.attributes) || PATH_ATTRIBUTE.test(fence.attributes)) {
    return fence.raw;
  }
  return renderFence({ ...fence, header: appendAttribute(fence, `path="${sourcePath}"`) });
}

export function addPathToExecBlocks(markdown: string, sourcePath: string): string {
  return replaceFences(markdown, (fence) => annotateExecFence(fence, sourcePath));
}
