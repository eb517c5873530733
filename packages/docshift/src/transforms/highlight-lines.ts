/**
 * Highlight marker comments → `hl_lines` fence attribute
 * @module transforms/highlight-lines
 */

import { appendAttribute, replaceFences, renderFence, type CodeFence } from '../fences/matcher.js';

/**
 * Fence attribute listing the highlighted line numbers.
 */
export const HL_LINES_ATTRIBUTE = 'hl_lines';

const PYTHON_LANGUAGES = new Set(['py', 'python']);

/**
 * Marker comment that highlights the line after it.
 */
export function highlightMarkerFor(language: string): string {
  return PYTHON_LANGUAGES.has(language)
    ? '# highlight-next-line'
    : '// highlight-next-line';
}

/**
 * Rewrites one fence, turning its marker comments into `hl_lines`.
 *
 * A marker line is dropped and records the number of lines kept so far
 * plus one, so it points at the next line that survives. Leading blank
 * lines are dropped before counting. Fences that already declare
 * `hl_lines` come back untouched.
 */
export function transpileHighlightFence(fence: CodeFence): string {
  if (fence.attributes.includes(HL_LINES_ATTRIBUTE)) {
    return fence.raw;
  }

  const lines = fence.body.split('\n');
  while (lines.length > 0 && !(lines[0] ?? '').trim()) {
    lines.shift();
  }

  const marker = highlightMarkerFor(fence.language);
  const kept: string[] = [];
  const highlighted: number[] = [];
  for (const line of lines) {
    if (line.includes(marker)) {
      highlighted.push(kept.length + 1);
    } else {
      kept.push(line);
    }
  }

  const header =
    highlighted.length > 0
      ? appendAttribute(fence, `${HL_LINES_ATTRIBUTE}="${highlighted.join(' ')}"`)
      : fence.header;

  return renderFence({ indent: fence.indent, header, body: kept.join('\n') });
}

/**
 * Applies {@link transpileHighlightFence} to every fence in `markdown`.
 */
export function highlightCodeBlocks(markdown: string): string {
  return replaceFences(markdown, transpileHighlightFence);
}
