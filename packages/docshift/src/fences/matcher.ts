/**
 * Indentation-aware fenced code block matching
 * @module fences/matcher
 */

/**
 * A fenced code block located in a page.
 */
export interface CodeFence {
  /** Leading whitespace shared by the opening and closing lines */
  indent: string;
  /** Language token following the opening backticks */
  language: string;
  /** Free-form text after the language, trailing whitespace removed */
  attributes: string;
  /** Opener text after the backticks as written, trailing whitespace removed */
  header: string;
  /** Lines between the delimiters, each ending in `\n` */
  body: string;
  /** The matched text, from the indent of the opener to the closing backticks */
  raw: string;
  /** Offset of `raw` in the scanned text */
  start: number;
  /** Offset just past `raw` */
  end: number;
}

/**
 * Opener at line start, body captured lazily, closer with the exact same
 * indentation and nothing but whitespace after it. Lines are matched with
 * `[^\n]*` so a stray `\r` stays part of the line it belongs to.
 */
const FENCE_PATTERN =
  /^(?<indent>[ \t]*)```(?<header>(?<language>\w+)[ ]*(?<attributes>[^\n]*))\n(?<body>(?:[^\n]*\n)*?)\k<indent>```(?=[ \t]*$)/gm;

/**
 * Quick check for fence markers to short-circuit regex passes.
 */
export function hasFenceMarkers(text: string): boolean {
  return text.includes('```');
}

/**
 * Yields fenced code blocks in document order.
 *
 * Each call starts a fresh scan, so the sequence can be restarted by
 * calling again. Matches never overlap. An opener without a closer at the
 * same indentation yields nothing and its text is left alone.
 */
export function* matchFences(text: string): Generator<CodeFence> {
  if (!text || !hasFenceMarkers(text)) {
    return;
  }

  for (const match of text.matchAll(FENCE_PATTERN)) {
    const groups = match.groups ?? {};
    const raw = match[0];
    const start = match.index ?? 0;
    yield {
      indent: groups.indent ?? '',
      language: groups.language ?? '',
      attributes: (groups.attributes ?? '').trimEnd(),
      header: (groups.header ?? '').trimEnd(),
      body: groups.body ?? '',
      raw,
      start,
      end: start + raw.length,
    };
  }
}

/**
 * Rebuilds `text` with every matched fence replaced by `replacer`'s output.
 * Text outside matched fences is copied byte-for-byte.
 */
export function replaceFences(
  text: string,
  replacer: (fence: CodeFence) => string
): string {
  let result = '';
  let cursor = 0;
  for (const fence of matchFences(text)) {
    result += text.slice(cursor, fence.start) + replacer(fence);
    cursor = fence.end;
  }
  if (cursor === 0) {
    return text;
  }
  return result + text.slice(cursor);
}

/**
 * Opener header of `fence` with `attribute` added at the end.
 * The header is otherwise kept as written.
 */
export function appendAttribute(fence: Pick<CodeFence, 'header'>, attribute: string): string {
  return `${fence.header} ${attribute}`;
}

/**
 * Serializes a fence back to markdown.
 *
 * @example
 * renderFence({ indent: '  ', header: 'py title="a.py"', body: 'x = 1\n' })
 * // => '  ```py title="a.py"\nx = 1\n  ```'
 */
export function renderFence(fence: Pick<CodeFence, 'indent' | 'header' | 'body'>): string {
  return `${fence.indent}\`\`\`${fence.header}\n${fence.body}${fence.indent}\`\`\``;
}
