/**
 * Redirect stub document
 * @module redirects/stub
 */

import { splitAnchor } from '../utils/paths.js';

/**
 * Escapes a value for use in an HTML attribute.
 */
function escapeAttributeValue(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}

/**
 * Renders the HTML left at a retired page's location.
 *
 * The script redirects at once and carries over the fragment of the
 * requested URL; without one it falls back to the target's own anchor.
 * The canonical link and the zero-delay refresh cover crawlers and
 * visitors without scripts.
 */
export function renderRedirectStub(target: string): string {
  const { path: targetPath, anchor } = splitAnchor(target);
  const href = escapeAttributeValue(target);
  const script =
    'var anchor=window.location.hash.substring(1);' +
    `location.href=${JSON.stringify(targetPath)}+(anchor?"#"+anchor:${JSON.stringify(anchor)})`;

  return `<!doctype html>
<html lang="en">
<head>
    <meta charset="utf-8">
    <title>Redirecting...</title>
    <link rel="canonical" href="${href}">
    <meta name="robots" content="noindex">
    <script>${script}</script>
    <meta http-equiv="refresh" content="0; url=${href}">
</head>
<body>
Redirecting...
</body>
</html>
`;
}
