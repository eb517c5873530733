/**
 * Debug timing helpers, enabled with `DOCSHIFT_DEBUG=1`.
 * @module utils/debug
 */

function isDebugEnabled(): boolean {
  return process.env.DOCSHIFT_DEBUG === '1';
}

export function debugTime(label: string): void {
  if (isDebugEnabled()) console.time(`[docshift:timing] ${label}`);
}

export function debugTimeEnd(label: string): void {
  if (isDebugEnabled()) console.timeEnd(`[docshift:timing] ${label}`);
}

export function debugLog(message: string): void {
  if (isDebugEnabled()) console.log(`[docshift] ${message}`);
}
