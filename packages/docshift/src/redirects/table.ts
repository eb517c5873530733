/**
 * Static redirect table
 * @module redirects/table
 */

import fs from 'node:fs/promises';
import { ConfigurationError } from '../errors.js';

/**
 * One retired page and where it lives now.
 */
export interface RedirectEntry {
  /** Retired page identifier, e.g. `how-tos/old.ipynb` */
  readonly oldPath: string;
  /** Replacement page, optionally with `#anchor` */
  readonly newTarget: string;
}

/**
 * Ordered, read-only redirect mapping shared by the whole build.
 */
export interface RedirectTable {
  readonly entries: readonly RedirectEntry[];
  get(oldPath: string): string | undefined;
}

/**
 * Builds the frozen redirect table. Entry order follows the key order of
 * `input`.
 *
 * @example
 * const table = createRedirectTable({
 *   'how-tos/stream-values.ipynb': 'how-tos/streaming.md#stream-graph-state',
 * });
 */
export function createRedirectTable(input: Readonly<Record<string, string>>): RedirectTable {
  const byOldPath = new Map(Object.entries(input));

  const entries = Object.freeze(
    [...byOldPath].map(([oldPath, newTarget]) => Object.freeze({ oldPath, newTarget }))
  );

  return Object.freeze({
    entries,
    get: (oldPath: string) => byOldPath.get(oldPath),
  });
}

/**
 * Reads a redirect table from a JSON object of `oldPath: newTarget` pairs.
 *
 * @throws {ConfigurationError} when the file is not such an object
 */
export async function readRedirectTable(filePath: string): Promise<RedirectTable> {
  const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`redirect table ${filePath} must be a JSON object`);
  }

  const record: Record<string, string> = {};
  for (const [oldPath, newTarget] of Object.entries(parsed)) {
    if (typeof newTarget !== 'string') {
      throw new ConfigurationError(
        `redirect target for '${oldPath}' in ${filePath} must be a string`
      );
    }
    record[oldPath] = newTarget;
  }
  return createRedirectTable(record);
}
