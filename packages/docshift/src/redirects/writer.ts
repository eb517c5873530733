/**
 * Redirect stub output
 * @module redirects/writer
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { debugLog, debugTime, debugTimeEnd } from '../utils/debug.js';
import { resolveRedirects, type RedirectPlan, type ResolveRedirectsOptions, type SiteLayout } from './resolver.js';
import { renderRedirectStub } from './stub.js';
import type { RedirectTable } from './table.js';

/**
 * Writes one stub per plan under `siteDir`, replacing whatever is there.
 * Writes run concurrently; the first failure rejects.
 *
 * @returns absolute paths of the written stubs, in plan order
 */
export async function writeRedirects(
  siteDir: string,
  plans: readonly RedirectPlan[]
): Promise<string[]> {
  return Promise.all(
    plans.map(async (plan) => {
      const file = path.join(siteDir, ...plan.outputPath.split('/'));
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, renderRedirectStub(plan.target), 'utf-8');
      debugLog(`redirect ${plan.oldPath} -> ${plan.target}`);
      return file;
    })
  );
}

/**
 * Resolves `table` and writes its stubs. Run once the site is built.
 */
export async function generateRedirects(
  siteDir: string,
  table: RedirectTable,
  layout: SiteLayout,
  options: ResolveRedirectsOptions
): Promise<string[]> {
  debugTime('redirects');
  try {
    return await writeRedirects(siteDir, resolveRedirects(table, layout, options));
  } finally {
    debugTimeEnd('redirects');
  }
}
