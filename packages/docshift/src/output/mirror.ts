/**
 * Final markdown mirroring
 * @module output/mirror
 */

import fs from 'node:fs/promises';
import path from 'node:path';

/**
 * Writes a page's final markdown to `outputDir`, at the page's
 * source-relative path. Parent directories are created as needed.
 *
 * @returns the absolute path written
 */
export async function savePageOutput(
  markdown: string,
  outputDir: string,
  sourcePath: string
): Promise<string> {
  const file = path.join(outputDir, ...sourcePath.split('/'));
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, markdown, 'utf-8');
  return file;
}
