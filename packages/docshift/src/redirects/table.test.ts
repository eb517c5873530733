import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { createRedirectTable, readRedirectTable } from './table.js';

describe('createRedirectTable', () => {
  it('should keep entries in insertion order', () => {
    const table = createRedirectTable({
      'how-tos/old.ipynb': 'how-tos/new.md#part',
      'concepts/gone.md': 'concepts/index.md',
    });

    expect(table.entries).toEqual([
      { oldPath: 'how-tos/old.ipynb', newTarget: 'how-tos/new.md#part' },
      { oldPath: 'concepts/gone.md', newTarget: 'concepts/index.md' },
    ]);
    expect(table.get('concepts/gone.md')).toBe('concepts/index.md');
    expect(table.get('missing.md')).toBeUndefined();
  });

  it('should be read-only', () => {
    const table = createRedirectTable({ 'a.md': 'b.md' });

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.entries)).toBe(true);
    expect(Object.isFrozen(table.entries[0])).toBe(true);
  });

  it('should not follow later changes to the input', () => {
    const input: Record<string, string> = { 'a.md': 'b.md' };
    const table = createRedirectTable(input);
    input['c.md'] = 'd.md';

    expect(table.entries).toHaveLength(1);
    expect(table.get('c.md')).toBeUndefined();
  });
});

describe('readRedirectTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docshift-table-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeTable(contents: string): Promise<string> {
    const file = path.join(dir, 'redirects.json');
    await fs.writeFile(file, contents, 'utf-8');
    return file;
  }

  it('should read a JSON object of redirects', async () => {
    const file = await writeTable('{"a.md": "b.md#x", "c.ipynb": "d.md"}');

    const table = await readRedirectTable(file);

    expect(table.entries).toEqual([
      { oldPath: 'a.md', newTarget: 'b.md#x' },
      { oldPath: 'c.ipynb', newTarget: 'd.md' },
    ]);
  });

  it('should reject a JSON array', async () => {
    const file = await writeTable('["a.md"]');

    await expect(readRedirectTable(file)).rejects.toThrow(
      `redirect table ${file} must be a JSON object`
    );
  });

  it('should reject non-string targets', async () => {
    const file = await writeTable('{"a.md": 1}');

    const run = readRedirectTable(file);

    await expect(run).rejects.toBeInstanceOf(ConfigurationError);
    await expect(readRedirectTable(file)).rejects.toThrow(
      `redirect target for 'a.md' in ${file} must be a string`
    );
  });

  it('should surface JSON syntax errors', async () => {
    const file = await writeTable('{');

    await expect(readRedirectTable(file)).rejects.toBeInstanceOf(SyntaxError);
  });
});
