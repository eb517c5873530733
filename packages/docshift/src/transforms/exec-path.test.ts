import { describe, test, expect } from 'vitest';
import { addPathToExecBlocks } from './exec-path.js';

describe('addPathToExecBlocks', () => {
  test('appends the page path to executable fences', () => {
    const source = '```python exec="on"\nprint(1)\n```';
    expect(addPathToExecBlocks(source, 'how-tos/a.md')).toBe(
      '```python exec="on" path="how-tos/a.md"\nprint(1)\n```'
    );
  });

  test('leaves other fences unchanged', () => {
    const source = '```python\nprint(1)\n```\n```python noexec="on"\nprint(2)\n```';
    expect(addPathToExecBlocks(source, 'a.md')).toBe(source);
  });

  test('adds the path once', () => {
    const once = addPathToExecBlocks('```python exec="on"\nx\n```', 'a.md');
    expect(addPathToExecBlocks(once, 'a.md')).toBe(once);
  });

  test('keeps indentation and places the path last', () => {
    const source = '    ```py exec="on" source="above"\n    x\n    ```';
    expect(addPathToExecBlocks(source, 'p.md')).toBe(
      '    ```py exec="on" source="above" path="p.md"\n    x\n    ```'
    );
  });
});
