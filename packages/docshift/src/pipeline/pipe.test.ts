import { describe, it, expect } from 'vitest';
import { pipe, when, tap } from './pipe.js';

const upper = (text: string): string => text.toUpperCase();
const exclaim = async (text: string): Promise<string> => `${text}!`;

describe('pipe', () => {
  it('should run steps in order', async () => {
    const run = pipe(upper, exclaim, (text: string) => `<${text}>`);
    expect(await run('page')).toBe('<PAGE!>');
  });

  it('should pass data through an empty pipeline', async () => {
    expect(await pipe<string>()('page')).toBe('page');
  });

  it('should stop at the first rejected step', async () => {
    const calls: string[] = [];
    const failure = new Error('collaborator failed');
    const run = pipe<string>(
      (text) => {
        calls.push('first');
        return text;
      },
      async () => {
        throw failure;
      },
      (text) => {
        calls.push('third');
        return text;
      }
    );

    await expect(run('page')).rejects.toBe(failure);
    expect(calls).toEqual(['first']);
  });
});

describe('when', () => {
  it('should run the step when the condition is true', async () => {
    expect(await when(true, upper)('page')).toBe('PAGE');
  });

  it('should skip the step when the condition is false', async () => {
    expect(await when(false, upper)('page')).toBe('page');
  });

  it('should evaluate a condition function against the data', async () => {
    const step = when((text: string) => text.startsWith('#'), exclaim);
    expect(await step('# title')).toBe('# title!');
    expect(await step('body')).toBe('body');
  });
});

describe('tap', () => {
  it('should run the side effect and keep the data', async () => {
    const seen: string[] = [];
    const run = pipe(
      upper,
      tap((text: string) => {
        seen.push(text);
      }),
      exclaim
    );

    expect(await run('page')).toBe('PAGE!');
    expect(seen).toEqual(['PAGE']);
  });
});
