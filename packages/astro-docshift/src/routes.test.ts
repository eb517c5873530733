import { describe, expect, test } from 'vitest';
import { resolveRedirect } from 'docshift';
import { directorySiteLayout } from './routes.js';

const { outputPath, url } = directorySiteLayout;

describe('directorySiteLayout', () => {
  test('renders pages to their own folder with directory URLs', () => {
    expect(outputPath('how-tos/streaming.md', true)).toBe('how-tos/streaming/index.html');
    expect(url('how-tos/streaming.md', true)).toBe('how-tos/streaming/');
  });

  test('renders pages to html files with file URLs', () => {
    expect(outputPath('how-tos/streaming.md', false)).toBe('how-tos/streaming.html');
    expect(url('how-tos/streaming.md', false)).toBe('how-tos/streaming.html');
  });

  test('renders index pages to their folder index', () => {
    expect(outputPath('concepts/index.md', true)).toBe('concepts/index.html');
    expect(url('concepts/index.md', true)).toBe('concepts/');
    expect(outputPath('README.md', true)).toBe('index.html');
    expect(url('README.md', true)).toBe('./');
    expect(url('index.md', false)).toBe('index.html');
  });

  test('maps other files to themselves', () => {
    expect(outputPath('img/logo.png', true)).toBe('img/logo.png');
    expect(url('img/logo.png', false)).toBe('img/logo.png');
  });

  test('encodes URLs', () => {
    expect(url('my docs/é.md', true)).toBe('my%20docs/%C3%A9/');
    expect(outputPath('my docs/é.md', true)).toBe('my docs/é/index.html');
  });

  test('resolves redirects to a folder index', () => {
    const plan = resolveRedirect(
      { oldPath: 'cloud/index.md', newTarget: 'index.md#deploy' },
      directorySiteLayout,
      { directoryUrls: true }
    );

    expect(plan).toEqual({
      oldPath: 'cloud/index.md',
      outputPath: 'cloud/index.html',
      target: '../#deploy',
    });
  });
});
