import { describe, expect, test } from 'vitest';

import {
  formatMarkdown,
  wrapMarkdown,
} from '../../../src/transform/markdown-format.js';

describe('markdown-format', () => {
  describe('formatMarkdown', () => {
    test('trims trailing spaces, keeps hard breaks and collapses blank runs', () => {
      expect(formatMarkdown('a  \nb   \nc \n\n\n\nd', 'none')).toBe(
        'a  \nb  \nc\n\nd\n'
      );
    });

    test('leaves fenced code as written', () => {
      const markdown = '```\nx   \n\n\n\ny\n```';

      expect(formatMarkdown(markdown, 'none')).toBe(`${markdown}\n`);
    });

    test('normalizes line endings and surrounding blank lines', () => {
      expect(formatMarkdown('\n\n# T\r\n\r\nbody\r\n\r\n', 'none')).toBe(
        '# T\n\nbody\n'
      );
    });

    test('returns an empty string for blank input', () => {
      expect(formatMarkdown('', 'none')).toBe('');
      expect(formatMarkdown('\n  \n', 'none')).toBe('');
    });

    test('wraps prose at the configured width', () => {
      expect(
        formatMarkdown(
          'alpha beta gamma delta epsilon zeta eta theta iota kappa',
          20
        )
      ).toBe('alpha beta gamma\ndelta epsilon zeta\neta theta iota kappa\n');
    });
  });

  describe('wrapMarkdown', () => {
    test('indents list continuations under the marker', () => {
      expect(wrapMarkdown('- alpha beta gamma delta epsilon', 20)).toBe(
        '- alpha beta gamma\n  delta epsilon'
      );
    });

    test('repeats the quote marker', () => {
      expect(wrapMarkdown('> one two three four five six', 15)).toBe(
        '> one two three\n> four five six'
      );
    });

    test('never starts a continuation line with a block marker', () => {
      expect(wrapMarkdown('aaaaaaaaaa bbbbbbbbb - ccc', 20)).toBe(
        'aaaaaaaaaa bbbbbbbbb -\nccc'
      );
    });

    test('leaves headings, tables and code alone', () => {
      const markdown = [
        '# a heading that is longer than the width',
        '| a table row | that is long |',
        '```',
        'code that is much longer than twenty characters',
        '```',
      ].join('\n');

      expect(wrapMarkdown(markdown, 20)).toBe(markdown);
    });

    test('keeps a hard break on the last wrapped line', () => {
      expect(wrapMarkdown('one two three four five  ', 10)).toBe(
        'one two\nthree four\nfive  '
      );
    });
  });
});
