import { describe, expect, test } from 'vitest';

import {
  deriveAltFromImageUrl,
  extractFirstSrcsetUrl,
  isDataUri,
  resolveImageSource,
} from '../../../src/transform/image-source.js';

function reader(attributes: Record<string, string>) {
  return (name: string): string | undefined => attributes[name];
}

describe('image-source', () => {
  describe('resolveImageSource', () => {
    test('prefers a real src', () => {
      expect(
        resolveImageSource(reader({ src: ' a.png ', 'data-src': 'b.png' }))
      ).toBe('a.png');
    });

    test('looks past a data URI placeholder', () => {
      expect(
        resolveImageSource(
          reader({ src: 'data:image/gif;base64,R0', 'data-lazy-src': 'b.png' })
        )
      ).toBe('b.png');
    });

    test('reads the first candidate of data-srcset and srcset', () => {
      expect(
        resolveImageSource(reader({ 'data-srcset': 'c.png 1x, d.png 2x' }))
      ).toBe('c.png');
      expect(resolveImageSource(reader({ srcset: 'e.png 480w' }))).toBe(
        'e.png'
      );
    });

    test('falls back to the data URI when nothing else exists', () => {
      expect(
        resolveImageSource(reader({ src: 'data:image/png;base64,AAAA' }))
      ).toBe('data:image/png;base64,AAAA');
    });

    test('returns an empty string without any source', () => {
      expect(resolveImageSource(reader({}))).toBe('');
    });
  });

  test('isDataUri ignores case and surrounding space', () => {
    expect(isDataUri('  DATA:image/png;base64,AA')).toBe(true);
    expect(isDataUri('images/data.png')).toBe(false);
  });

  test('extractFirstSrcsetUrl', () => {
    expect(extractFirstSrcsetUrl('  small.png 320w, large.png 1024w')).toBe(
      'small.png'
    );
    expect(extractFirstSrcsetUrl('')).toBe('');
  });

  describe('deriveAltFromImageUrl', () => {
    test.each([
      ['images/hero_banner-2x.png?v=3', 'hero banner 2x'],
      ['page_files\\My%20Photo.jpg', 'My Photo'],
      ['.hidden', '.hidden'],
      ['folder/', ''],
      ['data:image/png;base64,AA', ''],
    ])('%s → %s', (src, expected) => {
      expect(deriveAltFromImageUrl(src)).toBe(expected);
    });
  });
});
