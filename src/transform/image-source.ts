export type AttributeReader = (name: string) => string | null | undefined;

export const LAZY_SRC_ATTRIBUTES = [
  'data-src',
  'data-lazy-src',
  'data-original',
  'data-srcset',
] as const;

export function isDataUri(value: string): boolean {
  return /^data:/i.test(value.trim());
}

export function extractFirstSrcsetUrl(srcset: string): string {
  const first = srcset.split(',')[0];
  if (!first) return '';
  return first.trim().split(/\s+/)[0] ?? '';
}

function extractNonDataSrcsetUrl(value: string): string | undefined {
  const url = extractFirstSrcsetUrl(value);
  return url && !isDataUri(url) ? url : undefined;
}

function resolveLazySrc(getAttribute: AttributeReader): string | undefined {
  for (const attr of LAZY_SRC_ATTRIBUTES) {
    const lazy = getAttribute(attr)?.trim();
    if (!lazy || isDataUri(lazy)) continue;

    if (attr === 'data-srcset') {
      const url = extractNonDataSrcsetUrl(lazy);
      if (url) return url;
      continue;
    }

    return lazy;
  }
  return undefined;
}

/**
 * Picks the usable source of an image: `src`, then lazy-loading attributes,
 * then the first `srcset` candidate. A data URI is returned only when no
 * other source exists.
 */
export function resolveImageSource(getAttribute: AttributeReader): string {
  const srcRaw = getAttribute('src')?.trim() ?? '';
  if (srcRaw && !isDataUri(srcRaw)) return srcRaw;

  // placeholders are often data URIs with the real file in a lazy attribute
  const lazySrc = resolveLazySrc(getAttribute);
  if (lazySrc) return lazySrc;

  const srcset = getAttribute('srcset');
  if (srcset) {
    const url = extractNonDataSrcsetUrl(srcset);
    if (url) return url;
  }

  return srcRaw;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * `images/hero_banner-2x.png?v=3` → `hero banner 2x`.
 */
export function deriveAltFromImageUrl(src: string): string {
  if (!src || isDataUri(src)) return '';

  const pathPart = src.split(/[?#]/)[0] ?? '';
  const filename = decodeSegment(pathPart.split(/[\\/]/).pop() ?? '');
  if (!filename) return '';

  const dotIndex = filename.lastIndexOf('.');
  const name = dotIndex > 0 ? filename.slice(0, dotIndex) : filename;

  return name.replace(/[_-]+/g, ' ').trim();
}
