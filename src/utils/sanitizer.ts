export function sanitizeText(text: string | null | undefined): string {
  if (text == null) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turns a file stem such as `my_saved-page` into `my saved page`.
 */
export function humanizeFileStem(stem: string): string {
  return sanitizeText(stem.replace(/[_-]+/g, ' '));
}

export function uniqueStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const normalized = sanitizeText(value);
    if (!normalized) continue;
    const key = normalized.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(normalized);
  }
  return result;
}
