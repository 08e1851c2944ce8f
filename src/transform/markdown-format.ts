import type { WrapWidth } from '../config/index.js';

const FENCE_PATTERN = /^\s{0,3}(`{3,}|~{3,})/;
const HARD_BREAK_PATTERN = /\S {2,}$/;

const HEADING_LINE = /^\s{0,3}#{1,6}(?:\s|$)/;
const TABLE_LINE = /^\s*\|/;
const REFERENCE_DEFINITION_LINE = /^\s{0,3}\[[^\]]+\]:\s/;
const HTML_LINE = /^\s*</;
const THEMATIC_BREAK_LINE = /^\s{0,3}([-*_])(?:\s*\1){2,}\s*$/;
const SETEXT_UNDERLINE_LINE = /^\s*(?:=+|-+)\s*$/;

const BLOCK_PREFIX = /^(\s*(?:>\s?)*)((?:[-*+]|\d{1,9}[.)])\s+)?/;
const BLOCK_START_WORD =
  /^(?:#{1,6}|[-+*]|=+|-+|[*_-]{3,}|\d{1,9}[.)])$|^(?:>|\||`{3,}|~{3,})/;

interface FenceState {
  marker: string | null;
}

function updateFence(line: string, state: FenceState): boolean {
  const match = FENCE_PATTERN.exec(line);
  if (!match?.[1]) return state.marker !== null;

  const marker = match[1];
  if (state.marker === null) {
    state.marker = marker;
    return true;
  }
  if (
    marker.charAt(0) === state.marker.charAt(0) &&
    marker.length >= state.marker.length
  ) {
    state.marker = null;
  }
  return true;
}

function isUnwrappable(line: string): boolean {
  return (
    HEADING_LINE.test(line) ||
    TABLE_LINE.test(line) ||
    REFERENCE_DEFINITION_LINE.test(line) ||
    HTML_LINE.test(line) ||
    THEMATIC_BREAK_LINE.test(line) ||
    SETEXT_UNDERLINE_LINE.test(line)
  );
}

function wrapLine(line: string, width: number): string[] {
  if (line.length <= width || isUnwrappable(line)) return [line];

  const prefixMatch = BLOCK_PREFIX.exec(line);
  const quote = prefixMatch?.[1] ?? '';
  const marker = prefixMatch?.[2] ?? '';
  const firstPrefix = quote + marker;
  const continuationPrefix = quote + ' '.repeat(marker.length);

  const hardBreak = HARD_BREAK_PATTERN.test(line);
  const words = line
    .slice(firstPrefix.length)
    .split(/ +/)
    .filter((word) => word.length > 0);
  if (words.length === 0) return [line];

  const lines: string[] = [];
  let current = firstPrefix;
  let hasWord = false;

  for (const word of words) {
    if (!hasWord) {
      current += word;
      hasWord = true;
      continue;
    }
    // A continuation line must not open a new block.
    if (
      current.length + 1 + word.length <= width ||
      BLOCK_START_WORD.test(word)
    ) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = continuationPrefix + word;
    }
  }
  lines.push(hardBreak ? `${current}  ` : current);
  return lines;
}

/**
 * Greedy word wrap of prose lines. Code blocks, tables, headings, reference
 * definitions and raw HTML are left untouched.
 */
export function wrapMarkdown(markdown: string, width: number): string {
  const fence: FenceState = { marker: null };
  const output: string[] = [];

  for (const line of markdown.split('\n')) {
    if (updateFence(line, fence)) {
      output.push(line);
      continue;
    }
    output.push(...wrapLine(line, width));
  }
  return output.join('\n');
}

function normalizeTrailingWhitespace(line: string): string {
  if (HARD_BREAK_PATTERN.test(line)) return `${line.trimEnd()}  `;
  return line.trimEnd();
}

/**
 * Whitespace normalization applied to rendered Markdown: trailing spaces
 * trimmed (hard breaks kept), blank-line runs collapsed outside code fences,
 * optional wrapping, exactly one trailing newline.
 */
export function formatMarkdown(markdown: string, wrapWidth: WrapWidth): string {
  const fence: FenceState = { marker: null };
  const lines: string[] = [];
  let previousBlank = false;

  for (const raw of markdown.replace(/\r\n?/g, '\n').split('\n')) {
    if (updateFence(raw, fence)) {
      lines.push(raw);
      previousBlank = false;
      continue;
    }
    const line = normalizeTrailingWhitespace(raw);
    const blank = line.length === 0;
    if (blank && previousBlank) continue;
    lines.push(line);
    previousBlank = blank;
  }

  let body = lines.join('\n');
  if (wrapWidth !== 'none') body = wrapMarkdown(body, wrapWidth);

  const trimmed = body.replace(/^\n+/, '').trimEnd();
  return trimmed ? `${trimmed}\n` : '';
}
