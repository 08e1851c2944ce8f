import type { Config } from '../config/index.js';
import type { Diagnostics } from '../services/diagnostics.js';
import { logDebug, logWarn } from '../services/logger.js';
import {
  getDocumentRoot,
  parseHtmlDocument,
  wrapHtmlFragment,
} from '../services/parser.js';
import { sanitizeText } from '../utils/sanitizer.js';
import { resolveImageSource } from './image-source.js';
import { resolveLanguageFromAttributes } from './language-detection.js';

/**
 * Detached copy of the selected content, ready for rendering.
 */
export interface CleanedTree {
  readonly document: Document;
  readonly root: Element;
}

const ALWAYS_REMOVED_SELECTOR = [
  'script',
  'style',
  'noscript',
  'template',
  'embed',
  'object',
  'iframe',
  'link',
  'meta',
  'svg',
  'canvas',
  'head',
  'title',
].join(', ');

const PRESERVED_EMPTY_TAGS = new Set([
  'img',
  'picture',
  'source',
  'video',
  'audio',
  'br',
  'hr',
  'table',
  'thead',
  'tbody',
  'tfoot',
  'tr',
  'td',
  'th',
  'col',
  'colgroup',
]);
const MEDIA_SELECTOR = 'img, picture, video, audio, br, hr';

const INLINE_TAGS = new Set([
  'a',
  'abbr',
  'b',
  'cite',
  'code',
  'del',
  'em',
  'font',
  'i',
  'ins',
  'kbd',
  'mark',
  'q',
  's',
  'small',
  'span',
  'strong',
  'sub',
  'sup',
  'u',
]);
const HIDDEN_CANDIDATE_SELECTOR = '[hidden], [aria-hidden], [style]';
const HEADING_ANCHOR_SELECTOR = [1, 2, 3, 4, 5, 6]
  .map((level) => `h${level} a[href^="#"]`)
  .join(', ');
const HEADING_ANCHOR_TEXT = new Set(['', '#', '¶', '§', '🔗']);

function escapeRegexLiteral(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches configured tokens inside class and id values at token
 * boundaries: `ad` matches `top-ad` and `ad_slot`, not `header` or `add`.
 */
export class TokenMatcher {
  private readonly regex: RegExp | null;

  constructor(tokens: readonly string[]) {
    const escaped = tokens
      .map((token) => token.toLowerCase().trim())
      .filter((token) => token.length > 0)
      .map(escapeRegexLiteral);
    this.regex =
      escaped.length === 0
        ? null
        : new RegExp(
            `(?:^|[^a-z0-9])(?:${escaped.join('|')})(?:$|[^a-z0-9])`,
            'i'
          );
  }

  matches(element: Element): boolean {
    if (!this.regex) return false;
    const className = element.getAttribute('class') ?? '';
    const id = element.getAttribute('id') ?? '';
    return this.regex.test(className) || this.regex.test(id);
  }
}

export function isHidden(element: Element): boolean {
  const style = element.getAttribute('style') ?? '';
  return (
    element.getAttribute('hidden') !== null ||
    element.getAttribute('aria-hidden') === 'true' ||
    /\bdisplay\s*:\s*none\b/i.test(style) ||
    /\bvisibility\s*:\s*hidden\b/i.test(style)
  );
}

function safeQuerySelectorAll(
  root: Element,
  selector: string
): Element[] | null {
  try {
    return Array.from(root.querySelectorAll(selector));
  } catch {
    return null;
  }
}

function isWithin(element: Element, root: Element): boolean {
  let current: Element | null = element;
  while (current) {
    if (current === root) return true;
    current = current.parentElement;
  }
  return false;
}

function isInsideCode(element: Element, root: Element): boolean {
  const block = element.parentElement?.closest('pre, code');
  return block !== null && block !== undefined && isWithin(block, root);
}

function removeAll(elements: Iterable<Element>): number {
  let removed = 0;
  for (const element of elements) {
    element.remove();
    removed += 1;
  }
  return removed;
}

// ---------------------------------------------------------------------------
// Copy
// ---------------------------------------------------------------------------

function copySubtree(content: Element): CleanedTree {
  const tagName = content.tagName.toUpperCase();
  const isContainer = tagName === 'BODY' || tagName === 'HTML';
  const html = isContainer ? content.innerHTML : content.outerHTML;

  const document = parseHtmlDocument(wrapHtmlFragment(html));
  const body = getDocumentRoot(document);
  const root = isContainer ? body : (body.firstElementChild ?? body);
  return { document, root };
}

// ---------------------------------------------------------------------------
// Removal
// ---------------------------------------------------------------------------

class NoiseStripper {
  private readonly tokens: TokenMatcher;

  constructor(
    private readonly config: Config,
    private readonly source: string | undefined
  ) {
    this.tokens = new TokenMatcher(config.removeTokens);
  }

  strip(root: Element): void {
    const always = removeAll(root.querySelectorAll(ALWAYS_REMOVED_SELECTOR));
    const selectors = this.removeConfiguredSelectors(root);
    const tokens = removeAll(
      Array.from(root.querySelectorAll('[class], [id]')).filter(
        (element) =>
          !isInsideCode(element, root) && this.tokens.matches(element)
      )
    );
    const hidden = this.config.stripHidden
      ? removeAll(
          Array.from(root.querySelectorAll(HIDDEN_CANDIDATE_SELECTOR)).filter(
            isHidden
          )
        )
      : 0;
    const empty = removeEmptyElements(root);

    logDebug('Stripped non-content elements', {
      always,
      selectors,
      tokens,
      hidden,
      empty,
    });
  }

  private removeConfiguredSelectors(root: Element): number {
    const selectors = this.config.removeSelectors;
    if (selectors.length === 0) return 0;

    // one invalid selector must not disable the others
    const combined = safeQuerySelectorAll(root, selectors.join(', '));
    if (combined) return removeAll(combined);

    let removed = 0;
    for (const selector of selectors) {
      const nodes = safeQuerySelectorAll(root, selector);
      if (nodes) {
        removed += removeAll(nodes);
      } else {
        logWarn('Skipping invalid removal selector', {
          selector,
          ...(this.source ? { source: this.source } : {}),
        });
      }
    }
    return removed;
  }
}

function isEmptyElement(element: Element): boolean {
  if (PRESERVED_EMPTY_TAGS.has(element.tagName.toLowerCase())) return false;
  if (sanitizeText(element.textContent).length > 0) return false;
  return element.querySelector(MEDIA_SELECTOR) === null;
}

// Whitespace-only inline elements may be the only gap between two words.
function removeEmpty(element: Element): void {
  const text = element.textContent ?? '';
  if (INLINE_TAGS.has(element.tagName.toLowerCase()) && /\s/.test(text)) {
    element.replaceWith(element.ownerDocument.createTextNode(' '));
  } else {
    element.remove();
  }
}

/**
 * Removes empty elements until a pass removes nothing. Returns the total.
 * Whitespace-only inline elements become a single space.
 */
export function removeEmptyElements(root: Element): number {
  let total = 0;
  for (;;) {
    let removed = 0;
    for (const element of Array.from(root.querySelectorAll('*'))) {
      if (!isWithin(element, root) || !isEmptyElement(element)) continue;
      removeEmpty(element);
      removed += 1;
    }
    if (removed === 0) return total;
    total += removed;
  }
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function normalizeImages(root: Element): void {
  for (const image of Array.from(root.querySelectorAll('img'))) {
    const src = resolveImageSource((name) => image.getAttribute(name));
    if (src) {
      image.setAttribute('src', src);
    } else {
      image.remove();
    }
  }
}

function removeHeadingAnchors(root: Element): void {
  for (const anchor of Array.from(
    root.querySelectorAll(HEADING_ANCHOR_SELECTOR)
  )) {
    const text = sanitizeText(anchor.textContent);
    if (HEADING_ANCHOR_TEXT.has(text) && !anchor.querySelector('img')) {
      anchor.remove();
    }
  }
}

function languageHint(element: Element | null | undefined): string | undefined {
  if (!element) return undefined;
  return resolveLanguageFromAttributes(
    element.getAttribute('class') ?? '',
    element.getAttribute('data-lang') ??
      element.getAttribute('data-language') ??
      ''
  );
}

function normalizeCodeBlocks(root: Element): void {
  for (const pre of Array.from(root.querySelectorAll('pre'))) {
    const code = pre.querySelector('code');
    const language = languageHint(pre) ?? languageHint(code);
    if (!language) continue;

    pre.setAttribute('data-language', language);
    code?.setAttribute('class', `language-${language}`);
  }
}

function spanValue(cell: Element, name: string): number {
  const value = Number.parseInt(cell.getAttribute(name) ?? '1', 10);
  return Number.isFinite(value) ? value : 1;
}

function normalizeTables(
  document: Document,
  root: Element,
  diagnostics: Diagnostics | undefined
): void {
  // innermost first so flattened text of nested tables stays intact
  for (const table of Array.from(root.querySelectorAll('table')).reverse()) {
    if (table.parentElement?.closest('table')) {
      const replacement = document.createElement('span');
      replacement.textContent = sanitizeText(table.textContent);
      table.replaceWith(replacement);
      diagnostics?.warn(
        'RenderWarning',
        'rendering',
        'Nested table flattened to plain text'
      );
    }
  }

  for (const table of Array.from(root.querySelectorAll('table'))) {
    const spanned = Array.from(
      table.querySelectorAll('[colspan], [rowspan]')
    ).filter(
      (cell) => spanValue(cell, 'colspan') > 1 || spanValue(cell, 'rowspan') > 1
    );
    if (spanned.length > 0) {
      for (const cell of spanned) {
        cell.removeAttribute('colspan');
        cell.removeAttribute('rowspan');
      }
      diagnostics?.warn(
        'RenderWarning',
        'rendering',
        `Table cell spans dropped (${spanned.length} cell(s))`
      );
    }

    if (table.querySelector('th')) continue;
    const firstRow = table.querySelector('tr');
    if (!firstRow) continue;
    for (const cell of Array.from(firstRow.querySelectorAll('td'))) {
      const header = document.createElement('th');
      while (cell.firstChild) header.appendChild(cell.firstChild);
      cell.replaceWith(header);
    }
  }
}

function dropInlineStyles(root: Element): void {
  root.removeAttribute('style');
  for (const element of Array.from(root.querySelectorAll('[style]'))) {
    element.removeAttribute('style');
  }
}

function normalizeTree(
  tree: CleanedTree,
  config: Config,
  diagnostics: Diagnostics | undefined
): void {
  normalizeImages(tree.root);
  removeHeadingAnchors(tree.root);
  normalizeCodeBlocks(tree.root);
  normalizeTables(tree.document, tree.root, diagnostics);
  if (!config.preserveInlineStyles) dropInlineStyles(tree.root);
}

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

/**
 * Copies the content node and strips non-content elements from the copy.
 * The source document is left untouched and the root is never removed.
 */
export function cleanContent(
  content: Element,
  config: Config,
  diagnostics?: Diagnostics,
  source?: string
): CleanedTree {
  const tree = copySubtree(content);
  new NoiseStripper(config, source).strip(tree.root);
  normalizeTree(tree, config, diagnostics);
  return tree;
}

/**
 * Copy with structural normalization only, for `clean_html: false`.
 */
export function copyContent(
  content: Element,
  config: Config,
  diagnostics?: Diagnostics
): CleanedTree {
  const tree = copySubtree(content);
  normalizeTree(tree, config, diagnostics);
  return tree;
}
