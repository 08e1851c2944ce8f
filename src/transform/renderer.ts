import {
  NodeHtmlMarkdown,
  type NodeHtmlMarkdownOptions,
} from 'node-html-markdown';

import type { Config } from '../config/index.js';
import type { AssetMap } from '../services/asset-map.js';
import type { Diagnostics } from '../services/diagnostics.js';
import {
  getDocumentRoot,
  parseHtmlDocument,
  wrapHtmlFragment,
} from '../services/parser.js';
import type { CleanedTree } from './cleaner.js';
import { createCustomTranslators } from './html-translators.js';
import { formatMarkdown } from './markdown-format.js';

function buildConverterOptions(
  config: Config
): Partial<NodeHtmlMarkdownOptions> {
  return {
    codeFence: config.codeFence,
    codeBlockStyle: 'fenced',
    emDelimiter: config.emphasisMarker,
    strongDelimiter: config.strongMarker,
    bulletMarker: config.bulletMarker,
    useLinkReferenceDefinitions: config.linkStyle === 'referenced',
    maxConsecutiveNewlines: 2,
    globalEscape: [/[\\`*_~[\]<>]/gm, '\\$&'],
    ignore: ['script', 'style', 'noscript', 'template', 'head', 'title'],
  };
}

function serializeRoot(tree: CleanedTree): string {
  return tree.root === getDocumentRoot(tree.document)
    ? tree.root.innerHTML
    : tree.root.outerHTML;
}

/**
 * Points image sources and linked-file hrefs at their placed copies.
 * References without a placed copy are left as written.
 */
export function rewriteAssetReferences(html: string, assets: AssetMap): string {
  if (!assets.values().some((entry) => entry.outputReference !== null)) {
    return html;
  }

  const document = parseHtmlDocument(wrapHtmlFragment(html));
  const root = getDocumentRoot(document);

  for (const image of Array.from(root.querySelectorAll('img[src]'))) {
    const src = image.getAttribute('src')?.trim();
    if (src) image.setAttribute('src', assets.referenceFor(src));
  }
  for (const anchor of Array.from(root.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href')?.trim();
    if (href && assets.has(href)) {
      anchor.setAttribute('href', assets.referenceFor(href));
    }
  }

  return root.innerHTML;
}

/**
 * Renders a cleaned tree to Markdown. Every placed asset is referenced by
 * its output path; the result ends with exactly one newline, or is empty.
 */
export function renderMarkdown(
  tree: CleanedTree,
  assets: AssetMap,
  config: Config,
  diagnostics: Diagnostics
): string {
  const html = rewriteAssetReferences(serializeRoot(tree), assets);
  const converter = new NodeHtmlMarkdown(
    buildConverterOptions(config),
    createCustomTranslators({ config, diagnostics })
  );
  return formatMarkdown(converter.translate(html), config.wrapWidth);
}
