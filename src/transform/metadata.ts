import path from 'node:path';

import { Readability } from '@mozilla/readability';
import { z } from 'zod';

import type { MetadataOverrides } from '../config/index.js';
import { logDebug } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';
import {
  humanizeFileStem,
  sanitizeText,
  uniqueStrings,
} from '../utils/sanitizer.js';

export interface Metadata {
  readonly title?: string;
  readonly author?: string;
  readonly publishedDate?: string;
  readonly description?: string;
  readonly canonicalUrl?: string;
  readonly siteName?: string;
  readonly tags?: readonly string[];
}

type MutableMetadata = { -readonly [K in keyof Metadata]: Metadata[K] };

export interface MetadataSource {
  readonly document: Document;
  readonly sourcePath?: string | null;
  readonly overrides?: MetadataOverrides;
}

// ---------------------------------------------------------------------------
// MetaContext & handlers
// ---------------------------------------------------------------------------

interface MetaContext {
  title: { og?: string; twitter?: string };
  description: { og?: string; twitter?: string; standard?: string };
  author: { article?: string; standard?: string };
  published: { article?: string; standard?: string };
  canonical: { link?: string; og?: string };
  siteName: { og?: string; application?: string };
  tags: string[];
}

type MetaHandler = (ctx: MetaContext, content: string) => void;

const splitKeywords = (content: string): string[] =>
  content.split(',').map((keyword) => keyword.trim());

const META_PROPERTY_HANDLERS = new Map<string, MetaHandler>([
  ['og:title', (ctx, c) => (ctx.title.og ??= c)],
  ['og:description', (ctx, c) => (ctx.description.og ??= c)],
  ['og:url', (ctx, c) => (ctx.canonical.og ??= c)],
  ['og:site_name', (ctx, c) => (ctx.siteName.og ??= c)],
  ['article:author', (ctx, c) => (ctx.author.article ??= c)],
  ['article:published_time', (ctx, c) => (ctx.published.article ??= c)],
  ['article:tag', (ctx, c) => ctx.tags.push(c)],
]);

const META_NAME_HANDLERS = new Map<string, MetaHandler>([
  ['twitter:title', (ctx, c) => (ctx.title.twitter ??= c)],
  ['twitter:description', (ctx, c) => (ctx.description.twitter ??= c)],
  ['description', (ctx, c) => (ctx.description.standard ??= c)],
  ['author', (ctx, c) => (ctx.author.standard ??= c)],
  ['keywords', (ctx, c) => ctx.tags.push(...splitKeywords(c))],
  ['application-name', (ctx, c) => (ctx.siteName.application ??= c)],
  ['date', (ctx, c) => (ctx.published.standard ??= c)],
  ['pubdate', (ctx, c) => (ctx.published.standard ??= c)],
]);

function processMetaTag(ctx: MetaContext, tag: Element): void {
  const content = sanitizeText(tag.getAttribute('content'));
  if (!content) return;

  // twitter cards are published under both `name` and `property`
  const property = tag.getAttribute('property')?.trim().toLowerCase();
  const name = tag.getAttribute('name')?.trim().toLowerCase();
  for (const key of new Set([property, name])) {
    if (!key) continue;
    (META_PROPERTY_HANDLERS.get(key) ?? META_NAME_HANDLERS.get(key))?.(
      ctx,
      content
    );
  }
}

function buildMetaContext(document: Document): MetaContext {
  const ctx: MetaContext = {
    title: {},
    description: {},
    author: {},
    published: {},
    canonical: {},
    siteName: {},
    tags: [],
  };

  for (const tag of document.querySelectorAll('meta')) {
    processMetaTag(ctx, tag);
  }

  const canonical = sanitizeText(
    document.querySelector('link[rel~="canonical"]')?.getAttribute('href')
  );
  if (canonical) ctx.canonical.link = canonical;

  return ctx;
}

function resolveMetadataFromContext(ctx: MetaContext): Metadata {
  return compactMetadata({
    title: ctx.title.og ?? ctx.title.twitter,
    description:
      ctx.description.og ?? ctx.description.twitter ?? ctx.description.standard,
    author: ctx.author.article ?? ctx.author.standard,
    publishedDate: ctx.published.article ?? ctx.published.standard,
    canonicalUrl: ctx.canonical.link ?? ctx.canonical.og,
    siteName: ctx.siteName.og ?? ctx.siteName.application,
    tags: ctx.tags,
  });
}

// ---------------------------------------------------------------------------
// JSON-LD
// ---------------------------------------------------------------------------

const personSchema = z.union([
  z.string(),
  z.object({ name: z.string() }).transform((person) => person.name),
]);

const jsonLdNodeSchema = z.object({
  headline: z.string().optional().catch(undefined),
  author: z
    .union([personSchema, z.array(personSchema)])
    .optional()
    .catch(undefined),
  datePublished: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  url: z.string().optional().catch(undefined),
  publisher: z
    .object({ name: z.string().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  keywords: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .catch(undefined),
});

type JsonLdNode = z.output<typeof jsonLdNodeSchema>;

function flattenJsonLd(value: unknown): unknown[] {
  if (Array.isArray(value)) return value.flatMap(flattenJsonLd);
  if (typeof value !== 'object' || value === null) return [];
  const graph: unknown = Reflect.get(value, '@graph');
  return Array.isArray(graph)
    ? [value, ...graph.flatMap(flattenJsonLd)]
    : [value];
}

function readJsonLdNodes(document: Document): JsonLdNode[] {
  const nodes: JsonLdNode[] = [];
  for (const script of document.querySelectorAll(
    'script[type="application/ld+json"]'
  )) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(script.textContent ?? '');
    } catch (error: unknown) {
      logDebug('Skipping malformed JSON-LD block', {
        error: getErrorMessage(error),
      });
      continue;
    }
    for (const candidate of flattenJsonLd(parsed)) {
      const result = jsonLdNodeSchema.safeParse(candidate);
      if (result.success) nodes.push(result.data);
    }
  }
  return nodes;
}

function jsonLdToMetadata(node: JsonLdNode): Metadata {
  const authors =
    node.author === undefined
      ? []
      : Array.isArray(node.author)
        ? node.author
        : [node.author];
  const keywords =
    typeof node.keywords === 'string'
      ? splitKeywords(node.keywords)
      : (node.keywords ?? []);

  return compactMetadata({
    title: node.headline,
    author: uniqueStrings(authors).join(', '),
    publishedDate: node.datePublished,
    description: node.description,
    canonicalUrl: node.url,
    siteName: node.publisher?.name,
    tags: keywords,
  });
}

// ---------------------------------------------------------------------------
// Heuristics
// ---------------------------------------------------------------------------

const AUTHOR_SELECTORS = [
  '[rel="author"]',
  '[itemprop="author"]',
  '.byline',
  '.author',
] as const;

const MAX_BYLINE_LENGTH = 100;

function normalizeByline(value: string | null | undefined): string {
  const text = sanitizeText(value).replace(/^by\s+/i, '');
  return text.length <= MAX_BYLINE_LENGTH ? text : '';
}

function readabilityByline(document: Document): string {
  try {
    const clone = document.cloneNode(true) as Document;
    const parsed = new Readability(clone, { maxElemsToParse: 20_000 }).parse();
    return normalizeByline(parsed?.byline);
  } catch (error: unknown) {
    logDebug('Readability byline detection failed', {
      error: getErrorMessage(error),
    });
    return '';
  }
}

function selectorByline(document: Document): string {
  for (const selector of AUTHOR_SELECTORS) {
    for (const element of document.querySelectorAll(selector)) {
      const byline = normalizeByline(element.textContent);
      if (byline) return byline;
    }
  }
  return '';
}

function heuristicMetadata(document: Document, needsAuthor: boolean): Metadata {
  const time = document.querySelector('time[datetime]');
  return compactMetadata({
    title: document.querySelector('h1')?.textContent,
    author: needsAuthor
      ? readabilityByline(document) || selectorByline(document)
      : undefined,
    publishedDate: time?.getAttribute('datetime'),
  });
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

interface MetadataCandidate {
  readonly title?: string | null | undefined;
  readonly author?: string | null | undefined;
  readonly publishedDate?: string | null | undefined;
  readonly description?: string | null | undefined;
  readonly canonicalUrl?: string | null | undefined;
  readonly siteName?: string | null | undefined;
  readonly tags?: readonly string[] | undefined;
}

const TEXT_FIELDS = [
  'title',
  'author',
  'publishedDate',
  'description',
  'canonicalUrl',
  'siteName',
] as const;

function compactMetadata(candidate: MetadataCandidate): Metadata {
  const metadata: MutableMetadata = {};
  for (const field of TEXT_FIELDS) {
    const value = sanitizeText(candidate[field]);
    if (value) metadata[field] = value;
  }
  const tags = uniqueStrings(candidate.tags ?? []);
  if (tags.length > 0) metadata.tags = tags;
  return metadata;
}

/**
 * Field by field, the first source with a value wins.
 */
export function mergeMetadata(...sources: readonly Metadata[]): Metadata {
  const merged: MutableMetadata = {};
  for (const source of sources) {
    for (const field of TEXT_FIELDS) {
      merged[field] ??= source[field];
    }
    if (!merged.tags && source.tags && source.tags.length > 0) {
      merged.tags = source.tags;
    }
  }
  return Object.freeze(compactMetadata(merged));
}

function filenameMetadata(sourcePath: string | null | undefined): Metadata {
  if (!sourcePath) return {};
  return compactMetadata({
    title: humanizeFileStem(path.parse(sourcePath).name),
  });
}

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

/**
 * Extracts document metadata. Order of precedence: configured overrides,
 * meta tags and canonical link, JSON-LD, `<title>`, page heuristics, then
 * the file name (title only). Never throws.
 */
export function extractMetadata(source: MetadataSource): Metadata {
  const { document, sourcePath, overrides = {} } = source;

  const fromOverrides = compactMetadata(overrides);
  const fromMeta = resolveMetadataFromContext(buildMetaContext(document));
  const fromJsonLd = readJsonLdNodes(document).map(jsonLdToMetadata);
  const fromTitle = compactMetadata({
    title: document.querySelector('title')?.textContent,
  });

  const structured = mergeMetadata(
    fromOverrides,
    fromMeta,
    ...fromJsonLd,
    fromTitle
  );
  const heuristics = heuristicMetadata(document, !structured.author);

  return mergeMetadata(structured, heuristics, filenameMetadata(sourcePath));
}
