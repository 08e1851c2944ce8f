import type {
  TranslatorConfig,
  TranslatorConfigObject,
} from 'node-html-markdown';

import type { Config } from '../config/index.js';
import type { Diagnostics } from '../services/diagnostics.js';
import { sanitizeText } from '../utils/sanitizer.js';
import { isLikeNode, isObject, type LikeNode } from '../utils/type-guards.js';
import {
  deriveAltFromImageUrl,
  isDataUri,
  resolveImageSource,
} from './image-source.js';
import {
  detectLanguageFromCode,
  resolveLanguageFromAttributes,
} from './language-detection.js';

export interface TranslatorEnvironment {
  readonly config: Config;
  readonly diagnostics: Diagnostics;
}

type PostprocessInput = { content: string };

// ---------------------------------------------------------------------------
// DOM helpers (translator-only)
// ---------------------------------------------------------------------------

function readContextNode(ctx: unknown): LikeNode | undefined {
  if (!isObject(ctx)) return undefined;
  const { node } = ctx;
  return isLikeNode(node) ? node : undefined;
}

function readContextParent(ctx: unknown): LikeNode | undefined {
  if (!isObject(ctx)) return undefined;
  const { parent } = ctx;
  return isLikeNode(parent) ? parent : undefined;
}

function getTagName(node: LikeNode | undefined): string {
  const raw = node?.tagName ?? node?.rawTagName;
  return typeof raw === 'string' ? raw.toUpperCase() : '';
}

function getAttr(node: LikeNode | undefined, name: string): string | null {
  if (!node || typeof node.getAttribute !== 'function') return null;
  const value = node.getAttribute(name);
  return typeof value === 'string' ? value : null;
}

function getText(node: LikeNode | undefined): string {
  const raw = node?.textContent;
  return typeof raw === 'string' ? raw : '';
}

// ---------------------------------------------------------------------------
// Headings
// ---------------------------------------------------------------------------

export function clampHeadingLevel(level: number, config: Config): number {
  const shifted = level + config.headingOffset;
  return Math.min(Math.max(shifted, 1), config.maxHeadingDepth);
}

function buildHeadingTranslator(
  level: number,
  env: TranslatorEnvironment
): TranslatorConfig {
  const marker = '#'.repeat(clampHeadingLevel(level, env.config));
  return {
    surroundingNewlines: 2,
    postprocess: ({ content }: PostprocessInput) => {
      const text = content.replace(/\s*\n+\s*/g, ' ').trim();
      return text ? `${marker} ${text}` : '';
    },
  };
}

// ---------------------------------------------------------------------------
// Code
// ---------------------------------------------------------------------------

export function buildInlineCode(content: string): string {
  const trimmed = content.trim();
  if (!trimmed) return '``';

  let maxBackticks = 0;
  let currentRun = 0;

  for (const char of trimmed) {
    if (char === '`') currentRun += 1;
    else {
      if (currentRun > maxBackticks) maxBackticks = currentRun;
      currentRun = 0;
    }
  }
  if (currentRun > maxBackticks) maxBackticks = currentRun;

  const delimiter = '`'.repeat(maxBackticks + 1);
  const padding = trimmed.startsWith('`') || trimmed.endsWith('`') ? ' ' : '';
  return `${delimiter}${padding}${trimmed}${padding}${delimiter}`;
}

/**
 * Configured fence, lengthened past any run of the fence character inside
 * the code.
 */
export function chooseFence(code: string, fence: Config['codeFence']): string {
  const char = fence.charAt(0);
  let longest = 0;
  let run = 0;
  for (const current of code) {
    run = current === char ? run + 1 : 0;
    if (run > longest) longest = run;
  }
  return char.repeat(Math.max(fence.length, longest + 1));
}

export function formatCodeBlock(
  content: string,
  language: string | undefined,
  config: Config
): string {
  const code = content.replace(/^(?:[ \t]*\n)+/, '').trimEnd();
  if (!code.trim()) return '';

  const resolved =
    language ??
    (config.detectCodeLanguage ? detectLanguageFromCode(code) : undefined) ??
    '';
  const fence = chooseFence(code, config.codeFence);
  return `${fence}${resolved}\n${code}\n${fence}`;
}

function isCodeBlock(node: LikeNode | undefined): boolean {
  return getTagName(node) === 'PRE';
}

function resolveAttributeLanguage(
  node: LikeNode | undefined
): string | undefined {
  return resolveLanguageFromAttributes(
    getAttr(node, 'class') ?? '',
    getAttr(node, 'data-lang') ?? getAttr(node, 'data-language') ?? ''
  );
}

function findLanguageFromCodeChild(
  node: LikeNode | undefined
): string | undefined {
  for (const child of Array.from(node?.childNodes ?? [])) {
    if (!isLikeNode(child)) continue;
    if (getTagName(child) === 'CODE') return resolveAttributeLanguage(child);
  }
  return undefined;
}

function buildCodeTranslator(ctx: unknown): TranslatorConfig {
  if (isCodeBlock(readContextParent(ctx))) {
    return { noEscape: true, preserveWhitespace: true };
  }
  return {
    spaceIfRepeatingChar: true,
    noEscape: true,
    postprocess: ({ content }: PostprocessInput) => buildInlineCode(content),
  };
}

function buildPreTranslator(
  ctx: unknown,
  env: TranslatorEnvironment
): TranslatorConfig {
  const node = readContextNode(ctx);
  const language =
    resolveAttributeLanguage(node) ?? findLanguageFromCodeChild(node);

  return {
    noEscape: true,
    preserveWhitespace: true,
    surroundingNewlines: 2,
    postprocess: ({ content }: PostprocessInput) =>
      formatCodeBlock(content, language, env.config),
  };
}

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

function escapeAltText(alt: string): string {
  return alt.replace(/([\\[\]])/g, '\\$1');
}

export function formatLinkDestination(target: string): string {
  if (!/[\s<>()]/.test(target)) return target;
  return `<${target.replace(/[<>]/g, (char) => encodeURIComponent(char))}>`;
}

function buildImageTranslator(
  ctx: unknown,
  env: TranslatorEnvironment
): TranslatorConfig {
  const node = readContextNode(ctx);
  const src = resolveImageSource((name) => getAttr(node, name));
  const alt = sanitizeText(getAttr(node, 'alt')) || deriveAltFromImageUrl(src);

  if (!src) return { content: '' };
  if (isDataUri(src)) {
    env.diagnostics.warn(
      'RenderWarning',
      'rendering',
      'Inline data URI image omitted'
    );
    return { content: escapeAltText(alt) };
  }

  return {
    content: `![${escapeAltText(alt)}](${formatLinkDestination(src)})`,
  };
}

// ---------------------------------------------------------------------------
// Constructs without a Markdown equivalent
// ---------------------------------------------------------------------------

const CONTAINER_FALLBACK_TAGS = [
  'video',
  'audio',
  'object',
  'canvas',
  'select',
  'textarea',
  'button',
] as const;
const VOID_FALLBACK_TAGS = ['iframe', 'embed', 'input'] as const;

function warnUnsupported(
  node: LikeNode | undefined,
  env: TranslatorEnvironment
): void {
  const tagName = getTagName(node).toLowerCase();
  env.diagnostics.warn(
    'RenderWarning',
    'rendering',
    `<${tagName}> has no Markdown equivalent; rendered as plain text`
  );
}

function buildContainerFallbackTranslator(
  ctx: unknown,
  env: TranslatorEnvironment
): TranslatorConfig {
  const node = readContextNode(ctx);
  warnUnsupported(node, env);
  const label = sanitizeText(
    getAttr(node, 'title') ?? getAttr(node, 'aria-label')
  );
  return sanitizeText(getText(node)) ? {} : { content: label };
}

function buildVoidFallbackTranslator(
  ctx: unknown,
  env: TranslatorEnvironment
): TranslatorConfig {
  const node = readContextNode(ctx);
  warnUnsupported(node, env);
  const label =
    getAttr(node, 'title') ??
    getAttr(node, 'aria-label') ??
    getAttr(node, 'value') ??
    getAttr(node, 'placeholder') ??
    '';
  return { content: sanitizeText(label) };
}

// ---------------------------------------------------------------------------
// Definition lists
// ---------------------------------------------------------------------------

function buildDlChildFragment(child: unknown): string | null {
  if (!isLikeNode(child)) return null;
  const nodeName = getTagName(child);
  const text = sanitizeText(getText(child));
  if (nodeName === 'DT') return `**${text}**\n`;
  if (nodeName === 'DD') return `: ${text}\n`;
  return null;
}

function buildDlTranslator(ctx: unknown): TranslatorConfig {
  const node = readContextNode(ctx);
  let items = '';
  for (const child of Array.from(node?.childNodes ?? [])) {
    const fragment = buildDlChildFragment(child);
    if (fragment !== null) items += fragment;
  }
  return { surroundingNewlines: 2, content: items.trimEnd() };
}

// ---------------------------------------------------------------------------
// Translator registry
// ---------------------------------------------------------------------------

export function createCustomTranslators(
  env: TranslatorEnvironment
): TranslatorConfigObject {
  const translators: TranslatorConfigObject = {
    code: (ctx: unknown) => buildCodeTranslator(ctx),
    pre: (ctx: unknown) => buildPreTranslator(ctx, env),
    img: (ctx: unknown) => buildImageTranslator(ctx, env),
    dl: (ctx: unknown) => buildDlTranslator(ctx),
    kbd: () => ({
      noEscape: true,
      postprocess: ({ content }: PostprocessInput) => buildInlineCode(content),
    }),
    mark: () => ({
      postprocess: ({ content }: PostprocessInput) => `==${content}==`,
    }),
    sub: () => ({
      postprocess: ({ content }: PostprocessInput) => `~${content}~`,
    }),
    sup: () => ({
      postprocess: ({ content }: PostprocessInput) => `^${content}^`,
    }),
    details: () => ({
      surroundingNewlines: 2,
      postprocess: ({ content }: PostprocessInput) => content.trim(),
    }),
    summary: () => ({
      surroundingNewlines: 2,
      postprocess: ({ content }: PostprocessInput) => content.trim(),
    }),
  };

  for (let level = 1; level <= 6; level += 1) {
    translators[`h${level}`] = () => buildHeadingTranslator(level, env);
  }
  for (const tagName of CONTAINER_FALLBACK_TAGS) {
    translators[tagName] = (ctx: unknown) =>
      buildContainerFallbackTranslator(ctx, env);
  }
  for (const tagName of VOID_FALLBACK_TAGS) {
    translators[tagName] = (ctx: unknown) =>
      buildVoidFallbackTranslator(ctx, env);
  }

  return translators;
}
