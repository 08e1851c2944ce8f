import type { Config, SelectionWeights } from '../config/index.js';
import type { Diagnostics } from '../services/diagnostics.js';
import { logDebug } from '../services/logger.js';
import { getDocumentRoot } from '../services/parser.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { sanitizeText } from '../utils/sanitizer.js';
import { createNodeView, linkDensity, type NodeView } from './node-view.js';

const CANDIDATE_SELECTOR = 'article, main, section, div, [role="main"]';
const PARAGRAPH_SELECTOR = 'p, pre, td, blockquote';
const SEMANTIC_TAGS = new Set(['article', 'main']);
const MAX_ANCESTOR_LEVELS = 5;

const POSITIVE_HINT_PATTERN =
  /article|body|content|entry|hentry|h-entry|main|page|pagination|post|text|blog|story/i;
const NEGATIVE_HINT_PATTERN =
  /-ad-|hidden|^hid$| hid$| hid |^hid |banner|combx|comment|com-|contact|footer|gdpr|masthead|media|meta|outbrain|promo|related|scroll|share|shoutbox|sidebar|skyscraper|sponsor|shopping|tags|widget/i;

export type SelectionStrategy = 'selector' | 'scoring' | 'fallback';

export interface ContentSelection {
  readonly element: Element;
  readonly strategy: SelectionStrategy;
  readonly score: number | null;
}

export interface ScoringContext {
  readonly weights: SelectionWeights;
  /** Paragraph scores already propagated to their ancestors. */
  readonly paragraphScores: ReadonlyMap<Element, number>;
}

/**
 * A pure scoring rule over a node view. Rule scores are summed, then scaled
 * by the link-density penalty.
 */
export interface ScoringRule {
  readonly name: string;
  score(view: NodeView, context: ScoringContext): number;
}

export const semanticTagRule: ScoringRule = {
  name: 'semantic-tag',
  score: (view, { weights }) =>
    SEMANTIC_TAGS.has(view.tagName) ||
    view.attr('role') === 'main' ||
    view.attr('itemprop') === 'articleBody'
      ? weights.semanticTagWeight
      : 0,
};

export const classHintRule: ScoringRule = {
  name: 'class-hint',
  score: (view, { weights }) => {
    let score = 0;
    for (const attribute of ['class', 'id']) {
      const value = view.attr(attribute);
      if (!value) continue;
      if (NEGATIVE_HINT_PATTERN.test(value)) score -= weights.hintWeight;
      if (POSITIVE_HINT_PATTERN.test(value)) score += weights.hintWeight;
    }
    return score;
  },
};

export const paragraphDensityRule: ScoringRule = {
  name: 'paragraph-density',
  score: (view, { paragraphScores }) => paragraphScores.get(view.element) ?? 0,
};

export const SCORING_RULES: readonly ScoringRule[] = [
  semanticTagRule,
  classHintRule,
  paragraphDensityRule,
];

export function scoreParagraph(
  text: string,
  weights: SelectionWeights
): number {
  if (text.length < weights.minParagraphLength) return 0;
  const commas = text.split(',').length - 1;
  const lengthBonus = Math.min(
    Math.floor(text.length / weights.lengthUnit),
    weights.lengthBonusCap
  );
  return weights.paragraphBase + commas * weights.commaWeight + lengthBonus;
}

function ancestorDivider(level: number): number {
  if (level === 0) return 1;
  if (level === 1) return 2;
  return level * 3;
}

export function collectParagraphScores(
  root: Element,
  weights: SelectionWeights
): Map<Element, number> {
  const scores = new Map<Element, number>();
  for (const paragraph of root.querySelectorAll(PARAGRAPH_SELECTOR)) {
    const score = scoreParagraph(sanitizeText(paragraph.textContent), weights);
    if (score <= 0) continue;

    let ancestor = paragraph.parentElement;
    for (
      let level = 0;
      ancestor && ancestor !== root && level < MAX_ANCESTOR_LEVELS;
      level += 1
    ) {
      scores.set(
        ancestor,
        (scores.get(ancestor) ?? 0) + score / ancestorDivider(level)
      );
      ancestor = ancestor.parentElement;
    }
  }
  return scores;
}

export function scoreNode(
  view: NodeView,
  context: ScoringContext,
  rules: readonly ScoringRule[] = SCORING_RULES
): number {
  const base = rules.reduce((sum, rule) => sum + rule.score(view, context), 0);
  const penalty = Math.max(
    0,
    1 - linkDensity(view) * context.weights.linkDensityWeight
  );
  return base * penalty;
}

interface ScoredCandidate {
  readonly view: NodeView;
  readonly score: number;
}

function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.view.depth !== b.view.depth) return a.view.depth - b.view.depth;
  return a.view.order - b.view.order;
}

/**
 * Candidates ranked best first: score descending, then shallowest, then
 * earliest in the document.
 */
export function rankCandidates(
  document: Document,
  weights: SelectionWeights,
  rules: readonly ScoringRule[] = SCORING_RULES
): ScoredCandidate[] {
  const root = getDocumentRoot(document);
  const context: ScoringContext = {
    weights,
    paragraphScores: collectParagraphScores(root, weights),
  };

  const candidates: ScoredCandidate[] = [];
  let order = 0;
  for (const element of root.querySelectorAll(CANDIDATE_SELECTOR)) {
    const view = createNodeView(element, order);
    order += 1;
    if (view.textLength === 0) continue;
    candidates.push({ view, score: scoreNode(view, context, rules) });
  }
  return candidates.sort(compareCandidates);
}

function selectExplicit(
  document: Document,
  selector: string,
  diagnostics: Diagnostics
): Element | null {
  let matches: Element[];
  try {
    matches = Array.from(document.querySelectorAll(selector));
  } catch (error: unknown) {
    diagnostics.warn(
      'SelectionWarning',
      'selection',
      `Content selector "${selector}" is invalid: ${getErrorMessage(error)}`
    );
    return null;
  }

  const [match] = matches;
  if (matches.length === 1 && match) return match;
  diagnostics.warn(
    'SelectionWarning',
    'selection',
    matches.length === 0
      ? `Content selector "${selector}" matched no element`
      : `Content selector "${selector}" matched ${matches.length} elements`
  );
  return null;
}

/**
 * Picks the element holding the main content. Never fails: falls back to
 * the document body.
 */
export function selectContentNode(
  document: Document,
  config: Config,
  diagnostics: Diagnostics
): ContentSelection {
  if (config.contentSelector) {
    const element = selectExplicit(
      document,
      config.contentSelector,
      diagnostics
    );
    if (element) return { element, strategy: 'selector', score: null };
  }

  const [best] = rankCandidates(document, config.selection);
  if (best && best.score >= config.selection.minScore) {
    logDebug('Selected content root by score', {
      tagName: best.view.tagName,
      score: best.score,
    });
    return {
      element: best.view.element,
      strategy: 'scoring',
      score: best.score,
    };
  }

  logDebug('No candidate reached the minimum score; using document body', {
    bestScore: best?.score ?? null,
  });
  return {
    element: getDocumentRoot(document),
    strategy: 'fallback',
    score: null,
  };
}
