import { sanitizeText } from '../utils/sanitizer.js';

/**
 * Read-only view of an element used by the content-scoring rules, so the
 * rules never touch the DOM directly.
 */
export interface NodeView {
  readonly element: Element;
  /** Lower-case tag name. */
  readonly tagName: string;
  /** Distance from the document element. */
  readonly depth: number;
  /** Position in document order. */
  readonly order: number;
  readonly textLength: number;
  readonly linkTextLength: number;
  readonly hasChildren: boolean;
  attr(name: string): string | null;
}

function computeDepth(element: Element): number {
  let depth = 0;
  let current = element.parentElement;
  while (current) {
    depth += 1;
    current = current.parentElement;
  }
  return depth;
}

export function createNodeView(element: Element, order: number): NodeView {
  const textLength = sanitizeText(element.textContent).length;
  let linkTextLength = 0;
  for (const link of element.querySelectorAll('a')) {
    linkTextLength += sanitizeText(link.textContent).length;
  }

  return {
    element,
    tagName: element.tagName.toLowerCase(),
    depth: computeDepth(element),
    order,
    textLength,
    linkTextLength: Math.min(linkTextLength, textLength),
    hasChildren: element.children.length > 0,
    attr: (name) => element.getAttribute(name),
  };
}

export function linkDensity(view: NodeView): number {
  return view.textLength > 0 ? view.linkTextLength / view.textLength : 0;
}
