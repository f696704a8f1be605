/**
 * Which parts of a message are worth translating.
 * Links, code and preformatted text are never touched; quoted replies and layout chrome
 * (headers, footers, navigation, legal blurbs, coloured banners) are left alone.
 */

import { HTMLElement, Node } from 'node-html-parser';

// Never split, duplicated or rewritten
export const PROTECTED_TAGS = new Set([
  'A', 'CODE', 'PRE', 'KBD', 'SAMP', 'SCRIPT', 'STYLE', 'NOSCRIPT', 'TEXTAREA', 'TITLE', 'HEAD', 'SVG'
]);

export const QUOTE_TAGS = new Set(['BLOCKQUOTE']);

// Structural blocks that immersion translates
export const BLOCK_TAGS = new Set(['P', 'LI', 'H1', 'H2', 'H3', 'H4', 'H5', 'H6', 'DD', 'DT', 'TD', 'TH', 'FIGCAPTION']);

// Blocks that may be followed by a sibling copy; the rest (cells, list items, definition
// terms) take the translation inside, since a new sibling would add a column or list entry
export const SIBLING_BLOCK_TAGS = new Set(['P', 'H1', 'H2', 'H3', 'H4', 'H5', 'H6']);

// A block holding any of these is layout, not prose
const LAYOUT_TAGS = new Set(['TABLE', 'IMG', 'BUTTON', 'FORM', 'IFRAME', 'VIDEO', 'SVG']);

const CHROME_KEYWORDS = [
  'header', 'footer', 'nav', 'menu', 'banner', 'masthead', 'logo', 'brand',
  'unsubscribe', 'privacy', 'copyright', 'legal', 'terms', 'social', 'share'
];

const CHROME_ROLES = new Set(['banner', 'navigation', 'contentinfo']);

// Page-wide backgrounds are not hero regions
const PAGE_TAGS = new Set(['HTML', 'BODY']);

const PLAIN_BACKGROUND = /^(#fff|#ffffff|white|transparent|none|inherit|rgba?\(255,255,255(,[\d.]+)?\))(!important)?$/;
const WHITE_TEXT = /^(#fff|#ffffff|white|rgba?\(255,255,255(,[\d.]+)?\))(!important)?$/;

const BOILERPLATE_PHRASES = [
  'unsubscribe', 'privacy', 'copyright', 'all rights reserved', 'terms and conditions'
];

export const DEFAULT_MIN_TEXT_LENGTH = 2;

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * True when an element's own tag or attributes put its whole subtree off limits.
 */
export function isExcludedElement(element: HTMLElement): boolean {
  const tag = element.tagName;
  if (!tag) {
    return false;
  }
  if (PROTECTED_TAGS.has(tag) || QUOTE_TAGS.has(tag)) {
    return true;
  }
  return isChrome(element) || hasBannerStyling(element);
}

function isChrome(element: HTMLElement): boolean {
  const role = (element.getAttribute('role') ?? '').toLowerCase();
  if (CHROME_ROLES.has(role)) {
    return true;
  }

  const markers = `${element.getAttribute('class') ?? ''} ${element.getAttribute('id') ?? ''}`.toLowerCase();
  if (!markers.trim()) {
    return false;
  }
  return CHROME_KEYWORDS.some(keyword => markers.includes(keyword));
}

/**
 * Hero and banner regions: a coloured background (bgcolor or inline style), white text,
 * or an absolutely positioned, fixed or floated box.
 */
function hasBannerStyling(element: HTMLElement): boolean {
  const declarations = parseInlineStyle(element.getAttribute('style') ?? '');

  if (!PAGE_TAGS.has(element.tagName)) {
    const bgcolor = compact(element.getAttribute('bgcolor') ?? '');
    if (bgcolor && !PLAIN_BACKGROUND.test(bgcolor)) {
      return true;
    }
    const background = declarations.get('background-color') ?? declarations.get('background');
    if (background !== undefined && !PLAIN_BACKGROUND.test(background)) {
      return true;
    }
  }

  const color = declarations.get('color');
  if (color !== undefined && WHITE_TEXT.test(color)) {
    return true;
  }

  const position = declarations.get('position');
  if (position === 'absolute' || position === 'fixed') {
    return true;
  }
  const float = declarations.get('float');
  return float !== undefined && float !== 'none';
}

/**
 * Lower-cased declarations of a style attribute, values with whitespace removed.
 */
export function parseInlineStyle(style: string): Map<string, string> {
  const declarations = new Map<string, string>();
  for (const declaration of style.split(';')) {
    const colon = declaration.indexOf(':');
    if (colon <= 0) {
      continue;
    }
    const property = declaration.slice(0, colon).trim().toLowerCase();
    const value = compact(declaration.slice(colon + 1));
    if (property && value) {
      declarations.set(property, value);
    }
  }
  return declarations;
}

function compact(value: string): string {
  return value.replace(/\s+/g, '').toLowerCase();
}

export function isTranslatableText(text: string, minTextLength: number = DEFAULT_MIN_TEXT_LENGTH): boolean {
  const normalized = normalizeText(text);
  if (normalized.length < minTextLength) {
    return false;
  }
  if (!/\p{L}/u.test(normalized)) {
    return false;
  }
  const lower = normalized.toLowerCase();
  return !BOILERPLATE_PHRASES.some(phrase => lower.includes(phrase));
}

export function isBlockElement(node: Node): node is HTMLElement {
  return node instanceof HTMLElement && BLOCK_TAGS.has(node.tagName);
}

/**
 * Immersion only clones innermost prose blocks: no nested block, no layout element.
 */
export function isProseBlock(element: HTMLElement): boolean {
  return !hasDescendant(element, node =>
    node instanceof HTMLElement && (BLOCK_TAGS.has(node.tagName) || LAYOUT_TAGS.has(node.tagName))
  );
}

function hasDescendant(element: HTMLElement, predicate: (node: Node) => boolean): boolean {
  for (const child of element.childNodes) {
    if (predicate(child)) {
      return true;
    }
    if (child instanceof HTMLElement && hasDescendant(child, predicate)) {
      return true;
    }
  }
  return false;
}
