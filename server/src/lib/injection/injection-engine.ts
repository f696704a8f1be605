import { HTMLElement, Node, TextNode, parse } from 'node-html-parser';
import { decode, escape as escapeHtml } from 'he';
import {
  DEFAULT_MIN_TEXT_LENGTH,
  SIBLING_BLOCK_TAGS,
  isBlockElement,
  isExcludedElement,
  isProseBlock,
  isTranslatableText,
  normalizeText
} from './eligibility';

/**
 * immersion   - translation of each prose block: a clone after paragraphs and headings,
 *               a marked div at the end of cells, list items and definitions
 * inplace     - text node rewritten as "original + separator + translation"
 * strict-line - every line followed by a <br> and its translation in a marked span
 */
export const INJECTION_STRATEGIES = ['immersion', 'inplace', 'strict-line'] as const;

export type InjectionStrategy = typeof INJECTION_STRATEGIES[number];

export interface TextLeaf {
  /** Structural position; stable for the same source markup */
  key: string;
  text: string;
}

export interface InjectionResult {
  html: string;
  /** Leaves that received a translation */
  translated: number;
  /** Leaves left as they were because no usable translation came back */
  skipped: number;
}

export interface InjectionOptions {
  separator?: string;
  minTextLength?: number;
  translationStyle?: string;
}

interface BlockTarget {
  kind: 'block';
  key: string;
  text: string;
  element: HTMLElement;
}

interface TextTarget {
  kind: 'text';
  key: string;
  text: string;
  node: TextNode;
}

interface LineTarget {
  kind: 'lines';
  node: TextNode;
  // Raw pieces in order; translatable lines carry a key
  pieces: Array<{ raw: string; key?: string; text?: string }>;
}

type Target = BlockTarget | TextTarget | LineTarget;

interface ParsedDocument {
  root: HTMLElement;
  doctype: string;
}

const DEFAULT_TRANSLATION_STYLE =
  'color:#0b6;margin-top:4px;line-height:1.45;font-size:0.95em;word-break:break-word;';

const PARSE_OPTIONS = {
  comment: true,
  blockTextElements: { script: true, noscript: true, style: true, pre: true }
};

/**
 * Rewrites message markup with translated text while leaving structure intact.
 *
 * `collect` and `inject` each parse the (immutable) source string into a private tree,
 * so the same markup always yields the same position keys and the caller's document is
 * never mutated. Translations are matched back by key, never by order.
 */
export class InjectionEngine {
  private readonly separator: string;
  private readonly minTextLength: number;
  private readonly translationStyle: string;

  constructor(options: InjectionOptions = {}) {
    this.separator = options.separator ?? ' ';
    this.minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
    this.translationStyle = options.translationStyle ?? DEFAULT_TRANSLATION_STYLE;
  }

  collect(html: string, strategy: InjectionStrategy): TextLeaf[] {
    const { root } = this._parse(html);
    const leaves: TextLeaf[] = [];

    for (const target of this._targets(root, strategy)) {
      if (target.kind === 'lines') {
        for (const piece of target.pieces) {
          if (piece.key !== undefined && piece.text !== undefined) {
            leaves.push({ key: piece.key, text: piece.text });
          }
        }
      } else {
        leaves.push({ key: target.key, text: target.text });
      }
    }

    return leaves;
  }

  inject(html: string, translations: ReadonlyMap<string, string>, strategy: InjectionStrategy): InjectionResult {
    const { root, doctype } = this._parse(html);
    const targets = this._targets(root, strategy);
    let translated = 0;
    let skipped = 0;

    const lookup = (key: string): string | undefined => {
      const value = translations.get(key);
      return value !== undefined && value.trim().length > 0 ? value.trim() : undefined;
    };

    // Targets hold node references, so sibling inserts below cannot shift them
    for (const target of targets) {
      switch (target.kind) {
        case 'block': {
          const translation = lookup(target.key);
          if (translation === undefined) {
            skipped++;
            break;
          }
          if (SIBLING_BLOCK_TAGS.has(target.element.tagName)) {
            target.element.insertAdjacentHTML('afterend', this._blockClone(target.element, translation));
          } else {
            target.element.insertAdjacentHTML('beforeend', this._innerBlock(translation));
          }
          translated++;
          break;
        }

        case 'text': {
          const translation = lookup(target.key);
          if (translation === undefined) {
            skipped++;
            break;
          }
          const { lead, core, trail } = splitWhitespace(target.node.rawText);
          target.node.rawText = `${lead}${core}${this.separator}${escapeInline(translation)}${trail}`;
          translated++;
          break;
        }

        case 'lines': {
          let changed = false;
          const rendered = target.pieces.map(piece => {
            if (piece.key === undefined) {
              return piece.raw;
            }
            const translation = lookup(piece.key);
            if (translation === undefined) {
              skipped++;
              return piece.raw;
            }
            translated++;
            changed = true;
            return `${piece.raw}<br><span data-mail-translation="line" style="${this.translationStyle}">${escapeInline(translation)}</span>`;
          });
          if (changed) {
            replaceWithHtml(target.node, rendered.join(''));
          }
          break;
        }
      }
    }

    return { html: doctype + root.toString(), translated, skipped };
  }

  private _parse(html: string): ParsedDocument {
    // node-html-parser does not round-trip a doctype; carry it across by hand
    const match = /^\s*<!doctype[^>]*>/i.exec(html);
    const doctype = match ? match[0] : '';
    const root = parse(match ? html.slice(match[0].length) : html, PARSE_OPTIONS);
    return { root, doctype };
  }

  private _targets(root: HTMLElement, strategy: InjectionStrategy): Target[] {
    const targets: Target[] = [];

    const visit = (node: Node, path: string): void => {
      if (node instanceof HTMLElement) {
        if (isExcludedElement(node)) {
          return;
        }

        if (strategy === 'immersion' && isBlockElement(node) && isProseBlock(node)) {
          const text = normalizeText(node.text);
          if (isTranslatableText(text, this.minTextLength)) {
            targets.push({ kind: 'block', key: `b:${path}`, text, element: node });
          }
          return;
        }

        node.childNodes.forEach((child, index) => visit(child, path ? `${path}/${index}` : String(index)));
        return;
      }

      if (!(node instanceof TextNode) || node.isWhitespace || strategy === 'immersion') {
        return;
      }

      if (strategy === 'inplace') {
        const text = normalizeText(node.text);
        if (isTranslatableText(text, this.minTextLength)) {
          targets.push({ kind: 'text', key: `t:${path}`, text, node });
        }
        return;
      }

      const pieces = node.rawText.split(/(\r?\n)/).map((raw, index) => {
        if (index % 2 === 1) {
          return { raw };
        }
        const text = normalizeText(decode(raw));
        return isTranslatableText(text, this.minTextLength)
          ? { raw, key: `l:${path}#${index / 2}`, text }
          : { raw };
      });
      if (pieces.some(piece => piece.key !== undefined)) {
        targets.push({ kind: 'lines', node, pieces });
      }
    };

    root.childNodes.forEach((child, index) => visit(child, String(index)));
    return targets;
  }

  /**
   * Shallow copy of the block: same tag and attributes (minus id, which must stay unique),
   * holding only the translation. Links and code inside the original are not duplicated.
   */
  private _blockClone(element: HTMLElement, translation: string): string {
    const tag = element.rawTagName;
    const attributes = Object.entries(element.attributes)
      .filter(([name]) => name.toLowerCase() !== 'id' && name.toLowerCase() !== 'style')
      .map(([name, value]) => `${name}="${escapeHtml(value)}"`);

    const ownStyle = (element.getAttribute('style') ?? '').trim();
    const style = ownStyle ? `${ownStyle.replace(/;?\s*$/, ';')}${this.translationStyle}` : this.translationStyle;
    attributes.push(`style="${escapeHtml(style)}"`, 'data-mail-translation="block"');

    return `<${tag} ${attributes.join(' ')}>${escapeMultiline(translation)}</${tag}>`;
  }

  // Cells, list items and definitions keep their count; the translation goes inside
  private _innerBlock(translation: string): string {
    return `<div style="${escapeHtml(this.translationStyle)}" data-mail-translation="block">${escapeMultiline(translation)}</div>`;
  }
}

function escapeMultiline(text: string): string {
  return text
    .split(/\r?\n/)
    .map(line => escapeHtml(line.trim()))
    .filter(line => line.length > 0)
    .join('<br>');
}

function splitWhitespace(raw: string): { lead: string; core: string; trail: string } {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(raw);
  if (!match) {
    return { lead: '', core: raw, trail: '' };
  }
  return { lead: match[1], core: match[2], trail: match[3] };
}

// Single-line translation, safe inside a text node
function escapeInline(text: string): string {
  return escapeHtml(text.replace(/\s+/g, ' ').trim());
}

/**
 * Swap a text node for the nodes parsed from `html`, in the same position.
 */
function replaceWithHtml(node: TextNode, html: string): void {
  const parent = node.parentNode;
  if (!parent) {
    return;
  }
  const fragment = parse(html, PARSE_OPTIONS);
  const index = parent.childNodes.indexOf(node);
  for (const child of fragment.childNodes) {
    child.parentNode = parent;
  }
  parent.childNodes.splice(index, 1, ...fragment.childNodes);
}
