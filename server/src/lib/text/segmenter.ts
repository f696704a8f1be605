import { convert as htmlToText } from 'html-to-text';

/**
 * A contiguous slice of source text submitted as one LLM unit.
 * `start`/`end` are offsets into the text that was segmented.
 */
export interface Segment {
  key: string;
  text: string;
  start: number;
  end: number;
  tokens: number;
}

export interface MessageBody {
  html?: string;
  text?: string;
}

// Conservative: 1 token ≈ 2 characters, same ratio the LLM client truncates with
const CHARS_PER_TOKEN = 2;

/**
 * Cheap monotone token estimate. Longer text never estimates lower.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Split `text` into segments of at most `maxTokens` estimated tokens.
 *
 * Boundaries are taken at blank lines first, then at line breaks, then at the whitespace
 * nearest the budget; a unit with no whitespace at all is cut hard. Separators stay
 * attached to the preceding segment, so joining every `segment.text` gives back `text`.
 */
export function* segmentText(text: unknown, maxTokens: number, keyPrefix = 'seg'): Generator<Segment> {
  if (typeof text !== 'string' || text.trim().length === 0) {
    return;
  }

  const maxChars = Math.max(1, Math.floor(maxTokens) * CHARS_PER_TOKEN);
  let chunk = '';
  let chunkStart = 0;
  let index = 0;

  const emit = (): Segment => {
    const segment: Segment = {
      key: `${keyPrefix}:${index}`,
      text: chunk,
      start: chunkStart,
      end: chunkStart + chunk.length,
      tokens: estimateTokens(chunk)
    };
    index++;
    chunkStart += chunk.length;
    chunk = '';
    return segment;
  };

  for (const unit of splitUnits(text, maxChars)) {
    if (chunk.length > 0 && chunk.length + unit.length > maxChars) {
      yield emit();
    }
    chunk += unit;
  }

  if (chunk.length > 0) {
    yield emit();
  }
}

/**
 * Flatten a message body to text and segment it. HTML wins over the plain part.
 */
export function* segmentDocument(body: MessageBody, maxTokens: number, keyPrefix = 'doc'): Generator<Segment> {
  yield* segmentText(bodyToPlainText(body), maxTokens, keyPrefix);
}

export function bodyToPlainText(body: MessageBody): string {
  if (body.html && body.html.trim().length > 0) {
    return htmlToText(body.html, {
      wordwrap: false,
      preserveNewlines: true,
      selectors: [
        { selector: 'a', options: { ignoreHref: true } },
        { selector: 'img', format: 'skip' },
        { selector: 'blockquote', format: 'skip' }
      ]
    }).trim();
  }
  return (body.text ?? '').trim();
}

/**
 * Break text into units no longer than maxChars, preferring paragraph, then line,
 * then word boundaries.
 */
function splitUnits(text: string, maxChars: number): string[] {
  const units: string[] = [];

  for (const paragraph of splitKeepingSeparator(text, /\n[ \t]*\n\s*/g)) {
    if (paragraph.length <= maxChars) {
      units.push(paragraph);
      continue;
    }
    for (const line of splitKeepingSeparator(paragraph, /\n/g)) {
      if (line.length <= maxChars) {
        units.push(line);
      } else {
        units.push(...splitAtWhitespace(line, maxChars));
      }
    }
  }

  return units;
}

/**
 * Split after every match of `separator`, keeping the separator on the left piece.
 */
function splitKeepingSeparator(text: string, separator: RegExp): string[] {
  const pieces: string[] = [];
  let last = 0;

  for (const match of text.matchAll(separator)) {
    const end = (match.index ?? 0) + match[0].length;
    pieces.push(text.slice(last, end));
    last = end;
  }
  if (last < text.length) {
    pieces.push(text.slice(last));
  }

  return pieces;
}

function splitAtWhitespace(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let rest = text;

  while (rest.length > maxChars) {
    // Last whitespace inside the budget; the whitespace stays with the left piece
    let cut = -1;
    for (let i = maxChars - 1; i > 0; i--) {
      if (/\s/.test(rest[i])) {
        cut = i + 1;
        break;
      }
    }
    if (cut <= 0) {
      cut = maxChars;
      // Never cut between the halves of a surrogate pair
      if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) {
        cut--;
      }
    }
    pieces.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }

  if (rest.length > 0) {
    pieces.push(rest);
  }
  return pieces;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
