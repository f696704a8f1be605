import MailComposer from 'nodemailer/lib/mail-composer';
import { escape as escapeHtml } from 'he';
import { MailMessage, OutgoingMessage } from './types';
import { formatMessageId } from './message-id';

export const LINKED_MESSAGE_HEADER = 'X-Linked-Message-Id';

// Keeps auto-responders and our own scans away from generated mail
export const AUTOMATION_HEADERS: Readonly<Record<string, string>> = {
  'Auto-Submitted': 'auto-generated',
  'X-Auto-Response-Suppress': 'All'
};

export const SUMMARY_UNAVAILABLE = '(summary unavailable)';

export interface DigestItem {
  subject: string;
  summary: string;
}

/**
 * Render an outgoing message to RFC 822 bytes for IMAP APPEND.
 */
export function renderMessage(message: OutgoingMessage): Promise<Buffer> {
  const composer = new MailComposer({
    from: message.from,
    to: message.to,
    subject: message.subject,
    html: message.html,
    text: message.text,
    date: message.date,
    inReplyTo: message.inReplyTo ? formatMessageId(message.inReplyTo) : undefined,
    references: message.references?.map(formatMessageId),
    headers: message.headers
  });

  return new Promise<Buffer>((resolve, reject) => {
    composer.compile().build((error: Error | null, buffer: Buffer) => {
      if (error) {
        reject(error);
      } else {
        resolve(buffer);
      }
    });
  });
}

export function prefixedSubject(prefix: string, subject: string): string {
  return `${prefix} ${subject}`.trim();
}

/**
 * The bilingual copy of `source`, threaded under it and tagged with its Message-ID.
 */
export function buildTranslationMessage(
  source: MailMessage,
  html: string,
  subjectPrefix: string,
  owner: string
): OutgoingMessage {
  const headers: Record<string, string> = { ...AUTOMATION_HEADERS };
  let references: string[] | undefined;

  if (source.messageId) {
    headers[LINKED_MESSAGE_HEADER] = formatMessageId(source.messageId);
    references = [...source.references.filter(id => id !== source.messageId), source.messageId];
  }

  return {
    subject: prefixedSubject(subjectPrefix, source.subject),
    from: source.from ? formatAddress(source.from.address, source.from.name) : owner,
    to: owner,
    html,
    date: source.date,
    inReplyTo: source.messageId,
    references,
    headers
  };
}

export function buildDigestMessage(
  folder: string,
  items: readonly DigestItem[],
  subjectPrefix: string,
  owner: string,
  date: Date
): OutgoingMessage {
  return {
    subject: `${subjectPrefix} ${folder} (${items.length})`,
    from: owner,
    to: owner,
    html: renderDigestHtml(items),
    date,
    headers: { ...AUTOMATION_HEADERS }
  };
}

export function renderDigestHtml(items: readonly DigestItem[]): string {
  const entries = items
    .map(item => {
      const summary = escapeHtml(item.summary.trim()).replace(/\r?\n/g, '<br>');
      return `<li><b>${escapeHtml(item.subject)}</b><br>${summary}</li>`;
    })
    .join('');
  return `<html><body><ol>${entries}</ol></body></html>`;
}

/**
 * Plain-text body to HTML paragraphs, one per blank-line separated block.
 */
export function textToHtml(text: string): string {
  const paragraphs = text
    .split(/\r?\n[ \t]*\r?\n/)
    .map(block => block.trim())
    .filter(block => block.length > 0)
    .map(block => `<p>${escapeHtml(block).replace(/\r?\n/g, '<br>\n')}</p>`);
  return `<html><body>${paragraphs.join('\n')}</body></html>`;
}

function formatAddress(address: string, name?: string): string {
  return name ? `"${name.replace(/["\\]/g, '')}" <${address}>` : address;
}
