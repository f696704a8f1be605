/**
 * Message IDs are kept without angle brackets and wrapped again only when written into headers.
 */

export function normalizeMessageId(messageId: string | undefined): string | undefined {
  if (!messageId) return undefined;
  const trimmed = messageId.trim().replace(/^<|>$/g, '');
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Split a References / In-Reply-To value ("<a@x> <b@y>") into bare IDs.
 */
export function parseMessageIdList(value: string | string[] | undefined): string[] {
  if (!value) return [];
  const raw = Array.isArray(value) ? value.join(' ') : value;
  return raw
    .split(/[\s,]+/)
    .map(token => normalizeMessageId(token))
    .filter((id): id is string => id !== undefined);
}

export function formatMessageId(messageId: string): string {
  return `<${messageId.replace(/^<|>$/g, '')}>`;
}
