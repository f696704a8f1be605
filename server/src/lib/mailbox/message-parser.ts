import { AddressObject, HeaderValue, ParsedMail, simpleParser } from 'mailparser';
import { MailAddress, MailMessage } from './types';
import { normalizeMessageId, parseMessageIdList } from './message-id';

export interface MessageLocation {
  folder: string;
  uid: number;
  seen: boolean;
  /** Server arrival time, used when the Date header is missing */
  internalDate?: Date;
}

export async function parseRawMessage(raw: string | Buffer, location: MessageLocation): Promise<MailMessage> {
  const parsedMail = await simpleParser(raw);
  return fromParsedMail(parsedMail, location);
}

export function fromParsedMail(parsedMail: ParsedMail, location: MessageLocation): MailMessage {
  const html = parsedMail.html || undefined;
  const text = parsedMail.text && parsedMail.text.trim().length > 0 ? parsedMail.text : undefined;

  return {
    folder: location.folder,
    uid: location.uid,
    messageId: normalizeMessageId(parsedMail.messageId),
    subject: parsedMail.subject ?? '',
    from: firstAddress(parsedMail.from),
    to: addressList(parsedMail.to),
    html,
    text,
    date: parsedMail.date ?? location.internalDate ?? new Date(0),
    seen: location.seen,
    autoSubmitted: headerText(parsedMail.headers.get('auto-submitted'))?.toLowerCase(),
    inReplyTo: normalizeMessageId(parsedMail.inReplyTo),
    references: parseMessageIdList(parsedMail.references)
  };
}

function firstAddress(field: AddressObject | undefined): MailAddress | undefined {
  return addressList(field)[0];
}

// To is optional per RFC 5322 (Bcc-only mail)
function addressList(field: AddressObject | AddressObject[] | undefined): MailAddress[] {
  if (!field) {
    return [];
  }
  const objects = Array.isArray(field) ? field : [field];
  return objects.flatMap(obj =>
    obj.value.flatMap(entry => (entry.address ? [{ name: entry.name || undefined, address: entry.address }] : []))
  );
}

function headerText(value: HeaderValue | undefined): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value[0];
  }
  if (value && typeof value === 'object' && 'value' in value && typeof value.value === 'string') {
    return value.value;
  }
  return undefined;
}
