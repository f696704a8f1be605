import { MailMessage } from '../mailbox/types';

/**
 * False when the subject carries one of our own prefixes, so generated mail is never
 * picked up again.
 */
export function passesPrefixFilter(subject: string, excludedPrefixes: readonly string[]): boolean {
  if (!subject) {
    return true;
  }
  return !excludedPrefixes.some(prefix => prefix.length > 0 && subject.includes(prefix));
}

/**
 * INBOX is only translated for matching newsletters: a subject keyword or a sender fragment.
 */
export function matchesInboxChannel(
  message: MailMessage,
  keywords: readonly string[],
  senders: readonly string[]
): boolean {
  if (keywords.some(keyword => message.subject.includes(keyword))) {
    return true;
  }

  const sender = message.from ? `${message.from.name ?? ''} <${message.from.address}>`.toLowerCase() : '';
  return sender.length > 0 && senders.some(fragment => sender.includes(fragment.toLowerCase()));
}

/**
 * Short folder names live under `root`; INBOX and names already under it are left alone.
 */
export function resolveFolder(folder: string, root: string): string {
  if (!root || folder.toUpperCase().startsWith('INBOX') || folder.startsWith(root)) {
    return folder;
  }
  return `${root}${folder}`;
}

export function describeMessage(message: MailMessage): string {
  return `"${message.subject}" (${message.folder}/${message.uid})`;
}
