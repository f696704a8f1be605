export interface MailAddress {
  name?: string;
  address: string;
}

/**
 * Immutable snapshot of one mailbox entry. `folder` + `uid` locate it on the server.
 */
export interface MailMessage {
  readonly folder: string;
  readonly uid: number;
  /** Without angle brackets */
  readonly messageId?: string;
  readonly subject: string;
  readonly from?: MailAddress;
  readonly to: readonly MailAddress[];
  readonly html?: string;
  readonly text?: string;
  readonly date: Date;
  readonly seen: boolean;
  /** Raw Auto-Submitted header value, lower-cased */
  readonly autoSubmitted?: string;
  readonly inReplyTo?: string;
  readonly references: readonly string[];
}

export interface OutgoingMessage {
  subject: string;
  from: string;
  to: string;
  html: string;
  text?: string;
  date?: Date;
  inReplyTo?: string;
  references?: string[];
  headers: Record<string, string>;
}

export interface AppendOptions {
  /** Leave the appended copy without \Seen so it shows up as new */
  forceUnread: boolean;
}

/**
 * Narrow view of the mailbox the jobs depend on.
 * `append` is atomic (one IMAP APPEND); a `markSeen` failure never undoes it.
 */
export interface MailboxClient {
  connect(): Promise<void>;
  /** Unread UIDs, oldest first */
  listUnread(folder: string): Promise<number[]>;
  fetch(folder: string, uid: number): Promise<MailMessage>;
  append(folder: string, message: OutgoingMessage, options: AppendOptions): Promise<void>;
  markSeen(folder: string, uid: number): Promise<void>;
  /** True when a message titled with `subjectPrefix` already links back to `sourceMessageId` */
  hasLinkedMessage(folder: string, sourceMessageId: string, subjectPrefix: string): Promise<boolean>;
  close(): Promise<void>;
}

export class MailboxConnectionError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'MailboxConnectionError';
  }
}
