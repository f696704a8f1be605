import { ImapFlow } from 'imapflow';
import { AppendOptions, MailboxClient, MailboxConnectionError, MailMessage, OutgoingMessage } from './types';
import { parseRawMessage } from './message-parser';
import { renderMessage, LINKED_MESSAGE_HEADER } from './message-composer';
import { formatMessageId } from './message-id';

export interface ImapSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  socketTimeoutMs?: number;
}

/**
 * MailboxClient over one ImapFlow connection. Every folder operation takes the
 * mailbox lock, so calls from concurrent jobs are serialized by imapflow.
 */
export class ImapMailbox implements MailboxClient {
  private client: ImapFlow | null = null;

  constructor(private readonly settings: ImapSettings) {}

  async connect(): Promise<void> {
    if (this.client?.usable) {
      return;
    }

    const client = new ImapFlow({
      host: this.settings.host,
      port: this.settings.port,
      secure: this.settings.secure,
      logger: false,
      socketTimeout: this.settings.socketTimeoutMs ?? 60000,
      auth: {
        user: this.settings.user,
        pass: this.settings.password
      }
    });

    client.on('error', (error: Error) => {
      console.error('[ImapMailbox] Connection error:', error.message);
    });

    try {
      await client.connect();
    } catch (error: unknown) {
      throw new MailboxConnectionError(
        `Failed to connect to ${this.settings.host}:${this.settings.port}: ${errorMessage(error)}`,
        error
      );
    }

    this.client = client;
    console.log(`[ImapMailbox] Connected to ${this.settings.host} as ${this.settings.user}`);
  }

  async listUnread(folder: string): Promise<number[]> {
    return this.withFolder(folder, async client => {
      const result = await client.search({ seen: false }, { uid: true });
      const uids = Array.isArray(result) ? result : [];
      return [...uids].sort((a, b) => a - b);
    });
  }

  async fetch(folder: string, uid: number): Promise<MailMessage> {
    const message = await this.withFolder(folder, client =>
      client.fetchOne(String(uid), { source: true, flags: true, internalDate: true }, { uid: true })
    );

    if (!message || !message.source) {
      throw new Error(`Message ${folder}/${uid} not found`);
    }

    const internalDate = message.internalDate ? new Date(message.internalDate) : undefined;
    return parseRawMessage(message.source, {
      folder,
      uid,
      seen: message.flags?.has('\\Seen') ?? false,
      internalDate
    });
  }

  async append(folder: string, message: OutgoingMessage, options: AppendOptions): Promise<void> {
    const raw = await renderMessage(message);
    const client = this.requireClient();
    const flags = options.forceUnread ? [] : ['\\Seen'];
    await client.append(folder, raw, flags, message.date);
  }

  async markSeen(folder: string, uid: number): Promise<void> {
    await this.withFolder(folder, client => client.messageFlagsAdd(String(uid), ['\\Seen'], { uid: true }));
  }

  async hasLinkedMessage(folder: string, sourceMessageId: string, subjectPrefix: string): Promise<boolean> {
    const id = formatMessageId(sourceMessageId);
    return this.withFolder(folder, async client => {
      const result = await client.search(
        {
          subject: subjectPrefix,
          or: [{ header: { [LINKED_MESSAGE_HEADER.toLowerCase()]: id } }, { header: { 'in-reply-to': id } }]
        },
        { uid: true }
      );
      return Array.isArray(result) && result.length > 0;
    });
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.logout();
    } finally {
      this.client = null;
    }
  }

  private requireClient(): ImapFlow {
    if (!this.client || !this.client.usable) {
      throw new MailboxConnectionError('IMAP connection is not open');
    }
    return this.client;
  }

  private async withFolder<T>(folder: string, operation: (client: ImapFlow) => Promise<T>): Promise<T> {
    const client = this.requireClient();
    const lock = await client.getMailboxLock(folder);
    try {
      return await operation(client);
    } finally {
      lock.release();
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
