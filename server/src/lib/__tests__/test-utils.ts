import { Clock, TimerHandle } from '../clock';
import { LlmClient, LLMProviderError } from '../../types/llm-provider';
import { parsePrompt } from '../dispatch/prompts';
import {
  AppendOptions,
  MailboxClient,
  MailboxConnectionError,
  MailMessage,
  OutgoingMessage
} from '../mailbox/types';
import { StyleInliner } from '../injection/style-inliner';

/**
 * Let every pending promise callback run. Uses the real setImmediate, so it works
 * while the code under test runs on a ManualClock.
 */
export function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

interface PendingTimer {
  at: number;
  seq: number;
  callback: () => void;
  cancelled: boolean;
}

/**
 * Clock that only moves when a test calls advance().
 */
export class ManualClock implements Clock {
  private current: number;
  private seq = 0;
  private timers: PendingTimer[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const timer: PendingTimer = { at: this.current + Math.max(0, delayMs), seq: this.seq++, callback, cancelled: false };
    this.timers.push(timer);
    return { cancel: () => { timer.cancelled = true; } };
  }

  sleep(delayMs: number): Promise<void> {
    return new Promise(resolve => {
      this.setTimer(resolve, delayMs);
    });
  }

  get pendingTimers(): number {
    return this.timers.filter(timer => !timer.cancelled).length;
  }

  /**
   * Move time forward, firing due timers in order and settling promises after each one.
   */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    await flushPromises();

    for (;;) {
      this.timers = this.timers.filter(timer => !timer.cancelled);
      const due = this.timers
        .filter(timer => timer.at <= target)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (!due) {
        break;
      }
      this.timers = this.timers.filter(timer => timer !== due);
      this.current = Math.max(this.current, due.at);
      due.callback();
      await flushPromises();
    }

    this.current = target;
    await flushPromises();
  }
}

export interface ScriptedCall {
  prompt: string;
  text: string;
}

export type ScriptedReply = string | LLMProviderError | ((text: string) => string | LLMProviderError);

/**
 * LlmClient whose answers come from a script keyed by source text.
 * Unscripted text is answered with `fallback(text)`.
 */
export class ScriptedLlmClient implements LlmClient {
  readonly calls: ScriptedCall[] = [];
  private readonly replies = new Map<string, ScriptedReply[]>();

  constructor(private readonly fallback: (text: string) => string = text => `<<${text}>>`) {}

  /**
   * Queue replies for one source text; the last one repeats once the queue runs dry.
   */
  script(text: string, ...replies: ScriptedReply[]): this {
    this.replies.set(text, replies);
    return this;
  }

  async complete(prompt: string, _timeoutSeconds: number): Promise<string> {
    const { text } = parsePrompt(prompt);
    this.calls.push({ prompt, text });

    const queue = this.replies.get(text);
    let reply: ScriptedReply = this.fallback;
    if (queue && queue.length > 0) {
      reply = queue.length > 1 ? queue.shift() ?? this.fallback : queue[0];
    }

    const resolved = typeof reply === 'function' ? reply(text) : reply;
    if (resolved instanceof LLMProviderError) {
      throw resolved;
    }
    return resolved;
  }

  callsFor(text: string): number {
    return this.calls.filter(call => call.text === text).length;
  }
}

export class PassthroughInliner implements StyleInliner {
  async inline(html: string): Promise<string> {
    return html;
  }
}

export interface StoredMessage {
  message: MailMessage;
  outgoing?: OutgoingMessage;
}

export interface AppendedMessage {
  folder: string;
  message: OutgoingMessage;
  options: AppendOptions;
}

let nextUid = 1;

export function buildMail(overrides: Partial<MailMessage> & { folder: string }): MailMessage {
  const uid = overrides.uid ?? nextUid++;
  return {
    uid,
    messageId: `msg-${uid}@example.test`,
    subject: `Subject ${uid}`,
    from: { name: 'Newsletter', address: 'news@example.test' },
    to: [{ address: 'owner@example.test' }],
    date: new Date(Date.UTC(2024, 0, 1)),
    seen: false,
    references: [],
    ...overrides
  };
}

/**
 * In-process mailbox. Appended messages become real entries of the folder, so a second
 * run sees what the first one wrote.
 */
export class InMemoryMailbox implements MailboxClient {
  readonly appended: AppendedMessage[] = [];
  readonly seenLog: string[] = [];
  connects = 0;
  closes = 0;
  failConnect = false;
  failMarkSeen = false;
  private readonly folders = new Map<string, Map<number, StoredMessage>>();
  private uidCounter = 1000;

  add(message: MailMessage): this {
    this.folder(message.folder).set(message.uid, { message });
    return this;
  }

  get(folder: string, uid: number): MailMessage | undefined {
    return this.folders.get(folder)?.get(uid)?.message;
  }

  async connect(): Promise<void> {
    this.connects++;
    if (this.failConnect) {
      throw new MailboxConnectionError('connection refused');
    }
  }

  async listUnread(folder: string): Promise<number[]> {
    return [...this.folder(folder).values()]
      .filter(entry => !entry.message.seen)
      .map(entry => entry.message.uid)
      .sort((a, b) => a - b);
  }

  async fetch(folder: string, uid: number): Promise<MailMessage> {
    const entry = this.folder(folder).get(uid);
    if (!entry) {
      throw new Error(`No message ${folder}/${uid}`);
    }
    return entry.message;
  }

  async append(folder: string, message: OutgoingMessage, options: AppendOptions): Promise<void> {
    this.appended.push({ folder, message, options });
    const uid = ++this.uidCounter;
    const stored: MailMessage = {
      folder,
      uid,
      messageId: `generated-${uid}@example.test`,
      subject: message.subject,
      to: [],
      html: message.html,
      date: message.date ?? new Date(0),
      seen: !options.forceUnread,
      autoSubmitted: message.headers['Auto-Submitted'],
      inReplyTo: message.inReplyTo,
      references: message.references ?? []
    };
    this.folder(folder).set(uid, { message: stored, outgoing: message });
  }

  async markSeen(folder: string, uid: number): Promise<void> {
    if (this.failMarkSeen) {
      throw new Error('STORE failed');
    }
    const entry = this.folder(folder).get(uid);
    if (entry) {
      entry.message = { ...entry.message, seen: true };
      this.seenLog.push(`${folder}/${uid}`);
    }
  }

  async hasLinkedMessage(folder: string, sourceMessageId: string, subjectPrefix: string): Promise<boolean> {
    for (const entry of this.folder(folder).values()) {
      const linked = entry.outgoing?.headers['X-Linked-Message-Id'];
      if (entry.message.subject.includes(subjectPrefix) && linked === `<${sourceMessageId}>`) {
        return true;
      }
    }
    return false;
  }

  async close(): Promise<void> {
    this.closes++;
  }

  private folder(name: string): Map<number, StoredMessage> {
    let folder = this.folders.get(name);
    if (!folder) {
      folder = new Map();
      this.folders.set(name, folder);
    }
    return folder;
  }
}
