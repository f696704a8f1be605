import { InjectionEngine, InjectionStrategy, TextLeaf } from '../injection/injection-engine';
import { StyleInliner, inlineStylesOrOriginal } from '../injection/style-inliner';
import { DispatchRequest, RateLimitedDispatcher } from '../dispatch/rate-limited-dispatcher';
import { buildTranslationPrompt } from '../dispatch/prompts';
import { segmentText } from '../text/segmenter';
import { MailboxClient, MailboxConnectionError, MailMessage } from '../mailbox/types';
import { buildTranslationMessage, textToHtml } from '../mailbox/message-composer';
import { describeMessage, matchesInboxChannel, passesPrefixFilter, resolveFolder } from './message-filter';
import { JobReport, MailboxFactory, closeQuietly, emptyReport, errorMessage, formatReport } from './types';

export interface TranslateJobSettings {
  folders: readonly string[];
  folderRoot: string;
  inboxKeywords: readonly string[];
  inboxFrom: readonly string[];
  maxPerRunPerFolder: number;
  strategy: InjectionStrategy;
  /** Translate even when a linked translation already exists */
  force: boolean;
  targetLanguage: string;
  segmentTokens: number;
  /** Subject prefix of generated translations */
  translatePrefix: string;
  /** Every prefix of generated mail; such subjects are never picked up */
  excludedPrefixes: readonly string[];
  /** Address generated mail is sent to and from */
  owner: string;
}

export interface TranslateJobDependencies {
  openMailbox: MailboxFactory;
  dispatcher: RateLimitedDispatcher;
  engine: InjectionEngine;
  inliner: StyleInliner;
}

export interface TranslateRunOptions {
  /** Scan only this folder (the INBOX channel filter does not apply) */
  folder?: string;
  /** Overrides maxPerRunPerFolder */
  limit?: number;
}

/**
 * One translate run: scan unread mail, build a bilingual copy of each selected message,
 * append it next to the source and mark the source seen.
 */
export class TranslateJob {
  constructor(
    private readonly settings: TranslateJobSettings,
    private readonly deps: TranslateJobDependencies
  ) {}

  async run(options: TranslateRunOptions = {}): Promise<JobReport> {
    const report = emptyReport();
    const mailbox = this.deps.openMailbox();
    console.log('[TranslateJob] Run started');

    await mailbox.connect();
    try {
      for await (const message of this.scanTargets(mailbox, report, options)) {
        report.processed++;
        try {
          await this.processMessage(mailbox, message, report);
        } catch (error: unknown) {
          if (error instanceof MailboxConnectionError) {
            throw error;
          }
          report.failed++;
          console.error(`[TranslateJob] Failed to translate ${describeMessage(message)}:`, errorMessage(error));
        }
      }
    } finally {
      await closeQuietly(mailbox);
    }

    console.log(`[TranslateJob] Run finished: ${formatReport(report)}`);
    return report;
  }

  private async *scanTargets(
    mailbox: MailboxClient,
    report: JobReport,
    options: TranslateRunOptions
  ): AsyncGenerator<MailMessage> {
    const cap = options.limit ?? this.settings.maxPerRunPerFolder;
    const visited = new Set<string>();

    const channels: Array<{ folder: string; inboxChannel: boolean }> = options.folder
      ? [{ folder: options.folder, inboxChannel: false }]
      : this.settings.folders.map(folder => ({
          folder: resolveFolder(folder, this.settings.folderRoot),
          inboxChannel: false
        }));

    const hasInboxChannel = this.settings.inboxKeywords.length > 0 || this.settings.inboxFrom.length > 0;
    if (!options.folder && hasInboxChannel) {
      channels.push({ folder: 'INBOX', inboxChannel: true });
    }

    for (const { folder, inboxChannel } of channels) {
      console.log(`[TranslateJob] Scanning ${folder}${inboxChannel ? ' (keyword channel)' : ''}`);
      let uids: number[];
      try {
        uids = await mailbox.listUnread(folder);
      } catch (error: unknown) {
        if (error instanceof MailboxConnectionError) {
          throw error;
        }
        console.error(`[TranslateJob] Could not scan ${folder}:`, errorMessage(error));
        continue;
      }
      let picked = 0;

      for (const uid of uids) {
        if (picked >= cap) {
          break;
        }
        const location = `${folder}/${uid}`;
        if (visited.has(location)) {
          continue;
        }
        visited.add(location);

        let message: MailMessage;
        try {
          message = await mailbox.fetch(folder, uid);
        } catch (error: unknown) {
          if (error instanceof MailboxConnectionError) {
            throw error;
          }
          report.failed++;
          console.error(`[TranslateJob] Could not fetch ${location}:`, errorMessage(error));
          continue;
        }

        if (!passesPrefixFilter(message.subject, this.settings.excludedPrefixes)) {
          continue;
        }
        if (inboxChannel && !matchesInboxChannel(message, this.settings.inboxKeywords, this.settings.inboxFrom)) {
          continue;
        }

        picked++;
        yield message;
      }
    }
  }

  private async processMessage(mailbox: MailboxClient, message: MailMessage, report: JobReport): Promise<void> {
    const label = describeMessage(message);
    const body = message.html ?? (message.text ? textToHtml(message.text) : undefined);

    if (!body || body.trim().length === 0) {
      console.log(`[TranslateJob] Empty body, marking seen: ${label}`);
      await mailbox.markSeen(message.folder, message.uid);
      report.skipped++;
      return;
    }

    if (
      !this.settings.force &&
      message.messageId &&
      (await mailbox.hasLinkedMessage(message.folder, message.messageId, this.settings.translatePrefix))
    ) {
      console.log(`[TranslateJob] Already translated, marking seen: ${label}`);
      await mailbox.markSeen(message.folder, message.uid);
      report.skipped++;
      return;
    }

    const html = await inlineStylesOrOriginal(this.deps.inliner, body);
    const leaves = this.deps.engine.collect(html, this.settings.strategy);
    const translations = await this.translateLeaves(leaves);
    const injected = this.deps.engine.inject(html, translations, this.settings.strategy);

    console.log(
      `[TranslateJob] ${label}: ${injected.translated}/${leaves.length} leaves translated, ${injected.skipped} left as is`
    );

    const outgoing = buildTranslationMessage(message, injected.html, this.settings.translatePrefix, this.settings.owner);
    await mailbox.append(message.folder, outgoing, { forceUnread: true });
    report.appended++;

    try {
      await mailbox.markSeen(message.folder, message.uid);
    } catch (error: unknown) {
      // The translation is already stored; the next run finds the link and only marks seen
      console.warn(`[TranslateJob] Appended but could not mark seen ${label}:`, errorMessage(error));
    }
  }

  /**
   * Leaves over the segment budget are split; a split leaf counts as translated only when
   * every piece came back.
   */
  private async translateLeaves(leaves: readonly TextLeaf[]): Promise<Map<string, string>> {
    const requests: DispatchRequest[] = [];
    const pieces = new Map<string, string[]>();

    for (const leaf of leaves) {
      const segments = [...segmentText(leaf.text, this.settings.segmentTokens, leaf.key)];
      if (segments.length <= 1) {
        requests.push({ key: leaf.key, text: leaf.text });
        pieces.set(leaf.key, [leaf.key]);
        continue;
      }

      const keys: string[] = [];
      for (const segment of segments) {
        const text = segment.text.trim();
        if (text.length > 0) {
          requests.push({ key: segment.key, text });
          keys.push(segment.key);
        }
      }
      pieces.set(leaf.key, keys);
    }

    const translations = new Map<string, string>();
    if (requests.length === 0) {
      return translations;
    }

    const { targetLanguage } = this.settings;
    const report = await this.deps.dispatcher.dispatch(requests, text => buildTranslationPrompt(text, targetLanguage));

    for (const [leafKey, keys] of pieces) {
      const parts = keys.map(key => report.results.get(key)?.text);
      if (parts.length > 0 && parts.every((part): part is string => part !== undefined)) {
        translations.set(leafKey, parts.join(' '));
      }
    }

    if (report.failed > 0) {
      console.warn(`[TranslateJob] ${report.failed}/${requests.length} segments failed after retries`);
    }
    return translations;
  }
}
