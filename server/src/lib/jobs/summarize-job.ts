import { RateLimitedDispatcher } from '../dispatch/rate-limited-dispatcher';
import { buildSummaryPrompt } from '../dispatch/prompts';
import { bodyToPlainText, segmentText } from '../text/segmenter';
import { MailboxClient, MailboxConnectionError, MailMessage } from '../mailbox/types';
import { DigestItem, SUMMARY_UNAVAILABLE, buildDigestMessage } from '../mailbox/message-composer';
import { processBatch } from '../utils/batch-processor';
import { describeMessage, passesPrefixFilter } from './message-filter';
import { JobReport, MailboxFactory, closeQuietly, emptyReport, errorMessage, formatReport } from './types';

export interface SummarizeJobSettings {
  folders: readonly string[];
  batchSize: number;
  chunkTokens: number;
  instructions: string;
  targetLanguage: string;
  summarizePrefix: string;
  excludedPrefixes: readonly string[];
  owner: string;
}

export interface SummarizeJobDependencies {
  openMailbox: MailboxFactory;
  dispatcher: RateLimitedDispatcher;
  now?: () => Date;
}

export interface SummarizeRunOptions {
  folder?: string;
  limit?: number;
}

interface SummarizedMessage {
  message: MailMessage;
  summary: string;
}

/**
 * One summarize run: every unread message of each folder is summarized chunk by chunk, and
 * the summaries are appended back as numbered digests of `batchSize` messages. Sources are
 * marked seen once the digest holding them is stored.
 */
export class SummarizeJob {
  constructor(
    private readonly settings: SummarizeJobSettings,
    private readonly deps: SummarizeJobDependencies
  ) {}

  async run(options: SummarizeRunOptions = {}): Promise<JobReport> {
    const report = emptyReport();
    const mailbox = this.deps.openMailbox();
    const folders = options.folder ? [options.folder] : this.settings.folders;
    console.log('[SummarizeJob] Run started');

    await mailbox.connect();
    try {
      for (const folder of folders) {
        await this.summarizeFolder(mailbox, folder, report, options.limit);
      }
    } finally {
      await closeQuietly(mailbox);
    }

    console.log(`[SummarizeJob] Run finished: ${formatReport(report)}`);
    return report;
  }

  private async summarizeFolder(
    mailbox: MailboxClient,
    folder: string,
    report: JobReport,
    limit: number | undefined
  ): Promise<void> {
    console.log(`[SummarizeJob] Scanning ${folder}`);
    const summarized: SummarizedMessage[] = [];

    let uids: number[];
    try {
      uids = await mailbox.listUnread(folder);
    } catch (error: unknown) {
      rethrowConnectionError(error);
      console.error(`[SummarizeJob] Could not scan ${folder}:`, errorMessage(error));
      return;
    }

    for (const uid of uids) {
      if (limit !== undefined && summarized.length >= limit) {
        break;
      }

      try {
        const message = await mailbox.fetch(folder, uid);
        if (!passesPrefixFilter(message.subject, this.settings.excludedPrefixes)) {
          continue;
        }
        report.processed++;

        const plain = bodyToPlainText(message);
        if (!plain) {
          console.log(`[SummarizeJob] Empty body, marking seen: ${describeMessage(message)}`);
          await mailbox.markSeen(folder, uid);
          report.skipped++;
          continue;
        }

        summarized.push({ message, summary: await this.summarize(plain, uid) });
      } catch (error: unknown) {
        rethrowConnectionError(error);
        report.failed++;
        console.error(`[SummarizeJob] Failed to summarize ${folder}/${uid}:`, errorMessage(error));
      }
    }

    const now = this.deps.now ?? (() => new Date());
    const outcome = await processBatch(summarized, this.settings.batchSize, async batch => {
      const items: DigestItem[] = batch.map(({ message, summary }) => ({ subject: message.subject, summary }));
      const digest = buildDigestMessage(folder, items, this.settings.summarizePrefix, this.settings.owner, now());

      await mailbox.append(folder, digest, { forceUnread: true });
      report.appended++;
      console.log(`[SummarizeJob] Appended digest: ${digest.subject}`);

      for (const { message } of batch) {
        try {
          await mailbox.markSeen(folder, message.uid);
        } catch (error: unknown) {
          rethrowConnectionError(error);
          console.warn(`[SummarizeJob] Digest stored but could not mark seen ${describeMessage(message)}:`, errorMessage(error));
        }
      }
      return batch.length;
    }, isConnectionError);

    for (const failure of outcome.failed) {
      const size = Math.min(this.settings.batchSize, summarized.length - failure.index * this.settings.batchSize);
      report.failed += size;
      console.error(`[SummarizeJob] Digest ${failure.index + 1} for ${folder} not stored: ${failure.error}`);
    }
  }

  private async summarize(plain: string, uid: number): Promise<string> {
    const chunks = [...segmentText(plain, this.settings.chunkTokens, `msg-${uid}`)];
    const { instructions, targetLanguage } = this.settings;

    const dispatched = await this.deps.dispatcher.dispatch(
      chunks.map(chunk => ({ key: chunk.key, text: chunk.text })),
      text => buildSummaryPrompt(instructions, targetLanguage, text)
    );

    return chunks
      .map(chunk => dispatched.results.get(chunk.key)?.text ?? SUMMARY_UNAVAILABLE)
      .join('\n\n');
  }
}

function isConnectionError(error: unknown): boolean {
  return error instanceof MailboxConnectionError;
}

function rethrowConnectionError(error: unknown): void {
  if (isConnectionError(error)) {
    throw error;
  }
}
