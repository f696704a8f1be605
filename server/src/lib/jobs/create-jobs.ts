import { MailroomConfig } from '../config/schema';
import { readPromptFile } from '../config/load-config';
import { Clock, systemClock } from '../clock';
import { LlmClient } from '../../types/llm-provider';
import { AiSdkLlmClient } from '../llm-client';
import { MockLlmClient } from '../mock-llm-client';
import { TokenBucket } from '../dispatch/token-bucket';
import { RateLimitedDispatcher } from '../dispatch/rate-limited-dispatcher';
import { DEFAULT_SUMMARY_INSTRUCTIONS } from '../dispatch/prompts';
import { InjectionEngine } from '../injection/injection-engine';
import { JuiceStyleInliner, StyleInliner } from '../injection/style-inliner';
import { ImapMailbox } from '../mailbox/imap-mailbox';
import { JobDefinition } from '../scheduler/scheduler-orchestrator';
import { TranslateJob } from './translate-job';
import { SummarizeJob } from './summarize-job';
import { MailboxFactory } from './types';

export interface JobOverrides {
  clock?: Clock;
  openMailbox?: MailboxFactory;
  /** Used for both translation and summaries */
  llm?: LlmClient;
  inliner?: StyleInliner;
  now?: () => Date;
  /** Directory the prompt file is resolved against */
  baseDir?: string;
}

export interface MailroomJobs {
  translate: TranslateJob;
  summarize: SummarizeJob;
  /** Shared by both jobs' dispatchers */
  bucket: TokenBucket;
  openMailbox: MailboxFactory;
}

export const TRANSLATE_JOB_ID = 'translate';
export const SUMMARIZE_JOB_ID = 'summarize';

const MINUTE_MS = 60_000;

export function createLlmClient(config: MailroomConfig, modelName: string): LlmClient {
  if (config.llm.mock) {
    return new MockLlmClient();
  }
  return new AiSdkLlmClient({
    name: config.llm.provider,
    type: config.llm.provider,
    apiKey: config.llm.apiKey,
    apiEndpoint: config.llm.baseUrl,
    modelName,
    temperature: config.llm.temperature
  });
}

/**
 * Wire both jobs from configuration. One token bucket covers every LLM call the
 * process makes, whichever job issues it.
 */
export function createJobs(config: MailroomConfig, overrides: JobOverrides = {}): MailroomJobs {
  const clock = overrides.clock ?? systemClock;
  const owner = config.imap.user;
  const excludedPrefixes = [config.prefix.translate, config.prefix.summarize];

  const openMailbox: MailboxFactory = overrides.openMailbox ?? (() => new ImapMailbox({
    host: config.imap.host,
    port: config.imap.port,
    secure: config.imap.secure,
    user: config.imap.user,
    password: config.imap.password,
    socketTimeoutMs: config.imap.socketTimeoutMs
  }));

  const bucket = new TokenBucket(
    {
      requestsPerMinute: config.dispatch.requestsPerMinute,
      tokensPerMinute: config.dispatch.tokensPerMinute
    },
    clock
  );

  const translator = overrides.llm ?? createLlmClient(config, config.llm.model);
  const summarizer = overrides.llm ?? createLlmClient(config, config.llm.summarizerModel ?? config.llm.model);

  const dispatcherFor = (llm: LlmClient, timeoutSeconds: number | undefined) =>
    new RateLimitedDispatcher(llm, bucket, {
      concurrency: config.dispatch.concurrency,
      maxAttempts: config.dispatch.maxAttempts,
      timeoutSeconds: timeoutSeconds ?? config.llm.requestTimeoutSeconds
    });

  const translate = new TranslateJob(
    {
      folders: config.translate.folders,
      folderRoot: config.translate.folderRoot,
      inboxKeywords: config.translate.inboxKeywords,
      inboxFrom: config.translate.inboxFrom,
      maxPerRunPerFolder: config.translate.maxPerRunPerFolder,
      strategy: config.translate.strategy,
      force: config.translate.force,
      targetLanguage: config.llm.targetLanguage,
      segmentTokens: config.dispatch.segmentTokens,
      translatePrefix: config.prefix.translate,
      excludedPrefixes,
      owner
    },
    {
      openMailbox,
      dispatcher: dispatcherFor(translator, config.llm.translateTimeoutSeconds),
      engine: new InjectionEngine({ separator: config.translate.separator }),
      inliner: overrides.inliner ?? new JuiceStyleInliner({ timeoutMs: config.translate.inlineTimeoutMs }, clock)
    }
  );

  const instructions =
    readPromptFile(config.llm.promptFile, overrides.baseDir ?? process.cwd()) ?? DEFAULT_SUMMARY_INSTRUCTIONS;

  const summarize = new SummarizeJob(
    {
      folders: config.summarize.folders,
      batchSize: config.summarize.batchSize,
      chunkTokens: config.summarize.chunkTokens,
      instructions,
      targetLanguage: config.llm.targetLanguage,
      summarizePrefix: config.prefix.summarize,
      excludedPrefixes,
      owner
    },
    {
      openMailbox,
      dispatcher: dispatcherFor(summarizer, config.llm.summarizeTimeoutSeconds),
      now: overrides.now
    }
  );

  return { translate, summarize, bucket, openMailbox };
}

/**
 * Translate on a fixed delay; summarize on its cron lines (or right after each translate)
 * with a warm-up run at startup.
 */
export function buildJobSchedule(config: MailroomConfig, jobs: MailroomJobs): JobDefinition[] {
  return [
    {
      id: TRANSLATE_JOB_ID,
      trigger: {
        kind: 'fixed-delay',
        intervalMs: config.translate.intervalMinutes * MINUTE_MS,
        initialDelayMs: config.translate.initialDelayMinutes * MINUTE_MS
      },
      run: () => jobs.translate.run()
    },
    {
      id: SUMMARIZE_JOB_ID,
      trigger: { kind: 'cron', expression: config.summarize.cron, timezone: config.timezone },
      run: () => jobs.summarize.run(),
      fireOnStart: true,
      runAfter: config.summarize.runAfterTranslate ? TRANSLATE_JOB_ID : undefined
    }
  ];
}
