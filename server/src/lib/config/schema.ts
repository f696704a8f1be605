import * as z from 'zod';
import { INJECTION_STRATEGIES } from '../injection/injection-engine';

const imapSchema = z.object({
  host: z.string().min(1, 'IMAP host is required'),
  port: z.number().int().min(1).max(65535, 'Invalid port number').default(993),
  secure: z.boolean().default(true),
  user: z.string().min(1, 'IMAP user is required'),
  password: z.string().min(1, 'IMAP password is required'),
  socketTimeoutMs: z.number().int().positive().default(60000)
});

const prefixSchema = z.object({
  translate: z.string().min(1).default('[Translated]'),
  summarize: z.string().min(1).default('[Summary]')
});

const llmSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'google', 'local']).default('local'),
  model: z.string().min(1).default('Qwen/Qwen2.5-7B-Instruct'),
  summarizerModel: z.string().min(1).optional(),
  apiKey: z.string().default(''),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
  requestTimeoutSeconds: z.number().positive().default(15),
  translateTimeoutSeconds: z.number().positive().optional(),
  summarizeTimeoutSeconds: z.number().positive().optional(),
  mock: z.boolean().default(false),
  promptFile: z.string().default('Prompt.txt'),
  targetLanguage: z.string().min(1).default('Simplified Chinese')
});

const dispatchSchema = z.object({
  concurrency: z.number().int().min(1).default(8),
  maxAttempts: z.number().int().min(1).default(3),
  requestsPerMinute: z.number().int().min(1).default(60),
  tokensPerMinute: z.number().int().min(1).default(100000),
  segmentTokens: z.number().int().min(16).default(1500)
});

const translateSchema = z.object({
  intervalMinutes: z.number().positive().default(10),
  initialDelayMinutes: z.number().min(0).default(1),
  folders: z.array(z.string().min(1)).default([]),
  /** Prepended to folder names that are not already under it or INBOX */
  folderRoot: z.string().default(''),
  inboxKeywords: z.array(z.string().min(1)).default([]),
  inboxFrom: z.array(z.string().min(1)).default([]),
  maxPerRunPerFolder: z.number().int().min(1).default(3),
  strategy: z.enum(INJECTION_STRATEGIES).default('immersion'),
  force: z.boolean().default(false),
  separator: z.string().default(' '),
  inlineTimeoutMs: z.number().int().positive().default(10000)
});

const summarizeSchema = z.object({
  cron: z.array(z.string().min(1)).default(['0 7 * * *', '0 12 * * *', '0 19 * * *']),
  folders: z.array(z.string().min(1)).default([]),
  batchSize: z.number().int().min(1).default(10),
  chunkTokens: z.number().int().min(16).default(8000),
  runAfterTranslate: z.boolean().default(false)
});

export const configSchema = z.object({
  imap: imapSchema,
  timezone: z.string().min(1).default('Asia/Shanghai'),
  prefix: prefixSchema.default({}),
  llm: llmSchema.default({}),
  dispatch: dispatchSchema.default({}),
  translate: translateSchema.default({}),
  summarize: summarizeSchema.default({})
});

export type MailroomConfig = z.infer<typeof configSchema>;
export type ImapConfig = MailroomConfig['imap'];
export type LlmConfig = MailroomConfig['llm'];
export type DispatchConfig = MailroomConfig['dispatch'];
export type TranslateConfig = MailroomConfig['translate'];
export type SummarizeConfig = MailroomConfig['summarize'];
