import fs from 'fs';
import path from 'path';
import * as z from 'zod';
import { configSchema, MailroomConfig } from './schema';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type SecretEnv = Partial<Record<'IMAP_PASSWORD' | 'LLM_API_KEY', string>>;

/**
 * Validate a parsed config object. Secrets from the environment fill in (and win over)
 * the matching fields, so config.json can be committed without them.
 */
export function parseConfig(raw: unknown, env: SecretEnv = process.env): MailroomConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const merged = withSecrets(raw, env);
  const result = configSchema.safeParse(merged);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }

  return result.data;
}

export function loadConfig(configPath: string, env: SecretEnv = process.env): MailroomConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file ${path.basename(configPath)} is not valid JSON: ${reason}`);
  }

  return parseConfig(raw, env);
}

/**
 * Summary instructions from the prompt file, or undefined when there is none.
 */
export function readPromptFile(promptFile: string, baseDir: string): string | undefined {
  const fullPath = path.resolve(baseDir, promptFile);
  if (!fs.existsSync(fullPath)) {
    return undefined;
  }
  const text = fs.readFileSync(fullPath, 'utf8').trim();
  return text.length > 0 ? text : undefined;
}

function withSecrets(raw: object, env: SecretEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  if (env.IMAP_PASSWORD) {
    merged.imap = { ...sectionOf(merged.imap), password: env.IMAP_PASSWORD };
  }
  if (env.LLM_API_KEY) {
    merged.llm = { ...sectionOf(merged.llm), apiKey: env.LLM_API_KEY };
  }

  return merged;
}

function sectionOf(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
