import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, loadConfig, parseConfig, readPromptFile } from '../load-config';

const MINIMAL = {
  imap: { host: 'imap.example.test', user: 'owner@example.test' }
};

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('parseConfig', () => {
  it('should fill defaults around the required fields', () => {
    const config = parseConfig(MINIMAL, { IMAP_PASSWORD: 'test-secret' });

    expect(config.imap).toEqual({
      host: 'imap.example.test',
      port: 993,
      secure: true,
      user: 'owner@example.test',
      password: 'test-secret',
      socketTimeoutMs: 60000
    });
    expect(config.timezone).toBe('Asia/Shanghai');
    expect(config.prefix).toEqual({ translate: '[Translated]', summarize: '[Summary]' });
    expect(config.translate.strategy).toBe('immersion');
    expect(config.translate.maxPerRunPerFolder).toBe(3);
    expect(config.summarize.cron).toEqual(['0 7 * * *', '0 12 * * *', '0 19 * * *']);
    expect(config.dispatch.concurrency).toBe(8);
    expect(config.llm.apiKey).toBe('');
  });

  it('should let environment secrets win over the file', () => {
    const config = parseConfig(
      { imap: { ...MINIMAL.imap, password: 'from-file' }, llm: { apiKey: 'from-file' } },
      { IMAP_PASSWORD: 'test-secret', LLM_API_KEY: 'test-key' }
    );

    expect(config.imap.password).toBe('test-secret');
    expect(config.llm.apiKey).toBe('test-key');
  });

  it('should report every invalid field by path', () => {
    const issues = issuesOf(() =>
      parseConfig({
        imap: { host: '', user: 'owner@example.test', password: 'test-secret', port: 70000 },
        translate: { strategy: 'sideways' }
      }, {})
    );

    expect(issues).toContain('imap.host: IMAP host is required');
    expect(issues).toContain('imap.port: Invalid port number');
    expect(issues.some(issue => issue.startsWith('translate.strategy: '))).toBe(true);
    expect(issues).toHaveLength(3);
  });

  it('should require the imap section', () => {
    expect(issuesOf(() => parseConfig({}, {}))).toEqual(['imap: Required']);
  });

  it('should reject a password that is neither in the file nor the environment', () => {
    expect(issuesOf(() => parseConfig(MINIMAL, {}))).toEqual(['imap.password: Required']);
  });

  it('should reject values that are not objects', () => {
    expect(() => parseConfig([], {})).toThrow('Configuration must be a JSON object');
    expect(() => parseConfig(null, {})).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailroom-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read and validate a JSON file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ ...MINIMAL, timezone: 'UTC' }));

    const config = loadConfig(file, { IMAP_PASSWORD: 'test-secret' });

    expect(config.timezone).toBe('UTC');
  });

  it('should explain a missing file', () => {
    expect(() => loadConfig(path.join(dir, 'missing.json'), {})).toThrow(/^Cannot read configuration file /);
  });

  it('should explain malformed JSON', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, '{ "imap": ');

    expect(() => loadConfig(file, {})).toThrow(/^Configuration file config\.json is not valid JSON: /);
  });

  describe('readPromptFile', () => {
    it('should return the trimmed instructions', () => {
      fs.writeFileSync(path.join(dir, 'Prompt.txt'), '  Summarize briefly.\n');
      expect(readPromptFile('Prompt.txt', dir)).toBe('Summarize briefly.');
    });

    it('should return undefined for a missing or blank file', () => {
      expect(readPromptFile('Prompt.txt', dir)).toBeUndefined();
      fs.writeFileSync(path.join(dir, 'Prompt.txt'), '\n  \n');
      expect(readPromptFile('Prompt.txt', dir)).toBeUndefined();
    });
  });
});
