import { RateLimitedDispatcher } from '../rate-limited-dispatcher';
import { TokenBucket } from '../token-bucket';
import { buildTranslationPrompt } from '../prompts';
import { LlmClient, LLMProviderError } from '../../../types/llm-provider';
import { ManualClock, ScriptedLlmClient } from '../../__tests__/test-utils';

const toFrench = (text: string) => buildTranslationPrompt(text, 'French');

function createDispatcher(llm: LlmClient, clock = new ManualClock(), concurrency = 8) {
  const bucket = new TokenBucket({ requestsPerMinute: 1000, tokensPerMinute: 1_000_000 }, clock);
  return new RateLimitedDispatcher(llm, bucket, { concurrency, maxAttempts: 3, timeoutSeconds: 5 });
}

describe('RateLimitedDispatcher', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should make one call for identical texts and share the result', async () => {
    const llm = new ScriptedLlmClient();
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch(
      [
        { key: 'a', text: 'Hello' },
        { key: 'b', text: 'Hello' },
        { key: 'c', text: 'Bye' }
      ],
      toFrench
    );

    expect(llm.callsFor('Hello')).toBe(1);
    expect(report.calls).toBe(2);
    expect(report.cacheHits).toBe(1);
    expect(report.failed).toBe(0);
    expect(report.results.get('a')?.text).toBe('<<Hello>>');
    expect(report.results.get('b')?.text).toBe('<<Hello>>');
    expect(report.results.get('c')?.text).toBe('<<Bye>>');
  });

  it('should not spend rate budget on cache hits', async () => {
    const clock = new ManualClock();
    const llm = new ScriptedLlmClient();
    const bucket = new TokenBucket({ requestsPerMinute: 1, tokensPerMinute: 100000 }, clock);
    const dispatcher = new RateLimitedDispatcher(llm, bucket, { timeoutSeconds: 5 });

    const report = await dispatcher.dispatch(
      [
        { key: 'a', text: 'Same text' },
        { key: 'b', text: 'Same text' }
      ],
      toFrench
    );

    expect(clock.now()).toBe(0);
    expect(report.calls).toBe(1);
    expect(report.cacheHits).toBe(1);
    expect(report.results.get('b')?.text).toBe('<<Same text>>');
    expect(bucket.snapshot().requestsAvailable).toBe(0);
  });

  it('should return results keyed by position, not completion order', async () => {
    const llm = new ScriptedLlmClient();
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch(
      [
        { key: 'z', text: 'last' },
        { key: 'm', text: 'middle' },
        { key: 'a', text: 'first' }
      ],
      toFrench
    );

    expect([...report.results.keys()]).toEqual(['z', 'm', 'a']);
    expect(report.results.get('m')?.source).toBe('middle');
  });

  it('should retry a failed call and keep the later success', async () => {
    const llm = new ScriptedLlmClient().script('Flaky', new LLMProviderError('timed out', 'TIMEOUT'), 'Bonjour');
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch([{ key: 'k', text: 'Flaky' }], toFrench);

    expect(report.results.get('k')).toEqual({ source: 'Flaky', text: 'Bonjour', failed: false, attempts: 2 });
    expect(report.calls).toBe(2);
  });

  it('should mark a segment failed after max attempts without failing the batch', async () => {
    const llm = new ScriptedLlmClient().script('Broken', new LLMProviderError('upstream down', 'TRANSPORT'));
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch(
      [
        { key: 'bad', text: 'Broken' },
        { key: 'good', text: 'Fine' }
      ],
      toFrench
    );

    expect(report.results.get('bad')).toEqual({ source: 'Broken', failed: true, attempts: 3, error: 'TRANSPORT' });
    expect(report.results.get('good')?.text).toBe('<<Fine>>');
    expect(report.failed).toBe(1);
    expect(report.calls).toBe(4);
  });

  it('should stop retrying on a non-retryable error', async () => {
    const llm = new ScriptedLlmClient().script('Secret', new LLMProviderError('bad key', 'INVALID_API_KEY'));
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch([{ key: 'k', text: 'Secret' }], toFrench);

    expect(report.results.get('k')).toEqual({ source: 'Secret', failed: true, attempts: 1, error: 'INVALID_API_KEY' });
  });

  it('should treat empty output as an invalid response', async () => {
    const llm = new ScriptedLlmClient().script('Blank', '   ');
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch([{ key: 'k', text: 'Blank' }], toFrench);

    expect(report.results.get('k')?.error).toBe('INVALID_RESPONSE');
    expect(report.results.get('k')?.attempts).toBe(3);
  });

  it('should wrap unexpected errors as transport failures', async () => {
    const llm = new ScriptedLlmClient().script('Socket', () => {
      throw new Error('socket hang up');
    });
    const dispatcher = createDispatcher(llm);

    const report = await dispatcher.dispatch([{ key: 'k', text: 'Socket' }], toFrench);

    expect(report.results.get('k')?.error).toBe('TRANSPORT');
    expect(console.warn).toHaveBeenCalledWith('[Dispatcher] Attempt 1/3 failed (TRANSPORT): socket hang up');
  });

  it('should reject duplicate position keys', async () => {
    const dispatcher = createDispatcher(new ScriptedLlmClient());

    await expect(
      dispatcher.dispatch(
        [
          { key: 'k', text: 'one' },
          { key: 'k', text: 'two' }
        ],
        toFrench
      )
    ).rejects.toThrow('Duplicate position key in dispatch: k');
  });

  it('should keep at most `concurrency` calls in flight', async () => {
    let active = 0;
    let maxActive = 0;
    const llm: LlmClient = {
      async complete() {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise(resolve => setImmediate(resolve));
        active--;
        return 'done';
      }
    };
    const dispatcher = createDispatcher(llm, new ManualClock(), 2);

    const report = await dispatcher.dispatch(
      ['one', 'two', 'three', 'four', 'five'].map(text => ({ key: text, text })),
      toFrench
    );

    expect(report.calls).toBe(5);
    expect(maxActive).toBe(2);
  });

  it('should let the third of five segments through only after the first minute when rpm is 2', async () => {
    const clock = new ManualClock();
    const calledAt: number[] = [];
    const llm = new ScriptedLlmClient(text => {
      calledAt.push(clock.now());
      return `ok ${text}`;
    });
    const bucket = new TokenBucket({ requestsPerMinute: 2, tokensPerMinute: 100000 }, clock);
    const dispatcher = new RateLimitedDispatcher(llm, bucket, { timeoutSeconds: 5 });

    const pending = dispatcher.dispatch(
      ['s1', 's2', 's3', 's4', 's5'].map(text => ({ key: text, text })),
      toFrench
    );

    await clock.advance(0);
    expect(calledAt).toEqual([0, 0]);

    await clock.advance(60000);
    expect(calledAt).toEqual([0, 0, 60000, 60000]);

    await clock.advance(60000);
    const report = await pending;

    expect(calledAt).toEqual([0, 0, 60000, 60000, 120000]);
    expect(report.failed).toBe(0);
    expect(report.results.get('s3')?.text).toBe('ok s3');
  });
});
