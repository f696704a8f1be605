import pLimit from 'p-limit';
import { LLMErrorCode, LLMProviderError, LlmClient } from '../../types/llm-provider';
import { estimateTokens } from '../text/segmenter';
import { TokenBucket } from './token-bucket';

export interface DispatchRequest {
  /** Position key; unique within one dispatch */
  key: string;
  text: string;
}

export interface TranslationResult {
  source: string;
  text?: string;
  failed: boolean;
  attempts: number;
  error?: LLMErrorCode;
}

export interface DispatchReport {
  results: Map<string, TranslationResult>;
  /** External calls issued, retries included */
  calls: number;
  cacheHits: number;
  failed: number;
}

export interface DispatcherOptions {
  concurrency?: number;
  maxAttempts?: number;
  timeoutSeconds: number;
}

export type PromptBuilder = (text: string) => string;

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Runs independent one-shot LLM calls through a fixed pool of workers, each call gated
 * by the shared TokenBucket.
 *
 * One `dispatch()` covers one message: its cache maps exact source text to the pending
 * result, so identical segments share a single call even while it is still in flight,
 * and cache hits never touch the rate budget. The cache is dropped when dispatch returns.
 */
export class RateLimitedDispatcher {
  private readonly pool: ReturnType<typeof pLimit>;
  private readonly maxAttempts: number;
  private readonly timeoutSeconds: number;

  constructor(
    private readonly llm: LlmClient,
    private readonly bucket: TokenBucket,
    options: DispatcherOptions
  ) {
    this.pool = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.timeoutSeconds = options.timeoutSeconds;
  }

  async dispatch(requests: DispatchRequest[], buildPrompt: PromptBuilder): Promise<DispatchReport> {
    const cache = new Map<string, Promise<TranslationResult>>();
    const pending = new Map<string, Promise<TranslationResult>>();
    const counters = { calls: 0, cacheHits: 0 };

    for (const request of requests) {
      if (pending.has(request.key)) {
        throw new Error(`Duplicate position key in dispatch: ${request.key}`);
      }

      let result = cache.get(request.text);
      if (result) {
        counters.cacheHits++;
      } else {
        result = this.pool(() => this._callWithRetries(request.text, buildPrompt, counters));
        cache.set(request.text, result);
      }
      pending.set(request.key, result);
    }

    // Reassemble by key; completion order does not matter
    const results = new Map<string, TranslationResult>();
    for (const [key, result] of pending) {
      results.set(key, await result);
    }

    let failed = 0;
    for (const result of results.values()) {
      if (result.failed) failed++;
    }

    return {
      results,
      calls: counters.calls,
      cacheHits: counters.cacheHits,
      failed
    };
  }

  private async _callWithRetries(
    source: string,
    buildPrompt: PromptBuilder,
    counters: { calls: number }
  ): Promise<TranslationResult> {
    const prompt = buildPrompt(source);
    const tokens = estimateTokens(source);
    let lastCode: LLMErrorCode = 'UNKNOWN';
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      attempt++;
      await this.bucket.acquire(tokens);
      counters.calls++;

      try {
        const output = (await this.llm.complete(prompt, this.timeoutSeconds)).trim();
        if (!output) {
          throw new LLMProviderError('Empty completion', 'INVALID_RESPONSE');
        }
        return { source, text: output, failed: false, attempts: attempt };
      } catch (error: unknown) {
        const providerError = error instanceof LLMProviderError
          ? error
          : new LLMProviderError(error instanceof Error ? error.message : String(error), 'TRANSPORT');
        lastCode = providerError.code;

        console.warn(
          `[Dispatcher] Attempt ${attempt}/${this.maxAttempts} failed (${providerError.code}): ${providerError.message}`
        );

        if (!providerError.retryable) {
          break;
        }
      }
    }

    return { source, failed: true, attempts: attempt, error: lastCode };
  }
}
