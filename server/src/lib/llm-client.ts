import { APICallError, generateText, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import {
  LLMProviderConfig,
  LLMProviderError,
  LlmClient,
  getModelInfo
} from '../types/llm-provider';

/**
 * LlmClient backed by the Vercel AI SDK.
 * One call = one request; retry policy belongs to the dispatcher.
 */
export class AiSdkLlmClient implements LlmClient {
  private model: LanguageModel;
  private modelName: string;
  private temperature: number;

  constructor(config: LLMProviderConfig) {
    this.model = this._createModel(config);
    this.modelName = config.modelName;
    this.temperature = config.temperature ?? 0.2;
  }

  private _createModel(config: LLMProviderConfig): LanguageModel {
    switch (config.type) {
      case 'openai': {
        const openai = createOpenAI({
          apiKey: config.apiKey,
          baseURL: this._normalizeBaseURL(config.apiEndpoint, 'https://api.openai.com/v1')
        });
        return openai(config.modelName);
      }

      case 'anthropic': {
        const anthropic = createAnthropic({
          apiKey: config.apiKey,
          baseURL: this._normalizeBaseURL(config.apiEndpoint, 'https://api.anthropic.com')
        });
        return anthropic(config.modelName);
      }

      case 'google': {
        const google = createGoogleGenerativeAI({
          apiKey: config.apiKey,
          baseURL: this._normalizeBaseURL(config.apiEndpoint, 'https://generativelanguage.googleapis.com/v1beta')
        });
        return google(config.modelName);
      }

      case 'local': {
        // Ollama, SiliconFlow and other OpenAI-compatible hosts
        const compatible = createOpenAICompatible({
          baseURL: this._withV1Suffix(config.apiEndpoint || 'http://localhost:11434/v1'),
          apiKey: config.apiKey || 'ollama',
          name: config.name
        });
        return compatible(config.modelName);
      }

      default:
        throw new LLMProviderError(
          `Unsupported provider type: ${String(config.type)}`,
          'UNKNOWN'
        );
    }
  }

  private _normalizeBaseURL(endpoint: string | undefined, defaultURL: string): string | undefined {
    if (!endpoint) {
      // Use SDK default by returning undefined
      return undefined;
    }

    if (endpoint.startsWith('http://') || endpoint.startsWith('https://')) {
      return endpoint;
    }

    // If it's just a path, append it to the default URL
    if (endpoint.startsWith('/')) {
      const base = defaultURL.endsWith('/') ? defaultURL.slice(0, -1) : defaultURL;
      return base + endpoint;
    }

    return 'https://' + endpoint;
  }

  private _withV1Suffix(endpoint: string): string {
    const base = endpoint.replace(/\/+$/, '');
    return base.endsWith('/v1') ? base : `${base}/v1`;
  }

  async complete(prompt: string, timeoutSeconds: number): Promise<string> {
    const timeoutMs = Math.max(1, Math.round(timeoutSeconds * 1000));
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const { text } = await generateText({
        model: this.model,
        prompt: this._truncatePromptToFit(prompt),
        temperature: this.temperature,
        abortSignal: controller.signal
      });

      if (!text || text.trim().length === 0) {
        throw new LLMProviderError('Empty completion', 'INVALID_RESPONSE');
      }
      return text;
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        throw new LLMProviderError(`LLM call exceeded ${timeoutMs}ms`, 'TIMEOUT');
      }
      throw this._handleError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Truncate prompt to fit within model's context window
   * Uses conservative character-based token estimation (1 token ≈ 2 chars)
   * @private
   */
  private _truncatePromptToFit(prompt: string): string {
    const modelInfo = getModelInfo(this.modelName);
    const maxInputTokens = modelInfo.contextWindow - modelInfo.maxOutput;
    const estimatedTokens = Math.ceil(prompt.length / 2);

    if (estimatedTokens <= maxInputTokens) {
      return prompt;
    }

    const truncatedPrompt = prompt.substring(0, maxInputTokens * 2);
    console.warn(
      `[LLMClient] Prompt truncated from ${estimatedTokens.toLocaleString()} to ${maxInputTokens.toLocaleString()} estimated tokens for model ${this.modelName}`
    );
    return truncatedPrompt;
  }

  /**
   * Map SDK and network errors onto coded provider errors
   */
  private _handleError(error: unknown): LLMProviderError {
    if (error instanceof LLMProviderError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);

    if (APICallError.isInstance(error)) {
      const status = error.statusCode;
      if (status === 401 || status === 403) {
        return new LLMProviderError('Invalid API key', 'INVALID_API_KEY');
      }
      if (status === 404) {
        return new LLMProviderError(`Model not found: ${this.modelName}`, 'MODEL_NOT_FOUND');
      }
      if (status === 429) {
        return new LLMProviderError('Rate limit exceeded', 'RATE_LIMIT');
      }
      return new LLMProviderError(`Provider request failed: ${message}`, 'TRANSPORT');
    }

    if (message.includes('JSON') || message.includes('No output') || message.includes('Invalid response')) {
      return new LLMProviderError(message, 'INVALID_RESPONSE');
    }
    if (message.includes('ECONNREFUSED') || message.includes('ECONNRESET') || message.includes('fetch failed')) {
      return new LLMProviderError(`Connection failed: ${message}`, 'CONNECTION_FAILED');
    }
    return new LLMProviderError(message || 'Unknown error occurred', 'TRANSPORT');
  }
}
