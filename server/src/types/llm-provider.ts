export type LLMProviderType = 'openai' | 'anthropic' | 'google' | 'local';

export interface LLMProviderConfig {
  name: string;
  type: LLMProviderType;
  apiKey: string;
  apiEndpoint?: string;
  modelName: string;
  temperature?: number;
}

export type LLMErrorCode =
  | 'INVALID_API_KEY'
  | 'RATE_LIMIT'
  | 'MODEL_NOT_FOUND'
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'TRANSPORT'
  | 'INVALID_RESPONSE'
  | 'UNKNOWN';

export class LLMProviderError extends Error {
  constructor(
    message: string,
    public code: LLMErrorCode
  ) {
    super(message);
    this.name = 'LLMProviderError';
  }

  /**
   * Timeouts, transport failures and empty/garbled responses are worth another attempt;
   * bad credentials or an unknown model are not.
   */
  get retryable(): boolean {
    return this.code !== 'INVALID_API_KEY' && this.code !== 'MODEL_NOT_FOUND';
  }
}

/**
 * Contract every LLM transport fulfils. `timeoutSeconds` bounds one request;
 * failures surface as LLMProviderError with TIMEOUT, TRANSPORT or INVALID_RESPONSE.
 */
export interface LlmClient {
  complete(prompt: string, timeoutSeconds: number): Promise<string>;
}

export interface ModelInfo {
  name: string;
  contextWindow: number;
  maxOutput: number;
}

/**
 * Get model information (context window and max output tokens) for a given model name
 */
export function getModelInfo(modelName: string): ModelInfo {
  const modelInfo: Record<string, { contextWindow: number; maxOutput: number }> = {
    // OpenAI
    'gpt-4o': { contextWindow: 128000, maxOutput: 16384 },
    'gpt-4o-mini': { contextWindow: 128000, maxOutput: 16384 },
    'gpt-4-turbo': { contextWindow: 128000, maxOutput: 4096 },
    // Anthropic
    'claude-3-5-sonnet-20241022': { contextWindow: 200000, maxOutput: 8192 },
    'claude-3-haiku-20240307': { contextWindow: 200000, maxOutput: 4096 },
    // Google
    'gemini-1.5-pro': { contextWindow: 1048576, maxOutput: 8192 },
    'gemini-1.5-flash': { contextWindow: 1048576, maxOutput: 8192 },
    // OpenAI-compatible hosts
    'Qwen/Qwen2.5-7B-Instruct': { contextWindow: 32768, maxOutput: 4096 },
    'deepseek-ai/DeepSeek-V3': { contextWindow: 65536, maxOutput: 8192 },
    // Default for unknown models
    'default': { contextWindow: 8192, maxOutput: 2048 }
  };

  const info = modelInfo[modelName] ?? modelInfo['default'];

  return {
    name: modelName,
    ...info
  };
}
