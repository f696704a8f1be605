import { LlmClient } from '../types/llm-provider';
import { parsePrompt } from './dispatch/prompts';

/**
 * Offline LlmClient: deterministic output, no network.
 * Translations are tagged copies of the source; summaries are the first sentences as bullets.
 */
export class MockLlmClient implements LlmClient {
  constructor(private readonly maxBullets: number = 5) {}

  async complete(prompt: string, _timeoutSeconds: number): Promise<string> {
    const { kind, text } = parsePrompt(prompt);
    if (kind === 'translate') {
      return `[MOCK] ${text.trim()}`;
    }
    return this.summarize(text);
  }

  private summarize(text: string): string {
    const trimmed = text.trim();
    if (!trimmed) {
      return '(empty)';
    }

    const sentences = trimmed
      .split(/[。.!?\n]/)
      .map(part => part.trim())
      .filter(part => part.length > 0);

    return sentences
      .slice(0, this.maxBullets)
      .map(sentence => `- ${sentence}`)
      .join('\n');
  }
}
