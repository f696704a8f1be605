import { MockLlmClient } from '../mock-llm-client';
import { buildSummaryPrompt, buildTranslationPrompt } from '../dispatch/prompts';

describe('MockLlmClient', () => {
  const client = new MockLlmClient(2);

  it('should tag translations with the source text', async () => {
    await expect(client.complete(buildTranslationPrompt('  Hello  ', 'French'), 5)).resolves.toBe('[MOCK] Hello');
  });

  it('should summarize as bullets of the first sentences', async () => {
    const prompt = buildSummaryPrompt('Summarize.', 'English', 'One. Two! Three?');
    await expect(client.complete(prompt, 5)).resolves.toBe('- One\n- Two');
  });

  it('should mark an empty summary', async () => {
    await expect(client.complete(buildSummaryPrompt('Summarize.', 'English', '   '), 5)).resolves.toBe('(empty)');
  });
});
