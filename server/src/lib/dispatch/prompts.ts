/**
 * Prompt templates for the two one-shot LLM calls the jobs make.
 */

export type PromptKind = 'translate' | 'summarize';

const TEXT_MARKER = '\n\nText:\n';
const TRANSLATE_HEAD = 'Translate the text below into';

export const DEFAULT_SUMMARY_INSTRUCTIONS =
  'Summarize the text below as at most six concise bullet points.';

export function buildTranslationPrompt(text: string, targetLanguage: string): string {
  return (
    `${TRANSLATE_HEAD} ${targetLanguage}. ` +
    'Translate faithfully paragraph by paragraph; keep numbers, proper nouns and punctuation. ' +
    'Reply with the translation only, without explanations.' +
    TEXT_MARKER +
    text
  );
}

export function buildSummaryPrompt(instructions: string, targetLanguage: string, text: string): string {
  return `${instructions.trim()}\nWrite the summary in ${targetLanguage}.${TEXT_MARKER}${text}`;
}

/**
 * Recover the kind and source text of a prompt built above. Used by the offline client.
 */
export function parsePrompt(prompt: string): { kind: PromptKind; text: string } {
  const index = prompt.indexOf(TEXT_MARKER);
  const text = index === -1 ? prompt : prompt.slice(index + TEXT_MARKER.length);
  const kind: PromptKind = prompt.startsWith(TRANSLATE_HEAD) ? 'translate' : 'summarize';
  return { kind, text };
}
