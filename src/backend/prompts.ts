/**
 * Chat prompts for the translation backend
 *
 * The glossary travels inside the system message as serialized JSON; the
 * backend sees exactly one system message and one user message per call.
 */

import { Glossary } from '../dictionary/glossary';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Build the system instruction with the glossary embedded verbatim.
 */
export function buildSystemPrompt(systemPrompt: string, glossary: Glossary): string {
  return [
    systemPrompt.trim(),
    'Refer to the dictionary below, a JSON object ordered japanese_text: english_text. ' +
      'For example "ミホノブルボン": "Mihono Bourbon" means ミホノブルボン is always written as Mihono Bourbon.',
    JSON.stringify(glossary),
    'Translate the text below.',
  ].join('\n');
}

/**
 * Build the message pair for one unit of text.
 */
export function buildTranslationMessages(systemPrompt: string, text: string): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: text },
  ];
}
