/**
 * Translation backend module
 */

export { TranslationBackendClient, isCorruptOutput } from './client';
export type { HttpPost, CompletionRequest } from './client';
export { buildSystemPrompt, buildTranslationMessages } from './prompts';
export type { ChatMessage } from './prompts';
