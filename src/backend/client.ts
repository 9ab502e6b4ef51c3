/**
 * Translation backend client
 *
 * Sends one chat-completion request per unit of text to an
 * OpenAI-compatible endpoint (text-generation-webui, llama.cpp server and
 * similar). A response containing the corruption sentinel is retried with the
 * identical request until the attempt budget runs out.
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { BackendSettings } from '../config/settings';
import { CORRUPTION_SENTINEL, TextTranslator } from '../core/types';
import { TransportError, TranslationExhaustedError, errorMessage } from '../core/errors';
import { Glossary } from '../dictionary/glossary';
import { log } from '../logging/log';
import { ChatMessage, buildSystemPrompt, buildTranslationMessages } from './prompts';

/** POST function; node-fetch by default, a stub in tests */
export type HttpPost = (url: string, init: RequestInit) => Promise<Response>;

/** Request body sent to the endpoint */
export interface CompletionRequest {
  model: string;
  temperature: number;
  top_p: number;
  top_k: number;
  repetition_penalty: number;
  messages: ChatMessage[];
}

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});

/**
 * Check if a response is a degenerate generation
 */
export function isCorruptOutput(content: string): boolean {
  return content.includes(CORRUPTION_SENTINEL);
}

export class TranslationBackendClient implements TextTranslator {
  private readonly settings: Readonly<BackendSettings>;
  private readonly systemPrompt: string;
  private readonly post: HttpPost;

  constructor(settings: Readonly<BackendSettings>, glossary: Glossary, post: HttpPost = fetch) {
    this.settings = settings;
    this.systemPrompt = buildSystemPrompt(settings.systemPrompt, glossary);
    this.post = post;
  }

  /**
   * Build the request body for one unit of text
   */
  buildRequest(text: string): CompletionRequest {
    return {
      model: this.settings.model,
      temperature: this.settings.temperature,
      top_p: this.settings.topP,
      top_k: this.settings.topK,
      repetition_penalty: this.settings.repetitionPenalty,
      messages: buildTranslationMessages(this.systemPrompt, text),
    };
  }

  /**
   * Translate one unit of text.
   *
   * @throws TransportError when the HTTP call fails or the body is unusable
   * @throws TranslationExhaustedError when every attempt returned corrupt output
   */
  async translate(text: string): Promise<string> {
    const body = JSON.stringify(this.buildRequest(text));
    const maxAttempts = this.settings.retryAttempts + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const content = await this.requestCompletion(body);

      if (!isCorruptOutput(content)) {
        return content;
      }

      log(`[Backend] Found junk output, ${attempt < maxAttempts ? 'retrying' : 'giving up'} (attempt ${attempt}/${maxAttempts})`);
    }

    throw new TranslationExhaustedError(text, maxAttempts);
  }

  /**
   * Issue one POST and extract the first choice's message content
   */
  private async requestCompletion(body: string): Promise<string> {
    let response: Response;
    try {
      response = await this.post(this.settings.apiUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
      });
    } catch (error) {
      throw new TransportError(`Network error: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new TransportError(`API error ${response.status}: ${errorText}`, { status: response.status });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransportError(`Response is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = completionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError('Response has no choices[0].message.content');
    }

    return parsed.data.choices[0].message.content;
  }
}
