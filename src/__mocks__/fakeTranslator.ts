/**
 * In-memory translator for tests
 *
 * Returns configured translations (or `en:<text>` when none is set), records
 * every call, and can be told to fail on specific inputs.
 */

import { TextTranslator } from '../core/types';

export class FakeTranslator implements TextTranslator {
  /** Every text passed to translate(), in call order */
  readonly calls: string[] = [];
  private readonly translations: Map<string, string>;
  private readonly errors = new Map<string, Error>();

  constructor(translations: Record<string, string> = {}) {
    this.translations = new Map(Object.entries(translations));
  }

  failOn(text: string, error: Error): this {
    this.errors.set(text, error);
    return this;
  }

  async translate(text: string): Promise<string> {
    this.calls.push(text);

    const error = this.errors.get(text);
    if (error) {
      throw error;
    }

    return this.translations.get(text) ?? `en:${text}`;
  }
}
