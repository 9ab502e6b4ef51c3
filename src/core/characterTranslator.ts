import * as fs from 'fs';
import {
  CharacterOutcome,
  CharacterTextTable,
  FailureRecord,
  RawCharacterTable,
  ReferenceTable,
  TextTranslator,
} from './types';
import { parseJsonContent, readJsonFile } from './jsonFiles';
import { parseCharacterTable, parseReferenceTable } from './schemas';
import { IOFailureError, MalformedInputError, PipelineError, errorMessage } from './errors';
import { log } from '../logging/log';

/**
 * Load the raw character table. Returns null when there is nothing to translate.
 */
export function loadCharacterTable(filePath: string): RawCharacterTable | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return parseCharacterTable(readJsonFile(filePath), filePath);
}

/**
 * Load a previous run's output as reference.
 * A missing or blank file disables referencing (returns null).
 */
export function loadReferenceTable(filePath: string): ReferenceTable | null {
  if (!fs.existsSync(filePath)) {
    log(`[Character] No reference file at ${filePath}, translating every entry`);
    return null;
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOFailureError(filePath, 'read', { cause: error });
  }

  if (content.trim() === '') {
    log(`[Character] Reference file ${filePath} is empty, referencing disabled`);
    return null;
  }

  return parseReferenceTable(parseJsonContent(content, filePath), filePath);
}

/**
 * Look up a string reference value. Only own keys count, so ids such as
 * `constructor` never resolve to Object.prototype members.
 */
export function lookupReference(
  reference: ReferenceTable | null,
  characterId: string,
  messageId: string
): string | null {
  if (!reference || !Object.hasOwn(reference, characterId)) {
    return null;
  }
  const messages = reference[characterId];
  if (!Object.hasOwn(messages, messageId)) {
    return null;
  }
  const value = messages[messageId];
  return typeof value === 'string' ? value : null;
}

// Plain assignment to `__proto__` would replace the prototype instead of adding a key
function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Translates the character system text table entry by entry.
 *
 * Entries with a value in the reference table are carried over without a
 * backend call. Entries that fail, or that are not strings, are left out of
 * the working table so a later run using this output as its reference picks
 * them up again.
 */
export class CharacterTranslator {
  constructor(
    private readonly translator: TextTranslator,
    private readonly sourceLabel: string = 'character_system_text'
  ) {}

  async translateTable(table: RawCharacterTable, reference: ReferenceTable | null): Promise<CharacterOutcome> {
    const working: CharacterTextTable = {};
    const failures: FailureRecord[] = [];
    let translatedCount = 0;
    let skippedCount = 0;

    for (const [characterId, messages] of Object.entries(table)) {
      log(`[Character] Character ID: ${characterId}`);
      const workingMessages: Record<string, string> = {};
      setEntry(working, characterId, workingMessages);

      for (const [messageId, text] of Object.entries(messages)) {
        const path = `${this.sourceLabel}#${characterId}/${messageId}`;
        const referenced = lookupReference(reference, characterId, messageId);
        if (referenced !== null) {
          setEntry(workingMessages, messageId, referenced);
          skippedCount++;
          continue;
        }

        try {
          if (typeof text !== 'string') {
            throw new MalformedInputError(
              this.sourceLabel,
              `${characterId}.${messageId}: expected a string, got ${describeValue(text)}`
            );
          }
          const translated = await this.translator.translate(text);
          setEntry(workingMessages, messageId, translated);
          translatedCount++;
          log(`[Character] [${messageId}]: ${translated}`);
        } catch (error) {
          if (!(error instanceof PipelineError)) throw error;
          log(`[Character] Failed to translate ${path}: ${errorMessage(error)}`);
          failures.push({ path, reason: errorMessage(error) });
        }
      }
    }

    return { table: working, translatedCount, skippedCount, failures };
  }
}
