/**
 * Speaker name the extractor writes for narration lines
 */
export const MONOLOGUE_MARKER = 'モノローグ';

/**
 * Marker the backend emits when a generation degenerates
 */
export const CORRUPTION_SENTINEL = '###';

/**
 * One translatable line of a story file
 */
export interface TextUnit {
  /** Speaker name; empty or MONOLOGUE_MARKER for narration */
  name: string;
  /** The line of dialogue */
  text: string;
  /** Player-selectable responses attached to this line */
  choice_data_list: string[];
}

/**
 * One story / home / lyrics / preview file
 */
export interface StoryDocument {
  title?: string | null;
  text_block_list: TextUnit[];
  /** Fields the extractor wrote that the translator does not touch */
  [extra: string]: unknown;
}

/**
 * character_id -> message_id -> text
 */
export type CharacterTextTable = Record<string, Record<string, string>>;

/**
 * Character table as read from disk; messages are checked one at a time
 */
export type RawCharacterTable = Record<string, Record<string, unknown>>;

/**
 * A previous run's character table output, used to avoid re-translating.
 * Anything other than a string counts as absent.
 */
export type ReferenceTable = Record<string, Record<string, unknown>>;

/**
 * Anything that can turn one piece of source text into translated text
 */
export interface TextTranslator {
  translate(text: string): Promise<string>;
}

/**
 * A document or table entry that could not be translated
 */
export interface FailureRecord {
  /** File path, or `file#charId/msgId` for a table entry */
  path: string;
  reason: string;
}

/**
 * Result of running one story file through the story translator
 */
export type StoryOutcome =
  | {
      status: 'skipped';
      inputPath: string;
      outputPath: string;
    }
  | {
      status: 'translated';
      inputPath: string;
      outputPath: string;
      /** Fields sent to the backend (title, names, bodies, choices) */
      translatedFields: number;
      /** Narration names that were blanked without a backend call */
      skippedFields: number;
    };

/**
 * Result of running the character table through the table translator
 */
export interface CharacterOutcome {
  /** Working table; failed entries are left out */
  table: CharacterTextTable;
  translatedCount: number;
  skippedCount: number;
  failures: FailureRecord[];
}
