import * as fs from 'fs';
import { MONOLOGUE_MARKER, StoryDocument, StoryOutcome, TextTranslator } from './types';
import { readJsonFile, writeJsonFile } from './jsonFiles';
import { parseStoryDocument } from './schemas';
import { resolveOutputPath } from './outputPaths';
import { log } from '../logging/log';

/**
 * Check if a speaker name marks a narration line
 */
export function isMonologueName(name: string): boolean {
  return name === '' || name === MONOLOGUE_MARKER;
}

/**
 * Translates story files one at a time.
 *
 * A story file is translated at most once: if its output file exists it is
 * skipped whole. The output is written only after every field succeeded, so
 * a failed or interrupted document leaves nothing behind and is retried in
 * full on the next run.
 */
export class StoryTranslator {
  constructor(
    private readonly translator: TextTranslator,
    private readonly inputRoot: string,
    private readonly outputRoot: string
  ) {}

  async translateFile(inputPath: string): Promise<StoryOutcome> {
    const outputPath = resolveOutputPath(inputPath, this.inputRoot, this.outputRoot);

    if (fs.existsSync(outputPath)) {
      log(`[Story] ${outputPath} already exists, skipping`);
      return { status: 'skipped', inputPath, outputPath };
    }

    log(`[Story] Reading ${inputPath}`);
    const document = parseStoryDocument(readJsonFile(inputPath), inputPath);
    const counts = await this.translateDocument(document);

    writeJsonFile(outputPath, document);
    log(`[Story] Saved to ${outputPath}`);

    return { status: 'translated', inputPath, outputPath, ...counts };
  }

  /**
   * Translate a document in place: title, then each unit's name, text and choices.
   */
  async translateDocument(document: StoryDocument): Promise<{ translatedFields: number; skippedFields: number }> {
    let translatedFields = 0;
    let skippedFields = 0;

    if (document.title) {
      document.title = await this.translator.translate(document.title);
      translatedFields++;
      log(`[Story] Title: ${document.title}`);
    }

    for (const [index, unit] of document.text_block_list.entries()) {
      if (isMonologueName(unit.name)) {
        unit.name = '';
        skippedFields++;
      } else {
        unit.name = await this.translator.translate(unit.name);
        translatedFields++;
      }

      unit.text = await this.translator.translate(unit.text);
      translatedFields++;
      log(`[Story] Line #${index} ${unit.name ? `${unit.name}: ` : ''}${unit.text}`);

      for (let choiceIndex = 0; choiceIndex < unit.choice_data_list.length; choiceIndex++) {
        unit.choice_data_list[choiceIndex] = await this.translator.translate(unit.choice_data_list[choiceIndex]);
        translatedFields++;
      }
    }

    return { translatedFields, skippedFields };
  }
}
