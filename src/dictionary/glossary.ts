import * as fs from 'fs';
import { readJsonFile } from '../core/jsonFiles';
import { parseGlossary } from '../core/schemas';
import { log } from '../logging/log';

/**
 * Fixed Japanese -> English term list embedded in every prompt
 */
export type Glossary = Readonly<Record<string, string>>;

/**
 * Load the glossary once at startup.
 * A missing file yields an empty glossary; a malformed one throws.
 */
export function loadGlossary(filePath: string): Glossary {
  if (!fs.existsSync(filePath)) {
    log(`[Glossary] No glossary at ${filePath}, prompts will carry an empty dictionary`);
    return Object.freeze({});
  }

  const glossary = parseGlossary(readJsonFile(filePath), filePath);
  log(`[Glossary] Loaded ${Object.keys(glossary).length} terms from ${filePath}`);
  return Object.freeze(glossary);
}
