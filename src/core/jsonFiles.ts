import * as fs from 'fs';
import * as path from 'path';
import { IOFailureError, MalformedInputError } from './errors';

/**
 * Read and parse a JSON file.
 * Unreadable files raise IOFailureError, invalid JSON raises MalformedInputError.
 */
export function readJsonFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOFailureError(filePath, 'read', { cause: error });
  }

  return parseJsonContent(content, filePath);
}

/**
 * Parse JSON text read from `filePath`
 */
export function parseJsonContent(content: string, filePath: string): unknown {
  try {
    // Strip a UTF-8 BOM left by some editors
    return JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    const detail = error instanceof Error ? error.message : 'invalid JSON';
    throw new MalformedInputError(filePath, detail, { cause: error });
  }
}

/**
 * Write pretty-printed JSON, creating parent directories as needed
 */
export function writeJsonFile(filePath: string, data: unknown): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
  } catch (error) {
    throw new IOFailureError(filePath, 'write', { cause: error });
  }
}
