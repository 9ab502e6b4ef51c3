import { z } from 'zod';
import { RawCharacterTable, ReferenceTable, StoryDocument } from './types';
import { MalformedInputError } from './errors';

const textUnitSchema = z
  .object({
    name: z.string().nullish().transform(name => name ?? ''),
    text: z.string(),
    choice_data_list: z
      .array(z.string())
      .nullish()
      .transform(choices => choices ?? []),
  })
  .passthrough();

export const storyDocumentSchema = z
  .object({
    title: z.string().nullish(),
    text_block_list: z.array(textUnitSchema),
  })
  .passthrough();

export const characterTextTableSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export const referenceTableSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export const glossarySchema = z.record(z.string(), z.string());

/**
 * Format the first few zod issues as `path: message`
 */
function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, filePath: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedInputError(filePath, describeIssues(result.error));
  }
  return result.data;
}

export function parseStoryDocument(data: unknown, filePath: string): StoryDocument {
  return parseWith(storyDocumentSchema, data, filePath);
}

export function parseCharacterTable(data: unknown, filePath: string): RawCharacterTable {
  return parseWith(characterTextTableSchema, data, filePath);
}

export function parseReferenceTable(data: unknown, filePath: string): ReferenceTable {
  return parseWith(referenceTableSchema, data, filePath);
}

export function parseGlossary(data: unknown, filePath: string): Record<string, string> {
  return parseWith(glossarySchema, data, filePath);
}
