/**
 * Configuration Settings for the translation pipeline
 *
 * Reads a flat JSON settings file (default ./config.json) and turns it into a
 * frozen Settings value that is handed to every component constructor.
 * Every key except api_url has a default.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors';
import { parseJsonContent } from '../core/jsonFiles';

export const DEFAULT_CONFIG_PATH = 'config.json';

/**
 * Default system instruction placed before the glossary in every prompt
 */
export const DEFAULT_SYSTEM_PROMPT =
  'You are a translator for Japanese game dialogue. Translate the user text into natural English. ' +
  'Reply with the translation only, without notes or quotation marks.';

/**
 * Settings file as written on disk (snake_case keys)
 */
const settingsFileSchema = z.object({
  api_url: z.string().url(),
  model: z.string().min(1).default('local-model'),
  temperature: z.number().min(0).max(2).default(0.3),
  top_p: z.number().min(0).max(1).default(0.9),
  top_k: z.number().int().min(0).default(40),
  repetition_penalty: z.number().min(0).default(1.1),
  retry_attempts: z.number().int().min(0).default(3),
  system_prompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  raw_folder: z.string().default('raw'),
  translated_folder: z.string().default('translated'),
  updates_folder: z.string().default('updates'),
  glossary_path: z.string().default('dictionary.json'),
  char_system_text_raw: z.string().default('raw/character_system_text.json'),
  char_system_text_reference: z.string().default('reference/character_system_text.json'),
  char_system_text_output: z.string().default('translated/character_system_text.json'),
  log_file: z.string().nullable().default('logs/translate.log'),
});

/**
 * Backend request parameters
 */
export interface BackendSettings {
  apiUrl: string;
  model: string;
  temperature: number;
  topP: number;
  topK: number;
  repetitionPenalty: number;
  /** Retries after the first attempt when the output is corrupt */
  retryAttempts: number;
  systemPrompt: string;
}

/**
 * Where the pipeline reads from and writes to
 */
export interface PathSettings {
  rawFolder: string;
  translatedFolder: string;
  updatesFolder: string;
  glossaryPath: string;
  charSystemTextRaw: string;
  charSystemTextReference: string;
  charSystemTextOutput: string;
  logFile: string | null;
}

export interface Settings {
  backend: Readonly<BackendSettings>;
  paths: Readonly<PathSettings>;
}

/**
 * Validate raw settings and build the frozen Settings value.
 * Relative paths are resolved against `baseDir`.
 */
export function buildSettings(
  raw: unknown,
  baseDir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const withOverrides =
    env.DIALOGUE_TL_API_URL && typeof raw === 'object' && raw !== null
      ? { ...raw, api_url: env.DIALOGUE_TL_API_URL }
      : raw;

  const result = settingsFileSchema.safeParse(withOverrides);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid settings: ${issues}`);
  }

  const file = result.data;
  const resolve = (p: string) => path.resolve(baseDir, p);

  return Object.freeze({
    backend: Object.freeze({
      apiUrl: file.api_url,
      model: file.model,
      temperature: file.temperature,
      topP: file.top_p,
      topK: file.top_k,
      repetitionPenalty: file.repetition_penalty,
      retryAttempts: file.retry_attempts,
      systemPrompt: file.system_prompt,
    }),
    paths: Object.freeze({
      rawFolder: resolve(file.raw_folder),
      translatedFolder: resolve(file.translated_folder),
      updatesFolder: resolve(file.updates_folder),
      glossaryPath: resolve(file.glossary_path),
      charSystemTextRaw: resolve(file.char_system_text_raw),
      charSystemTextReference: resolve(file.char_system_text_reference),
      charSystemTextOutput: resolve(file.char_system_text_output),
      logFile: file.log_file === null ? null : resolve(file.log_file),
    }),
  });
}

/**
 * Load settings from disk.
 *
 * Lookup order: explicit path, DIALOGUE_TL_CONFIG, ./config.json.
 * Relative paths inside the file resolve against the file's directory.
 */
export function loadSettings(configPath?: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const filePath = path.resolve(configPath ?? env.DIALOGUE_TL_CONFIG ?? DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parseJsonContent(content, filePath);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  return buildSettings(raw, path.dirname(filePath), env);
}
