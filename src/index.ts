#!/usr/bin/env node

/**
 * dialogue-tl
 *
 * Batch translator for extracted game dialogue. Translates the raw story
 * folder and the character system text table through a chat-completion
 * endpoint, resuming where the previous run stopped, and optionally packs
 * the newly written files into a numbered update archive.
 */

import * as readline from 'readline';
import { Command, Option } from 'commander';
import { loadSettings } from './config/settings';
import { loadGlossary } from './dictionary/glossary';
import { TranslationBackendClient } from './backend';
import { RunMode, parseRunMode, runPipeline } from './batch/pipeline';
import { EXTRACT_TYPES, ExtractType, isExtractType, runExtractor } from './extract/extractor';
import { errorMessage } from './core/errors';
import { log, setLogFile } from './logging/log';

const VERSION = '1.0.0';

interface TranslateCommandOptions {
  mode?: RunMode;
  zip?: boolean;
  config?: string;
}

interface ExtractCommandOptions {
  type: string;
  set?: string;
  group?: string;
  id?: string;
  idx?: string;
  storyId?: string;
  dst?: string;
  overwrite?: boolean;
  workers?: string;
  meta?: string;
  script: string;
  python?: string;
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Ask one question on stdin
 */
function ask(rl: readline.Interface, question: string): Promise<string> {
  return new Promise(resolve => rl.question(question, resolve));
}

/**
 * Fill in whatever the command line left open by asking the user
 */
async function promptForMissing(options: TranslateCommandOptions): Promise<{ mode: RunMode; createZip: boolean }> {
  if (options.mode && options.zip !== undefined) {
    return { mode: options.mode, createZip: options.zip };
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    let mode = options.mode ?? null;
    while (!mode) {
      const answer = await ask(rl, 'Translate Folder (f) or Character System Text (c) or leave blank for both: ');
      mode = parseRunMode(answer);
      if (!mode) console.log(`Unknown choice "${answer}"`);
    }

    const createZip =
      options.zip ?? (await ask(rl, 'Create update zip after translation? (y/n) ')).trim().toLowerCase() === 'y';

    return { mode, createZip };
  } finally {
    rl.close();
  }
}

async function translateCommand(options: TranslateCommandOptions): Promise<number> {
  const settings = loadSettings(options.config);
  setLogFile(settings.paths.logFile);
  log(`Endpoint: ${settings.backend.apiUrl}`);

  const glossary = loadGlossary(settings.paths.glossaryPath);
  const client = new TranslationBackendClient(settings.backend, glossary);
  const { mode, createZip } = await promptForMissing(options);

  const { stats, archivePath } = await runPipeline(settings, client, { mode, createZip });

  console.log(`Translated: ${stats.translatedCount}`);
  console.log(`Skipped:    ${stats.skippedCount}`);
  console.log(`Failed:     ${stats.failedCount}`);
  for (const failure of stats.failures) {
    console.log(`  ${failure.path}: ${failure.reason}`);
  }
  if (archivePath) {
    console.log(`Update archive: ${archivePath}`);
  }

  return stats.failedCount === 0 ? 0 : 1;
}

async function extractCommand(options: ExtractCommandOptions): Promise<number> {
  if (!isExtractType(options.type)) {
    console.error(`Invalid type. Must be one of: ${EXTRACT_TYPES.join(', ')}`);
    return 1;
  }
  const type: ExtractType = options.type;

  const workers = options.workers === undefined ? undefined : parseInt(options.workers, 10);
  if (workers !== undefined && (Number.isNaN(workers) || workers < 1)) {
    console.error(`Invalid worker count: ${options.workers}`);
    return 1;
  }

  const result = await runExtractor(
    options.script,
    {
      type,
      set: options.set,
      group: options.group,
      id: options.id,
      idx: options.idx,
      storyId: options.storyId,
      dst: options.dst,
      overwrite: options.overwrite,
      workers,
      meta: options.meta,
      verbose: options.verbose,
      debug: options.debug,
    },
    options.python
  );

  if (result.stdout) process.stdout.write(result.stdout);
  if (result.stderr && (!result.success || options.verbose || options.debug)) {
    process.stderr.write(result.stderr);
  }
  return result.exitCode;
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name('dialogue-tl')
    .description('Incremental batch translator for extracted game dialogue')
    .version(VERSION);

  program
    .command('translate')
    .description('Translate the raw story folder and/or the character system text table')
    .addOption(new Option('-m, --mode <mode>', 'what to translate').choices(['folder', 'character', 'both']))
    .option('--zip', 'create an update archive after translation')
    .option('--no-zip', 'do not create an update archive')
    .option('-c, --config <path>', 'settings file (default: ./config.json)')
    .action(async (options: TranslateCommandOptions) => {
      process.exitCode = await translateCommand(options);
    });

  program
    .command('extract')
    .description('Run the external asset extraction script')
    .addOption(new Option('-t, --type <type>', 'asset type').choices([...EXTRACT_TYPES]).default('story'))
    .option('-s, --set <set>', 'the set to process')
    .option('-g, --group <group>', 'the group to process')
    .option('-i, --id <id>', 'the id (subgroup) to process')
    .option('-x, --idx <index>', 'the specific asset index to process')
    .option('-S, --story-id <storyId>', 'the story id to process')
    .option('-d, --dst <directory>', 'output directory (default: raw)')
    .option('-O, --overwrite', 'overwrite existing files')
    .option('-w, --workers <num>', 'number of parallel workers (default: 4)')
    .option('--meta <path>', 'explicit path to the meta file')
    .option('-p, --script <path>', 'path to the extraction script', 'extract.py')
    .option('--python <command>', 'python interpreter to run the script with')
    .option('-v, --verbose', 'verbose output')
    .option('--debug', 'debug output')
    .action(async (options: ExtractCommandOptions) => {
      process.exitCode = await extractCommand(options);
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log(`Fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
