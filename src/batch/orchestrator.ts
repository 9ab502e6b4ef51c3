/**
 * Batch Orchestrator
 *
 * Walks the raw story folder (or the character table), runs each document
 * through its translator one at a time, and keeps the run's counters and the
 * list of files written, which the archiver packs up at the end of the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PathSettings } from '../config/settings';
import { RawCharacterTable, ReferenceTable, TextTranslator } from '../core/types';
import { PipelineError, errorMessage } from '../core/errors';
import { writeJsonFile } from '../core/jsonFiles';
import { StoryTranslator } from '../core/storyTranslator';
import { CharacterTranslator, loadCharacterTable, loadReferenceTable } from '../core/characterTranslator';
import { log } from '../logging/log';
import { RunStats } from './runStats';

export type OrchestratorPaths = Pick<
  PathSettings,
  'translatedFolder' | 'charSystemTextRaw' | 'charSystemTextReference' | 'charSystemTextOutput'
>;

/**
 * Recursively find JSON files under a directory.
 * Order follows the filesystem and is not guaranteed.
 */
export function listJsonFiles(rootDirectory: string, exclude: ReadonlySet<string> = new Set()): string[] {
  const files: string[] = [];

  function walkDir(dir: string) {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      log(`[Batch] Failed to read directory ${dir}: ${errorMessage(error)}`);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walkDir(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.json') && !exclude.has(path.resolve(fullPath))) {
        files.push(fullPath);
      }
    }
  }

  walkDir(rootDirectory);
  return files;
}

function elapsedSeconds(startedAt: number): string {
  return ((Date.now() - startedAt) / 1000).toFixed(2);
}

export class BatchOrchestrator {
  private readonly newlyWritten = new Set<string>();

  constructor(
    private readonly translator: TextTranslator,
    private readonly paths: Readonly<OrchestratorPaths>
  ) {}

  /**
   * Output paths written by every batch run on this orchestrator, in write order
   */
  newlyWrittenPaths(): string[] {
    return [...this.newlyWritten];
  }

  /**
   * Translate every story file under `rootDirectory` into the translated folder.
   * A failing file is recorded and the walk continues.
   */
  async runStoryBatch(rootDirectory: string): Promise<RunStats> {
    const stats = new RunStats();

    if (!fs.existsSync(rootDirectory) || !fs.statSync(rootDirectory).isDirectory()) {
      log(`[Batch] Folder does not exist: ${rootDirectory}`);
      return stats;
    }

    log(`[Batch] Running through all files in "${rootDirectory}"`);
    const startedAt = Date.now();
    const storyTranslator = new StoryTranslator(this.translator, rootDirectory, this.paths.translatedFolder);
    const files = listJsonFiles(rootDirectory, new Set([path.resolve(this.paths.charSystemTextRaw)]));
    let filesTranslated = 0;

    for (const filePath of files) {
      try {
        const outcome = await storyTranslator.translateFile(filePath);
        if (outcome.status === 'skipped') {
          stats.skippedCount++;
          continue;
        }
        stats.translatedCount += outcome.translatedFields;
        stats.skippedCount += outcome.skippedFields;
        filesTranslated++;
        this.recordOutput(stats, outcome.outputPath);
      } catch (error) {
        if (!(error instanceof PipelineError)) throw error;
        log(`[Batch] ${filePath} failed: ${errorMessage(error)}`);
        stats.recordFailure({ path: filePath, reason: errorMessage(error) });
      }
    }

    log(`[Batch] Files processed: ${filesTranslated}`);
    log(`[Batch] Units translated: ${stats.translatedCount}`);
    log(`[Batch] Skipped: ${stats.skippedCount}`);
    log(`[Batch] Failed: ${stats.failedCount}`);
    log(`[Batch] Total batch time: ${elapsedSeconds(startedAt)} seconds.`);
    return stats;
  }

  /**
   * Translate the character system text table, reusing the reference table
   * where it already has a value. The output table is always written.
   */
  async runCharacterBatch(): Promise<RunStats> {
    const stats = new RunStats();
    const { charSystemTextRaw, charSystemTextReference, charSystemTextOutput } = this.paths;
    const startedAt = Date.now();

    let table: RawCharacterTable | null;
    let reference: ReferenceTable | null;
    try {
      log(`[Batch] Reading ${charSystemTextRaw}`);
      table = loadCharacterTable(charSystemTextRaw);
      reference = table ? loadReferenceTable(charSystemTextReference) : null;
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      log(`[Batch] Cannot load character table: ${errorMessage(error)}`);
      stats.recordFailure({ path: charSystemTextRaw, reason: errorMessage(error) });
      return stats;
    }

    if (!table) {
      log('[Batch] No character system text file to translate');
      return stats;
    }

    const outcome = await new CharacterTranslator(this.translator, charSystemTextRaw).translateTable(table, reference);
    stats.translatedCount = outcome.translatedCount;
    stats.skippedCount = outcome.skippedCount;
    outcome.failures.forEach(failure => stats.recordFailure(failure));

    try {
      writeJsonFile(charSystemTextOutput, outcome.table);
      log(`[Batch] Completed translating character system text -> ${charSystemTextOutput}`);
      if (outcome.translatedCount > 0) {
        this.recordOutput(stats, charSystemTextOutput);
      }
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      log(`[Batch] ${errorMessage(error)}`);
      stats.recordFailure({ path: charSystemTextOutput, reason: errorMessage(error) });
    }

    log(`[Batch] Lines processed: ${stats.translatedCount}`);
    log(`[Batch] Lines skipped: ${stats.skippedCount}`);
    log(`[Batch] Lines failed: ${stats.failedCount}`);
    log(`[Batch] Total batch time: ${elapsedSeconds(startedAt)} seconds.`);
    return stats;
  }

  private recordOutput(stats: RunStats, outputPath: string): void {
    stats.recordOutput(outputPath);
    this.newlyWritten.add(outputPath);
  }
}
