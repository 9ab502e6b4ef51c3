import { Settings } from '../config/settings';
import { TextTranslator } from '../core/types';
import { PipelineError, errorMessage } from '../core/errors';
import { IncrementalArchiver } from '../archive/archiver';
import { log } from '../logging/log';
import { BatchOrchestrator } from './orchestrator';
import { RunStats } from './runStats';

export type RunMode = 'folder' | 'character' | 'both';

export interface PipelineRunOptions {
  mode: RunMode;
  createZip: boolean;
}

export interface PipelineRunResult {
  stats: RunStats;
  /** Archive written at the end of the run, if any */
  archivePath: string | null;
}

/**
 * Parse the answer to the "what to translate" prompt: f, c or blank for both.
 */
export function parseRunMode(answer: string): RunMode | null {
  switch (answer.trim().toLowerCase()) {
    case 'f':
    case 'folder':
      return 'folder';
    case 'c':
    case 'character':
    case 'character system text':
      return 'character';
    case '':
    case 'both':
      return 'both';
    default:
      return null;
  }
}

/**
 * One top-level run: the selected batches in order, then at most one archive
 * holding every file those batches wrote.
 */
export async function runPipeline(
  settings: Settings,
  translator: TextTranslator,
  options: PipelineRunOptions
): Promise<PipelineRunResult> {
  const orchestrator = new BatchOrchestrator(translator, settings.paths);
  const stats = new RunStats();

  if (options.mode === 'folder' || options.mode === 'both') {
    stats.merge(await orchestrator.runStoryBatch(settings.paths.rawFolder));
  }
  if (options.mode === 'character' || options.mode === 'both') {
    stats.merge(await orchestrator.runCharacterBatch());
  }

  log('All tasks complete');

  let archivePath: string | null = null;
  if (options.createZip) {
    const archiver = new IncrementalArchiver(settings.paths.updatesFolder, settings.paths.translatedFolder);
    try {
      archivePath = await archiver.archive(orchestrator.newlyWrittenPaths());
      if (!archivePath) {
        log('No newly translated files, skipping update archive');
      }
    } catch (error) {
      // Translated files stay on disk and the run still reports its counts
      if (!(error instanceof PipelineError)) throw error;
      log(`Failed to create update archive: ${errorMessage(error)}`);
      stats.recordFailure({ path: settings.paths.updatesFolder, reason: errorMessage(error) });
    }
  }

  return { stats, archivePath };
}
