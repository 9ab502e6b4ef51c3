/**
 * Asset Extractor Wrapper
 *
 * Spawns the external extraction script that dumps game assets to JSON under
 * the raw folder. The script itself is a black box; this module only builds
 * its arguments, runs it and reports how it exited.
 */

import { spawn, ChildProcess } from 'child_process';
import { log } from '../logging/log';

export const EXTRACT_TYPES = ['story', 'home', 'lyrics', 'preview'] as const;
export type ExtractType = (typeof EXTRACT_TYPES)[number];

/** Options passed through to the extraction script */
export interface ExtractorOptions {
  type: ExtractType;
  set?: string;
  group?: string;
  id?: string;
  idx?: string;
  storyId?: string;
  /** Output directory (default: raw) */
  dst?: string;
  overwrite?: boolean;
  /** Parallel workers inside the script (default: 4) */
  workers?: number;
  meta?: string;
  verbose?: boolean;
  debug?: boolean;
}

export interface ExtractorResult {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Timeout for one extraction run (30 minutes) */
const PROCESS_TIMEOUT_MS = 30 * 60_000;

export function isExtractType(value: string): value is ExtractType {
  return EXTRACT_TYPES.some(type => type === value);
}

/**
 * Map options to the script's command-line flags
 */
export function buildExtractorArgs(options: ExtractorOptions): string[] {
  const args = ['-t', options.type];

  if (options.set) args.push('-s', options.set);
  if (options.group) args.push('-g', options.group);
  if (options.id) args.push('-id', options.id);
  if (options.idx) args.push('-idx', options.idx);
  if (options.storyId) args.push('-sid', options.storyId);
  args.push('-dst', options.dst ?? 'raw');
  if (options.overwrite) args.push('-O');
  args.push('-w', String(options.workers ?? 4));
  if (options.meta) args.push('-meta', options.meta);
  if (options.verbose) args.push('-vb');
  if (options.debug) args.push('-dbg');

  return args;
}

/**
 * Run the extraction script and collect its output.
 *
 * Never rejects: a missing interpreter resolves with exit code 127, a timeout
 * with exit code 124.
 */
export function runExtractor(
  scriptPath: string,
  options: ExtractorOptions,
  interpreter: string = process.platform === 'win32' ? 'python' : 'python3'
): Promise<ExtractorResult> {
  const args = [scriptPath, ...buildExtractorArgs(options)];
  if (options.verbose || options.debug) {
    log(`[Extractor] Executing: ${interpreter} ${args.join(' ')}`);
  }

  return new Promise(resolve => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    let child: ChildProcess;

    const finish = (result: ExtractorResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      resolve(result);
    };

    const timeoutId = setTimeout(() => {
      log('[Extractor] Timed out, killing process');
      child.kill('SIGTERM');
      finish({ success: false, exitCode: 124, stdout, stderr: stderr || 'Extraction timed out' });
    }, PROCESS_TIMEOUT_MS);

    child = spawn(interpreter, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        log(`[Extractor] ${interpreter} not found. Install Python 3 and make sure it is on PATH`);
        finish({ success: false, exitCode: 127, stdout, stderr: error.message });
      } else {
        log(`[Extractor] Failed to spawn ${interpreter}: ${error.message}`);
        finish({ success: false, exitCode: 1, stdout, stderr: error.message });
      }
    });

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      const exitCode = code ?? 1;
      if (exitCode !== 0) {
        log(`[Extractor] Extraction failed with status ${exitCode}`);
      }
      finish({ success: exitCode === 0, exitCode, stdout, stderr });
    });
  });
}
