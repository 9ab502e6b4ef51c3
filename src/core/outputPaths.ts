import * as path from 'path';
import { PipelineError } from './errors';

/**
 * Map a file under `inputRoot` to the same relative location under `outputRoot`.
 *
 *   raw/story/04/0001.json  ->  translated/story/04/0001.json
 */
export function resolveOutputPath(inputPath: string, inputRoot: string, outputRoot: string): string {
  const relative = path.relative(inputRoot, inputPath);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PipelineError(`${inputPath} is not inside ${inputRoot}`);
  }

  return path.join(outputRoot, relative);
}

/**
 * Path of `filePath` relative to `root`, always with forward slashes
 */
export function toArchivePath(filePath: string, root: string): string {
  const relative = path.relative(root, filePath);
  const inside = relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  // Files outside the root keep their own (normalized) path
  const entry = inside ? relative : path.normalize(filePath);
  return entry.split(path.sep).join('/').replace(/\\/g, '/').replace(/^\/+/, '');
}
