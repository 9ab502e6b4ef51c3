/**
 * Incremental update archives
 *
 * Packs the files written during one run into updates/update_<n>.zip, where
 * n is the smallest number not already taken. Entries are stored relative to
 * the translated folder so the zip can be unpacked over an existing copy.
 */

import * as fs from 'fs';
import * as path from 'path';
import { zipSync, Zippable } from 'fflate';
import { IOFailureError } from '../core/errors';
import { toArchivePath } from '../core/outputPaths';
import { log } from '../logging/log';

const ARCHIVE_PREFIX = 'update_';
const ARCHIVE_EXTENSION = '.zip';

export function archiveFileName(n: number): string {
  return `${ARCHIVE_PREFIX}${n}${ARCHIVE_EXTENSION}`;
}

export class IncrementalArchiver {
  constructor(
    private readonly archiveDir: string,
    private readonly outputRoot: string
  ) {}

  /**
   * Smallest n >= 1 with no update_<n>.zip in the archive directory
   */
  nextArchiveNumber(): number {
    let n = 1;
    while (fs.existsSync(path.join(this.archiveDir, archiveFileName(n)))) {
      n++;
    }
    return n;
  }

  /**
   * Create the next update archive holding `paths`.
   * Returns the archive path, or null when there is nothing to pack.
   */
  async archive(paths: readonly string[]): Promise<string | null> {
    if (paths.length === 0) {
      return null;
    }

    const entries: Zippable = {};
    for (const filePath of paths) {
      const entryName = toArchivePath(filePath, this.outputRoot);
      try {
        entries[entryName] = new Uint8Array(fs.readFileSync(filePath));
      } catch (error) {
        throw new IOFailureError(filePath, 'read', { cause: error });
      }
      log(`[Archive]   Added: ${entryName}`);
    }

    try {
      fs.mkdirSync(this.archiveDir, { recursive: true });
    } catch (error) {
      throw new IOFailureError(this.archiveDir, 'write', { cause: error });
    }

    const archivePath = path.join(this.archiveDir, archiveFileName(this.nextArchiveNumber()));
    log(`[Archive] Creating ${archivePath} with ${paths.length} file(s)`);

    try {
      // wx: never overwrite an archive that appeared since the number was chosen
      fs.writeFileSync(archivePath, zipSync(entries), { flag: 'wx' });
    } catch (error) {
      throw new IOFailureError(archivePath, 'write', { cause: error });
    }

    log(`[Archive] Successfully created ${archivePath}`);
    return archivePath;
  }
}
