/**
 * Materializer for zip-bundled units.
 *
 * The downloaded archive is extracted into a staging directory beside the
 * canonical directory, and the staging directory is renamed into place only
 * after extraction succeeds. The temporary archive is removed afterwards.
 */

import * as fs from 'node:fs/promises';
import AdmZip from 'adm-zip';
import { ExtractionFailedError, errorMessage } from '../errors.js';
import type { FetchTask, Materializer } from './types.js';
import { temporarySibling } from './temp-paths.js';

export class ArchiveMaterializer implements Materializer {
  tempPathFor(task: FetchTask): string {
    return temporarySibling(task.localPath, 'zip');
  }

  async materialize(task: FetchTask, tempPath: string): Promise<number> {
    const stagingDir = temporarySibling(task.localPath, 'extract');

    try {
      let fileCount: number;
      try {
        const zip = new AdmZip(tempPath);
        fileCount = zip.getEntries().filter((entry) => !entry.isDirectory).length;
        if (fileCount === 0) {
          throw new Error('archive contains no files');
        }
        zip.extractAllTo(stagingDir, true);
      } catch (err) {
        throw new ExtractionFailedError(task.descriptor.key, `Extraction failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      await removeEmptyDirectory(task.localPath);
      await fs.rename(stagingDir, task.localPath);
      await fs.rm(tempPath, { force: true });
      return fileCount;
    } catch (err) {
      await fs.rm(stagingDir, { recursive: true, force: true });
      throw err;
    }
  }

  async discard(_task: FetchTask, tempPath: string): Promise<void> {
    await fs.rm(tempPath, { force: true });
  }
}

/**
 * Remove an empty directory left by an interrupted extraction so the
 * staging directory can take its place. A non-empty directory is left
 * untouched and makes the following rename fail.
 */
async function removeEmptyDirectory(dirPath: string): Promise<void> {
  try {
    await fs.rmdir(dirPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return;
    }
    if (err instanceof Error && 'code' in err && (err.code === 'ENOTEMPTY' || err.code === 'EEXIST')) {
      throw new ExtractionFailedError(dirPath, `Destination ${dirPath} already holds files`, { cause: err });
    }
    throw err;
  }
}
