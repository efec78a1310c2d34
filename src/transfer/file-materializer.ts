/**
 * Materializer for plain objects: the temporary file is renamed onto the
 * canonical path once the body has been fully written.
 */

import * as fs from 'node:fs/promises';
import type { FetchTask, Materializer } from './types.js';
import { temporarySibling } from './temp-paths.js';

export class FileMaterializer implements Materializer {
  tempPathFor(task: FetchTask): string {
    return temporarySibling(task.localPath, 'download');
  }

  async materialize(task: FetchTask, tempPath: string): Promise<number> {
    await fs.rename(tempPath, task.localPath);
    return 1;
  }

  async discard(_task: FetchTask, tempPath: string): Promise<void> {
    await fs.rm(tempPath, { force: true });
  }
}
