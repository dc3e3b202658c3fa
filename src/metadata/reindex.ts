import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { env } from '../config/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const execFileAsync = promisify(execFile);

export interface ReindexOptions {
  /** Indexer executable, `mdimport` (Spotlight) by default */
  command?: string;
}

/**
 * Ask the desktop search indexer to rescan a directory. Failure is logged
 * and reported as false; the metadata is already on disk either way.
 */
export async function triggerReindex(
  directory: string,
  options: ReindexOptions = {}
): Promise<boolean> {
  const command = options.command ?? env.REINDEX_COMMAND;

  try {
    await execFileAsync(command, ['-r', directory]);
    logger.info({ directory, command }, 'Triggered search index refresh');
    return true;
  } catch (error) {
    logger.warn(
      { directory, command, error: describeError(error) },
      'Search index refresh failed, metadata was still written'
    );
    return false;
  }
}
