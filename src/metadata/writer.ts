/**
 * Safe Metadata Writer
 *
 * Writes a description into an image in place:
 * 1. Precondition checks (exists, readable, writable, non-empty)
 * 2. Byte-for-byte backup to a unique temp file
 * 3. Snapshot of access/modification times
 * 4. Tag payload from the parsed description and keywords
 * 5. One metadata tool call, bounded by the tool's timeout
 * 6. Integrity check, sidecar cleanup, timestamp restore
 *
 * Any failure after the backup exists copies the original bytes back. The
 * backup never outlives the call, and no failure is thrown to the caller.
 */

import { randomBytes } from 'node:crypto';
import { constants } from 'node:fs';
import type { Stats } from 'node:fs';
import { access, copyFile, rm, stat, utimes } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { env } from '../config/index.js';
import { formatDisplayPath } from '../lib/display-path.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type {
  DescriptionMode,
  MetadataTool,
  WriteFailureReason,
  WriteOptions,
  WriteResult
} from '../types/index.js';

import { toMetadataToolError } from './exiftool.js';
import { buildMetadataPayload } from './payload.js';

/** Suffix of the copy exiftool keeps when not told to overwrite in place */
export const SIDECAR_SUFFIX = '_original';

export const BACKUP_PREFIX = 'img_metadata_';
export const BACKUP_SUFFIX = '.backup';

const ANY_WRITE_BITS = 0o222;

export interface SafeMetadataWriterOptions {
  tool: MetadataTool;
  timeoutMs?: number;
  /** Where backups are created; the OS temp dir by default */
  backupDir?: string;
}

type PreconditionResult =
  | { ok: true; stats: Stats }
  | { ok: false; reason: WriteFailureReason; message: string };

/** Seconds since the epoch, with the sub-millisecond part */
interface Timestamps {
  atime: number;
  mtime: number;
}

async function isAccessible(filePath: string, mode: number): Promise<boolean> {
  try {
    await access(filePath, mode);
    return true;
  } catch {
    return false;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  return isAccessible(filePath, constants.F_OK);
}

export function sidecarPath(imagePath: string): string {
  return `${imagePath}${SIDECAR_SUFFIX}`;
}

export class SafeMetadataWriter {
  private readonly tool: MetadataTool;
  private readonly timeoutMs: number;
  private readonly backupDir: string;

  constructor(options: SafeMetadataWriterOptions) {
    this.tool = options.tool;
    this.timeoutMs = options.timeoutMs ?? env.EXIFTOOL_TIMEOUT_MS;
    this.backupDir = options.backupDir ?? tmpdir();
  }

  /**
   * Write the description into the image; true when the file now carries it.
   */
  async write(
    imagePath: string,
    description: string,
    mode: DescriptionMode,
    options: WriteOptions = {}
  ): Promise<boolean> {
    const result = await this.writeDetailed(imagePath, description, mode, options);
    return result.success;
  }

  /**
   * Same as write, with the failure reason.
   */
  async writeDetailed(
    imagePath: string,
    description: string,
    mode: DescriptionMode,
    options: WriteOptions = {}
  ): Promise<WriteResult> {
    const file = formatDisplayPath(imagePath, options.baseDir);

    try {
      const precondition = await this.checkPreconditions(imagePath);
      if (!precondition.ok) {
        logger.warn({ file, reason: precondition.reason }, precondition.message);
        return this.failure(precondition.reason, precondition.message, false);
      }

      let backupPath: string;
      try {
        backupPath = await this.createBackup(imagePath);
      } catch (error) {
        const message = `Backup could not be created: ${describeError(error)}`;
        logger.error({ file, reason: 'backup_failed' }, message);
        return this.failure('backup_failed', message, false);
      }
      logger.debug({ file, backupPath }, 'Created temporary backup');

      const timestamps: Timestamps = {
        atime: precondition.stats.atimeMs / 1000,
        mtime: precondition.stats.mtimeMs / 1000
      };

      return await this.writeWithBackup(imagePath, description, mode, {
        file,
        backupPath,
        timestamps
      });
    } catch (error) {
      const message = `Unexpected error: ${describeError(error)}`;
      logger.error({ file, reason: 'unexpected' }, message);
      return this.failure('unexpected', message, false);
    }
  }

  private async writeWithBackup(
    imagePath: string,
    description: string,
    mode: DescriptionMode,
    context: { file: string; backupPath: string; timestamps: Timestamps }
  ): Promise<WriteResult> {
    const { file, backupPath, timestamps } = context;

    try {
      const payload = buildMetadataPayload(description, mode);

      try {
        await this.tool.writeTags(imagePath, payload.tags, { timeoutMs: this.timeoutMs });
      } catch (error) {
        const toolError = toMetadataToolError(error);
        const reason: WriteFailureReason = toolError.type === 'timeout' ? 'timeout' : 'tool_failed';
        const restored = await this.rollback(imagePath, backupPath, timestamps, file);
        const message =
          reason === 'timeout'
            ? `Metadata write timed out after ${this.timeoutMs}ms`
            : `Metadata write failed: ${toolError.message}`;
        logger.error({ file, reason, restored }, message);
        return this.failure(reason, message, restored);
      }

      const written = await stat(imagePath);
      if (written.size === 0) {
        const restored = await this.rollback(imagePath, backupPath, timestamps, file);
        const message = 'File was empty after the metadata write, original restored from backup';
        logger.error({ file, reason: 'corrupted', restored }, message);
        return this.failure('corrupted', message, restored);
      }

      await rm(sidecarPath(imagePath), { force: true });
      await utimes(imagePath, timestamps.atime, timestamps.mtime);
      await rm(backupPath, { force: true });

      logger.info(
        { file, mode, keywordCount: payload.keywords.length },
        'Metadata written'
      );

      return { success: true, keywords: payload.keywords, tags: payload.tags };
    } catch (error) {
      const restored = await this.rollback(imagePath, backupPath, timestamps, file);
      const message = `Unexpected error: ${describeError(error)}`;
      logger.error({ file, reason: 'unexpected', restored }, message);
      return this.failure('unexpected', message, restored);
    }
  }

  private async checkPreconditions(imagePath: string): Promise<PreconditionResult> {
    if (!(await pathExists(imagePath))) {
      return { ok: false, reason: 'missing', message: 'File does not exist, skipping' };
    }

    if (!(await isAccessible(imagePath, constants.R_OK))) {
      return { ok: false, reason: 'unreadable', message: 'File is not readable, skipping' };
    }

    let stats: Stats;
    try {
      stats = await stat(imagePath);
    } catch (error) {
      return {
        ok: false,
        reason: 'stat_failed',
        message: `File status unavailable, skipping: ${describeError(error)}`
      };
    }

    // Permission bits as well as access(): a privileged user passes access()
    // on a read-only file.
    const writable =
      (stats.mode & ANY_WRITE_BITS) !== 0 && (await isAccessible(imagePath, constants.W_OK));
    if (!writable) {
      return { ok: false, reason: 'unwritable', message: 'File is not writable, skipping' };
    }

    if (stats.size === 0) {
      return { ok: false, reason: 'empty', message: 'File is empty, skipping' };
    }

    return { ok: true, stats };
  }

  private async createBackup(imagePath: string): Promise<string> {
    const backupPath = join(
      this.backupDir,
      `${BACKUP_PREFIX}${randomBytes(8).toString('hex')}${BACKUP_SUFFIX}`
    );

    try {
      await copyFile(imagePath, backupPath, constants.COPYFILE_EXCL);
      return backupPath;
    } catch (error) {
      await rm(backupPath, { force: true });
      throw error;
    }
  }

  /**
   * Copy the backup over the image, put the timestamps back, and delete the
   * backup and any sidecar. Resolves to whether the bytes were restored.
   */
  private async rollback(
    imagePath: string,
    backupPath: string,
    timestamps: Timestamps,
    file: string
  ): Promise<boolean> {
    let restored = false;

    try {
      if (await pathExists(backupPath)) {
        await copyFile(backupPath, imagePath);
        await utimes(imagePath, timestamps.atime, timestamps.mtime);
        restored = true;
      }
      await rm(sidecarPath(imagePath), { force: true });
    } catch (error) {
      logger.error(
        { file, backupPath, error: describeError(error) },
        'Failed to restore image from backup'
      );
    }

    try {
      await rm(backupPath, { force: true });
    } catch (error) {
      logger.error({ file, backupPath, error: describeError(error) }, 'Failed to remove backup');
    }

    return restored;
  }

  private failure(reason: WriteFailureReason, message: string, restored: boolean): WriteResult {
    return { success: false, reason, message, restored };
  }
}
