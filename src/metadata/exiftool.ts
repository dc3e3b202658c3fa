/**
 * exiftool adapter
 *
 * Implements MetadataTool on top of exiftool-vendored, which bundles the
 * exiftool script and keeps one long-lived process for all reads and writes.
 * Tags are read as JSON with family-0 group names so the extended (XMP) tags
 * can be told apart from the primary ones.
 */

import { ExifTool } from 'exiftool-vendored';

import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

import type {
  MetadataTags,
  MetadataTool,
  MetadataToolError,
  WriteTagsOptions
} from '../types/index.js';

/**
 * UTF-8 for values and IPTC, and keep the file modification time. No
 * `-overwrite_original`: exiftool leaves a `<file>_original` copy that the
 * writer removes once the result checks out.
 */
export const WRITE_ARGS: readonly string[] = ['-charset', 'utf8', '-codedcharacterset=utf8', '-P'];

const EXTENDED_GROUP = 'XMP';

export function isMetadataToolError(error: unknown): error is MetadataToolError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    'message' in error &&
    (error.type === 'timeout' || error.type === 'exit') &&
    typeof error.message === 'string'
  );
}

export function toMetadataToolError(error: unknown): MetadataToolError {
  if (isMetadataToolError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    type: /time(d)?\s?out/i.test(message) ? 'timeout' : 'exit',
    message,
    originalError: error
  };
}

/**
 * Settles with `promise`, or rejects with a timeout MetadataToolError after
 * `timeoutMs`.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error: MetadataToolError = {
        type: 'timeout',
        message: `Metadata tool did not finish within ${timeoutMs}ms`
      };
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Like withTimeout, but on timeout runs `abort` and waits for `task` to
 * settle before rejecting, so nothing is still writing once the caller sees
 * the timeout.
 */
export async function withDeadline<T>(
  task: Promise<T>,
  timeoutMs: number,
  abort: () => Promise<void>
): Promise<T> {
  try {
    return await withTimeout(task, timeoutMs);
  } catch (error) {
    const toolError = toMetadataToolError(error);
    if (toolError.type === 'timeout') {
      await abort();
      const [outcome] = await Promise.allSettled([task]);
      if (outcome.status === 'rejected') {
        logger.debug({ error: describeError(outcome.reason) }, 'Abandoned metadata task ended');
      }
    }
    throw toolError;
  }
}

/**
 * Flatten `-G` keys: primary groups (EXIF, IPTC, ...) lose their prefix,
 * XMP keeps it. `SourceFile` is dropped. The first value wins when two groups
 * collapse onto the same name.
 */
export function normalizeRawTags(raw: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'SourceFile') {
      continue;
    }

    const separator = key.indexOf(':');
    let name = key;
    if (separator > 0) {
      const group = key.slice(0, separator);
      const tag = key.slice(separator + 1);
      name = group === EXTENDED_GROUP ? `${EXTENDED_GROUP}:${tag}` : tag;
    }

    if (!(name in normalized)) {
      normalized[name] = value;
    }
  }

  return normalized;
}

export interface ExifToolMetadataToolOptions {
  /** Per-task limit enforced by exiftool-vendored itself */
  taskTimeoutMillis: number;
}

export class ExifToolMetadataTool implements MetadataTool {
  private exiftool: ExifTool | null = null;
  private readonly options: ExifToolMetadataToolOptions;

  constructor(options: ExifToolMetadataToolOptions) {
    this.options = options;
  }

  private getExifTool(): ExifTool {
    if (!this.exiftool) {
      this.exiftool = new ExifTool({ taskTimeoutMillis: this.options.taskTimeoutMillis });
    }
    return this.exiftool;
  }

  async readTags(filePath: string, tagNames: readonly string[]): Promise<Record<string, unknown>> {
    try {
      const raw: Record<string, unknown> = await this.getExifTool().readRaw(filePath, [
        '-G',
        ...tagNames.map(name => `-${name}`)
      ]);
      return normalizeRawTags(raw);
    } catch (error) {
      throw toMetadataToolError(error);
    }
  }

  async writeTags(filePath: string, tags: MetadataTags, options: WriteTagsOptions): Promise<void> {
    const exiftool = this.getExifTool();

    try {
      await withDeadline(
        exiftool.write(filePath, tags, [...WRITE_ARGS]),
        options.timeoutMs,
        () => this.kill(exiftool)
      );
    } catch (error) {
      throw toMetadataToolError(error);
    }
  }

  /**
   * Ends the process running an abandoned write; the next call starts a new one.
   */
  private async kill(exiftool: ExifTool): Promise<void> {
    if (this.exiftool === exiftool) {
      this.exiftool = null;
    }
    await exiftool.end(false);
  }

  /**
   * Shut down the exiftool process (call on exit)
   */
  async end(): Promise<void> {
    if (this.exiftool) {
      await this.exiftool.end();
      this.exiftool = null;
    }
  }
}
