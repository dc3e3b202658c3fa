#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage:
 *   image-content-indexer <dir...> [options]
 *
 * Options:
 *   --no-recursive  only the given directories, not their subdirectories
 *   --dry-run       analyze and preview, write nothing
 *   --verify        report existing metadata, analyze nothing
 *   --force         re-analyze images that already have metadata
 *   --screenshot    use the screenshot labels (on-screen text, UI elements)
 */

import { parseArgs } from 'node:util';

import { env } from './config/index.js';
import { describeError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { ExifToolMetadataTool } from './metadata/exiftool.js';
import { triggerReindex } from './metadata/reindex.js';
import { MetadataVerifier } from './metadata/verify.js';
import { SafeMetadataWriter } from './metadata/writer.js';
import { exitCodeFor, processImages } from './services/indexer.js';
import { VisionAnalyzer } from './services/vision.js';
import type { ProcessOptions } from './types/index.js';

const USAGE = 'Usage: image-content-indexer <dir...> [--no-recursive] [--dry-run] [--verify] [--force] [--screenshot]';

export function parseCliArgs(argv: string[]): ProcessOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'no-recursive': { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      verify: { type: 'boolean', default: false },
      force: { type: 'boolean', default: false },
      screenshot: { type: 'boolean', default: false }
    }
  });

  if (positionals.length === 0) {
    throw new Error(`At least one directory is required\n${USAGE}`);
  }

  return {
    directories: positionals,
    recursive: !values['no-recursive'],
    mode: values.screenshot ? 'screenshot' : 'normal',
    dryRun: Boolean(values['dry-run']),
    verifyOnly: Boolean(values.verify),
    force: Boolean(values.force)
  };
}

export async function main(argv: string[]): Promise<number> {
  let options: ProcessOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }

  const tool = new ExifToolMetadataTool({ taskTimeoutMillis: env.EXIFTOOL_TIMEOUT_MS });

  try {
    const summary = await processImages(options, {
      verifier: new MetadataVerifier({ tool }),
      writer: new SafeMetadataWriter({ tool }),
      createAnalyzer: () => new VisionAnalyzer(),
      reindex: directory => triggerReindex(directory)
    });

    if (summary.written > 0 && summary.sampleKeywords.length > 0) {
      logger.info(
        { examples: summary.sampleKeywords.slice(0, 6) },
        'Images can now be found by content in desktop search'
      );
    }

    return exitCodeFor(summary, options);
  } catch (error) {
    logger.error({ error: describeError(error) }, 'Processing aborted');
    return 1;
  } finally {
    await tool.end();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error(error, 'Fatal error');
      process.exitCode = 1;
    });
}
