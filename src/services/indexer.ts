/**
 * Image indexing pipeline
 *
 * Walks the given directories one image at a time: skip images that are
 * already described (unless forced), analyze the rest, preview the tags, and
 * write them. A failed image is counted and the batch moves on.
 */

import { resolve } from 'node:path';

import { charLength } from '../description/keywords.js';
import { findBaseDir, formatDisplayPath } from '../lib/display-path.js';
import { logger } from '../lib/logger.js';
import { buildMetadataPayload } from '../metadata/payload.js';
import type { MetadataVerifier } from '../metadata/verify.js';
import type { SafeMetadataWriter } from '../metadata/writer.js';
import type {
  ImageAnalyzer,
  MetadataTags,
  ProcessOptions,
  ProcessSummary
} from '../types/index.js';

import { findImages as findImagesOnDisk } from './image-scan.js';

const PREVIEW_LENGTH = 80;
const VERIFY_PREVIEW_LENGTH = 50;
const KEYWORDS_PER_IMAGE_SAMPLE = 5;

export interface IndexerDependencies {
  verifier: Pick<MetadataVerifier, 'readFields'>;
  writer: Pick<SafeMetadataWriter, 'writeDetailed'>;
  /** Called once, on the first image that needs analysis */
  createAnalyzer: () => ImageAnalyzer;
  findImages?: typeof findImagesOnDisk;
  reindex?: (directory: string) => Promise<boolean>;
}

export function clipForDisplay(value: string, maxLength: number): string {
  const singleLine = value.replace(/\s*\n\s*/g, ' ').trim();
  if (charLength(singleLine) <= maxLength) {
    return singleLine;
  }
  return `${Array.from(singleLine).slice(0, maxLength - 3).join('')}...`;
}

export function previewTags(tags: MetadataTags, maxLength: number = PREVIEW_LENGTH): MetadataTags {
  const preview: MetadataTags = {};
  for (const [tag, value] of Object.entries(tags)) {
    preview[tag] = clipForDisplay(value, maxLength);
  }
  return preview;
}

export function emptySummary(total: number): ProcessSummary {
  return {
    total,
    skipped: 0,
    analyzed: 0,
    analysisFailed: 0,
    written: 0,
    writeFailed: 0,
    sampleKeywords: []
  };
}

/**
 * Exit status for a finished run.
 */
export function exitCodeFor(summary: ProcessSummary, options: ProcessOptions): number {
  if (summary.total === 0) {
    return 1;
  }
  if (options.verifyOnly) {
    return 0;
  }
  if (summary.analyzed === 0) {
    return summary.skipped > 0 ? 0 : 1;
  }
  if (options.dryRun) {
    return 0;
  }
  return summary.written > 0 ? 0 : 1;
}

async function collectImages(
  options: ProcessOptions,
  findImages: typeof findImagesOnDisk
): Promise<string[]> {
  const images: string[] = [];

  for (const directory of options.directories) {
    const found = await findImages(directory, { recursive: options.recursive });
    logger.info({ directory, count: found.length }, 'Scanned directory');
    images.push(...found);
  }

  return images;
}

async function verifyImages(
  images: string[],
  directories: string[],
  deps: IndexerDependencies
): Promise<ProcessSummary> {
  const summary = emptySummary(images.length);

  for (const image of images) {
    const file = formatDisplayPath(image, findBaseDir(image, directories));
    const fields = await deps.verifier.readFields(image);

    if (Object.keys(fields).length > 0) {
      summary.skipped++;
      const preview: Record<string, string> = {};
      for (const [tag, value] of Object.entries(fields)) {
        preview[tag] = clipForDisplay(value, VERIFY_PREVIEW_LENGTH);
      }
      logger.info({ file, fields: preview }, 'Image has metadata');
    } else {
      logger.info({ file }, 'Image has no metadata');
    }
  }

  return summary;
}

export async function processImages(
  options: ProcessOptions,
  deps: IndexerDependencies
): Promise<ProcessSummary> {
  const directories = options.directories.map(directory => resolve(directory));
  const images = await collectImages(
    { ...options, directories },
    deps.findImages ?? findImagesOnDisk
  );

  if (images.length === 0) {
    logger.warn({ directories }, 'No supported images found');
    return emptySummary(0);
  }

  logger.info({ count: images.length, mode: options.mode }, 'Found images');

  if (options.verifyOnly) {
    return verifyImages(images, directories, deps);
  }

  const summary = emptySummary(images.length);
  const sampleKeywords = new Set<string>();
  let analyzer: ImageAnalyzer | null = null;

  for (const [index, image] of images.entries()) {
    const baseDir = findBaseDir(image, directories);
    const file = formatDisplayPath(image, baseDir);
    const progress = `${index + 1}/${images.length}`;

    if (!options.force && !options.dryRun) {
      const existing = await deps.verifier.readFields(image);
      if (Object.keys(existing).length > 0) {
        summary.skipped++;
        logger.info({ file, progress }, 'Skipping image that already has metadata');
        continue;
      }
    }

    analyzer ??= deps.createAnalyzer();

    logger.info({ file, progress }, 'Analyzing image');
    const description = await analyzer.analyze(image, options.mode);
    if (!description) {
      summary.analysisFailed++;
      continue;
    }
    summary.analyzed++;

    const payload = buildMetadataPayload(description, options.mode);
    for (const keyword of payload.keywords.slice(0, KEYWORDS_PER_IMAGE_SAMPLE)) {
      sampleKeywords.add(keyword);
    }
    logger.info(
      { file, keywordCount: payload.keywords.length, tags: previewTags(payload.tags) },
      'Metadata to be written'
    );

    if (options.dryRun) {
      continue;
    }

    const result = await deps.writer.writeDetailed(image, description, options.mode, { baseDir });
    if (result.success) {
      summary.written++;
    } else {
      summary.writeFailed++;
    }
  }

  summary.sampleKeywords = [...sampleKeywords];

  if (!options.dryRun && summary.analyzed > 0 && deps.reindex) {
    for (const directory of directories) {
      await deps.reindex(directory);
    }
  }

  logger.info({ summary }, 'Processing finished');
  return summary;
}
