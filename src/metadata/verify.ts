import { env } from '../config/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { VERIFIED_TAGS } from '../types/index.js';
import type { MetadataFields, MetadataTool, VerifiedTag } from '../types/index.js';

/** Tags that hold real descriptive text when present */
export const DESCRIPTION_TAGS: readonly VerifiedTag[] = [
  'ImageDescription',
  'XMP:Description',
  'Subject',
  'XMP:Subject'
];

export interface MetadataVerifierOptions {
  tool: MetadataTool;
  /** A description tag must be longer than this (trimmed) to count */
  minDescriptionLength?: number;
  /** UserComment values the OS assigns by itself, e.g. "Screenshot" on macOS */
  placeholderComments?: readonly string[];
}

function isVerifiedTag(name: string): name is VerifiedTag {
  return VERIFIED_TAGS.some(tag => tag === name);
}

function stringifyValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(item => String(item)).join(', ');
  }
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

/**
 * Keep the known tags with non-empty values.
 */
export function filterMetadataFields(raw: Record<string, unknown>): MetadataFields {
  const fields: MetadataFields = {};

  for (const [name, value] of Object.entries(raw)) {
    if (!isVerifiedTag(name)) {
      continue;
    }
    const text = stringifyValue(value);
    if (text) {
      fields[name] = text;
    }
  }

  return fields;
}

/**
 * Decide whether filtered fields amount to real content metadata.
 */
export function isMeaningfulMetadata(
  fields: MetadataFields,
  minDescriptionLength: number,
  placeholderComments: readonly string[]
): boolean {
  const names = Object.keys(fields);
  if (names.length === 0) {
    return false;
  }

  const userComment = fields.UserComment;
  if (names.length === 1 && userComment !== undefined && placeholderComments.includes(userComment)) {
    return false;
  }

  return DESCRIPTION_TAGS.some(tag => {
    const value = fields[tag];
    return value !== undefined && value.trim().length > minDescriptionLength;
  });
}

/**
 * Metadata Verifier
 *
 * Reads the description-related tags of an image and reports them only when
 * they already describe the image, so a re-run can skip it.
 */
export class MetadataVerifier {
  private readonly tool: MetadataTool;
  private readonly minDescriptionLength: number;
  private readonly placeholderComments: readonly string[];

  constructor(options: MetadataVerifierOptions) {
    this.tool = options.tool;
    this.minDescriptionLength = options.minDescriptionLength ?? env.METADATA_MIN_DESCRIPTION_LENGTH;
    this.placeholderComments = options.placeholderComments ?? env.METADATA_PLACEHOLDER_COMMENTS;
  }

  /**
   * Existing fields when they are meaningful, `{}` otherwise (including when
   * the tool fails).
   */
  async readFields(imagePath: string): Promise<MetadataFields> {
    try {
      const raw = await this.tool.readTags(imagePath, VERIFIED_TAGS);
      const fields = filterMetadataFields(raw);

      return isMeaningfulMetadata(fields, this.minDescriptionLength, this.placeholderComments)
        ? fields
        : {};
    } catch (error) {
      logger.warn(
        {
          file: imagePath,
          error: describeError(error)
        },
        'Failed to read existing metadata, treating as empty'
      );
      return {};
    }
  }

  async hasMeaningfulMetadata(imagePath: string): Promise<boolean> {
    const fields = await this.readFields(imagePath);
    return Object.keys(fields).length > 0;
  }
}
