// Description modes
export const DESCRIPTION_MODES = ['normal', 'screenshot'] as const;

export type DescriptionMode = (typeof DESCRIPTION_MODES)[number];

/**
 * Semantic keys each mode's description labels map onto.
 */
export const FIELD_KEYS = {
  normal: ['summary', 'objects', 'scene', 'colors', 'style', 'text', 'emotion'],
  screenshot: ['summary', 'text_content', 'app_info', 'ui_elements', 'function_areas', 'colors']
} as const satisfies Record<DescriptionMode, readonly string[]>;

export type FieldKey<M extends DescriptionMode = DescriptionMode> = (typeof FIELD_KEYS)[M][number];

export type ParsedFields<M extends DescriptionMode = DescriptionMode> = Partial<
  Record<FieldKey<M>, string>
>;

// Embedded metadata

/**
 * Tags read back when deciding whether an image already carries a description.
 * Extended (XMP) tags keep their group prefix.
 */
export const VERIFIED_TAGS = [
  'ImageDescription',
  'UserComment',
  'Subject',
  'Keywords',
  'XMP:Description',
  'XMP:Subject'
] as const;

export type VerifiedTag = (typeof VERIFIED_TAGS)[number];

export type MetadataFields = Partial<Record<VerifiedTag, string>>;

/**
 * Tag name to value, in the order the tags are handed to exiftool.
 */
export type MetadataTags = Record<string, string>;

export interface MetadataPayload<M extends DescriptionMode = DescriptionMode> {
  tags: MetadataTags;
  keywords: string[];
  searchDescription: string;
  parsed: ParsedFields<M>;
}

export interface MetadataToolError {
  type: 'timeout' | 'exit';
  message: string;
  originalError?: unknown;
}

export interface WriteTagsOptions {
  timeoutMs: number;
}

/**
 * Boundary to the external metadata tool.
 */
export interface MetadataTool {
  readTags(filePath: string, tagNames: readonly string[]): Promise<Record<string, unknown>>;
  /**
   * Rejects with a `timeout` MetadataToolError once `timeoutMs` has passed,
   * and only after the tool has stopped touching the file.
   */
  writeTags(filePath: string, tags: MetadataTags, options: WriteTagsOptions): Promise<void>;
  end(): Promise<void>;
}

// Writer results
export type WriteFailureReason =
  | 'missing'
  | 'unreadable'
  | 'unwritable'
  | 'empty'
  | 'stat_failed'
  | 'backup_failed'
  | 'timeout'
  | 'tool_failed'
  | 'corrupted'
  | 'unexpected';

export type WriteResult =
  | {
      success: true;
      keywords: string[];
      tags: MetadataTags;
    }
  | {
      success: false;
      reason: WriteFailureReason;
      message: string;
      /** Whether the original bytes were copied back from the backup */
      restored: boolean;
    };

export interface WriteOptions {
  /** Directory that display paths in log lines are made relative to */
  baseDir?: string;
}

// Analysis
export interface ImageAnalyzer {
  analyze(imagePath: string, mode: DescriptionMode): Promise<string | null>;
}

// Batch processing
export interface ProcessOptions {
  directories: string[];
  recursive: boolean;
  mode: DescriptionMode;
  dryRun: boolean;
  verifyOnly: boolean;
  force: boolean;
}

export interface ProcessSummary {
  total: number;
  /** Images that already carried meaningful metadata */
  skipped: number;
  analyzed: number;
  analysisFailed: number;
  written: number;
  writeFailed: number;
  /** A few keywords per written image, for the closing search hint */
  sampleKeywords: string[];
}
