/**
 * Metadata module - reading, verifying and safely writing image descriptions
 *
 * - exiftool adapter behind the MetadataTool interface
 * - tag payload built from a description
 * - verifier deciding whether an image is already described
 * - transactional writer with backup and rollback
 * - search index refresh
 */

export {
  ExifToolMetadataTool,
  WRITE_ARGS,
  isMetadataToolError,
  normalizeRawTags,
  toMetadataToolError,
  withDeadline,
  withTimeout,
  type ExifToolMetadataToolOptions
} from './exiftool.js';

export { buildMetadataPayload, buildSearchDescription } from './payload.js';

export {
  MetadataVerifier,
  DESCRIPTION_TAGS,
  filterMetadataFields,
  isMeaningfulMetadata,
  type MetadataVerifierOptions
} from './verify.js';

export {
  SafeMetadataWriter,
  SIDECAR_SUFFIX,
  BACKUP_PREFIX,
  BACKUP_SUFFIX,
  sidecarPath,
  type SafeMetadataWriterOptions
} from './writer.js';

export { triggerReindex, type ReindexOptions } from './reindex.js';
