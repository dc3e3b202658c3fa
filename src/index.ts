export * from './types/index.js';
export * from './description/index.js';
export * from './metadata/index.js';
export { VisionAnalyzer, encodeImageDataUrl, defaultVisionConfig } from './services/vision.js';
export type { VisionAnalyzerConfig } from './services/vision.js';
export { findImages, isSupportedImage, SUPPORTED_IMAGE_EXTENSIONS } from './services/image-scan.js';
export {
  processImages,
  exitCodeFor,
  previewTags,
  clipForDisplay,
  type IndexerDependencies
} from './services/indexer.js';
export { formatDisplayPath, findBaseDir } from './lib/display-path.js';
