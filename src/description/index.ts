export { parseDescription, labeledLines, type LabeledLine } from './parser.js';
export { extractKeywords, fallbackKeywords, joinKeywords, charLength } from './keywords.js';
export {
  MODE_PROFILES,
  NONE_MARKER,
  KEYWORD_PUNCTUATION,
  getModeProfile,
  isDescriptionMode,
  validateModeProfiles,
  type ModeProfile,
  type LabelRule,
  type SearchPart,
  type TitleTag,
  type TokenizerKind
} from './modes.js';
export { VISION_PROMPTS, VISION_MAX_TOKENS } from './prompts.js';
