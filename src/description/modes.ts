/**
 * Description modes
 *
 * Each mode is a table: the labels the vision model is asked to emit, how the
 * value after each label is tokenized for keywords, which fields make up the
 * short search description, and which fields feed the title-like tags.
 * Adding a mode means adding a profile here and its key set in FIELD_KEYS.
 */

import { DESCRIPTION_MODES, FIELD_KEYS } from '../types/index.js';
import type { DescriptionMode, FieldKey } from '../types/index.js';

/**
 * `words` splits on whitespace; `phrases` first turns full-width commas and
 * periods into spaces.
 */
export type TokenizerKind = 'words' | 'phrases';

export interface LabelRule<M extends DescriptionMode> {
  label: string;
  key: FieldKey<M>;
  tokenizer: TokenizerKind;
  /** Values that mean "nothing here" and contribute no keywords */
  emptyMarkers?: readonly string[];
  /** Shortest token kept from this line, on top of the mode minimum */
  minTokenLength?: number;
}

export interface SearchPart<M extends DescriptionMode> {
  key: FieldKey<M>;
  maxLength?: number;
}

export interface TitleTag<M extends DescriptionMode> {
  key: FieldKey<M>;
  tag: string;
  maxLength?: number;
  /** Values that are never written */
  emptyMarkers?: readonly string[];
}

export interface ModeProfile<M extends DescriptionMode> {
  mode: M;
  labels: readonly LabelRule<M>[];
  minKeywordLength: number;
  maxKeywords: number;
  fallbackMaxKeywords: number;
  searchParts: readonly SearchPart<M>[];
  titleTags: readonly TitleTag<M>[];
}

/** Literal the model writes when an image has no visible text */
export const NONE_MARKER = '无';

export const KEYWORD_PUNCTUATION = '，。、！？：；';

export const MODE_PROFILES: { [M in DescriptionMode]: ModeProfile<M> } = {
  normal: {
    mode: 'normal',
    labels: [
      { label: '主要内容：', key: 'summary', tokenizer: 'phrases', minTokenLength: 2 },
      { label: '对象：', key: 'objects', tokenizer: 'words' },
      { label: '场景：', key: 'scene', tokenizer: 'words' },
      { label: '颜色：', key: 'colors', tokenizer: 'words' },
      { label: '风格：', key: 'style', tokenizer: 'words' },
      { label: '文字：', key: 'text', tokenizer: 'phrases', emptyMarkers: [NONE_MARKER] },
      { label: '情感：', key: 'emotion', tokenizer: 'words' }
    ],
    minKeywordLength: 2,
    maxKeywords: 15,
    fallbackMaxKeywords: 10,
    searchParts: [{ key: 'summary' }, { key: 'objects' }, { key: 'scene' }],
    titleTags: [{ key: 'text', tag: 'XMP:Title', emptyMarkers: [NONE_MARKER] }]
  },
  screenshot: {
    mode: 'screenshot',
    labels: [
      { label: '主要内容：', key: 'summary', tokenizer: 'phrases', minTokenLength: 2 },
      { label: '文字内容：', key: 'text_content', tokenizer: 'phrases' },
      { label: '应用信息：', key: 'app_info', tokenizer: 'words' },
      { label: '界面元素：', key: 'ui_elements', tokenizer: 'words' },
      { label: '功能区域：', key: 'function_areas', tokenizer: 'words' },
      { label: '主题色彩：', key: 'colors', tokenizer: 'words' }
    ],
    minKeywordLength: 1,
    maxKeywords: 25,
    fallbackMaxKeywords: 20,
    searchParts: [{ key: 'summary' }, { key: 'text_content', maxLength: 100 }, { key: 'app_info' }],
    titleTags: [
      { key: 'text_content', tag: 'XMP:Title' },
      { key: 'text_content', tag: 'Creator', maxLength: 200 },
      { key: 'app_info', tag: 'Software' }
    ]
  }
};

export function getModeProfile<M extends DescriptionMode>(mode: M): ModeProfile<M> {
  return MODE_PROFILES[mode];
}

export function isDescriptionMode(value: string): value is DescriptionMode {
  return DESCRIPTION_MODES.some(mode => mode === value);
}

/**
 * Checks every profile against its mode's key set. Runs once at load so a
 * label table that drifts from FIELD_KEYS fails immediately.
 */
export function validateModeProfiles(): void {
  for (const mode of DESCRIPTION_MODES) {
    const knownKeys: readonly string[] = FIELD_KEYS[mode];
    const profile: ModeProfile<DescriptionMode> = MODE_PROFILES[mode];
    const referenced = [
      ...profile.labels.map(rule => rule.key),
      ...profile.searchParts.map(part => part.key),
      ...profile.titleTags.map(tag => tag.key)
    ];

    const unknown = referenced.filter(key => !knownKeys.includes(key));
    if (unknown.length > 0) {
      throw new Error(`Mode "${mode}" references unknown fields: ${unknown.join(', ')}`);
    }

    const labels = profile.labels.map(rule => rule.label);
    if (new Set(labels).size !== labels.length) {
      throw new Error(`Mode "${mode}" declares a label more than once`);
    }
  }
}

validateModeProfiles();
