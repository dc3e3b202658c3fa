import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { DescriptionMode } from '../types/index.js';

import { KEYWORD_PUNCTUATION, getModeProfile } from './modes.js';
import type { TokenizerKind } from './modes.js';
import { labeledLines } from './parser.js';

/**
 * Length in code points, so a CJK character outside the BMP counts once.
 */
export function charLength(value: string): number {
  return Array.from(value).length;
}

function isPunctuationOnly(token: string): boolean {
  return Array.from(token).every(char => KEYWORD_PUNCTUATION.includes(char));
}

function tokenize(value: string, tokenizer: TokenizerKind): string[] {
  const text = tokenizer === 'phrases' ? value.replace(/[，。]/g, ' ') : value;
  return text.split(/\s+/).filter(token => token.length > 0);
}

function byLengthThenLexical(a: string, b: string): number {
  const lengthDiff = charLength(b) - charLength(a);
  if (lengthDiff !== 0) {
    return lengthDiff;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Best-effort split of the raw text, used when structured extraction fails.
 */
export function fallbackKeywords(description: string, mode: DescriptionMode): string[] {
  const { minKeywordLength, fallbackMaxKeywords } = getModeProfile(mode);

  return description
    .replace(/[，。：]/g, ' ')
    .split(/\s+/)
    .map(word => word.trim())
    .filter(word => word.length > 0 && charLength(word) >= minKeywordLength)
    .slice(0, fallbackMaxKeywords);
}

/**
 * Extract search keywords from the labeled lines of a description.
 *
 * Keywords are deduplicated, filtered by the mode's minimum length, ordered
 * longest first (ties lexically) and capped at the mode's maximum. Never
 * throws: on failure the raw text is split instead.
 */
export function extractKeywords(description: string, mode: DescriptionMode): string[] {
  const profile = getModeProfile(mode);

  try {
    const keywords = new Set<string>();

    for (const { rule, value } of labeledLines(description, mode)) {
      if (!value || rule.emptyMarkers?.includes(value)) {
        continue;
      }
      for (const token of tokenize(value, rule.tokenizer)) {
        if (charLength(token) >= (rule.minTokenLength ?? 0)) {
          keywords.add(token);
        }
      }
    }

    return [...keywords]
      .filter(
        keyword => charLength(keyword) >= profile.minKeywordLength && !isPunctuationOnly(keyword)
      )
      .sort(byLengthThenLexical)
      .slice(0, profile.maxKeywords);
  } catch (error) {
    logger.warn(
      { mode, error: describeError(error) },
      'Keyword extraction failed, falling back to plain tokenization'
    );
    return fallbackKeywords(description, mode);
  }
}

export function joinKeywords(keywords: readonly string[]): string {
  return keywords.join(', ');
}
