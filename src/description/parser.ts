import type { DescriptionMode, ParsedFields } from '../types/index.js';

import { getModeProfile } from './modes.js';
import type { LabelRule } from './modes.js';

export interface LabeledLine<M extends DescriptionMode> {
  rule: LabelRule<M>;
  value: string;
}

/**
 * Yields every trimmed, non-blank line that starts with one of the mode's
 * labels, paired with the first matching rule and the trimmed remainder.
 */
export function* labeledLines<M extends DescriptionMode>(
  description: string,
  mode: M
): Generator<LabeledLine<M>> {
  const { labels } = getModeProfile(mode);

  for (const rawLine of description.trim().split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const rule = labels.find(candidate => line.startsWith(candidate.label));
    if (rule) {
      yield { rule, value: line.slice(rule.label.length).trim() };
    }
  }
}

/**
 * Parse a labeled description into its fields. A label seen twice keeps the
 * later value; lines without a known label are dropped.
 */
export function parseDescription<M extends DescriptionMode>(
  description: string,
  mode: M
): ParsedFields<M> {
  const fields: ParsedFields<M> = {};

  for (const { rule, value } of labeledLines(description, mode)) {
    fields[rule.key] = value;
  }

  return fields;
}
