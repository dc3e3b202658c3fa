/**
 * Metadata payload
 *
 * Turns a description into the tag map written in a single exiftool call:
 * - Subject / Caption-Abstract: short search description
 * - ImageDescription / UserComment: the full description, for people
 * - XMP:Description, Keywords, XMP:Subject: extracted keywords, for search
 * - mode-specific title tags (XMP:Title, Creator, Software)
 */

import { charLength, extractKeywords, joinKeywords } from '../description/keywords.js';
import { getModeProfile } from '../description/modes.js';
import type { ModeProfile } from '../description/modes.js';
import { parseDescription } from '../description/parser.js';
import type {
  DescriptionMode,
  MetadataPayload,
  MetadataTags,
  ParsedFields
} from '../types/index.js';

const ELLIPSIS = '...';

function clip(value: string, maxLength: number | undefined, suffix: string = ''): string {
  if (maxLength === undefined || charLength(value) <= maxLength) {
    return value;
  }
  return Array.from(value).slice(0, maxLength).join('') + suffix;
}

export function buildSearchDescription<M extends DescriptionMode>(
  parsed: ParsedFields<M>,
  profile: ModeProfile<M>
): string {
  const parts: string[] = [];

  for (const part of profile.searchParts) {
    const value = parsed[part.key];
    if (value) {
      parts.push(clip(value, part.maxLength, ELLIPSIS));
    }
  }

  return parts.join(' ');
}

function buildTitleTags<M extends DescriptionMode>(
  parsed: ParsedFields<M>,
  profile: ModeProfile<M>
): MetadataTags {
  const tags: MetadataTags = {};

  for (const titleTag of profile.titleTags) {
    const value = parsed[titleTag.key];
    if (!value || titleTag.emptyMarkers?.includes(value)) {
      continue;
    }
    tags[titleTag.tag] = clip(value, titleTag.maxLength);
  }

  return tags;
}

export function buildMetadataPayload<M extends DescriptionMode>(
  description: string,
  mode: M
): MetadataPayload<M> {
  const profile = getModeProfile(mode);
  const parsed = parseDescription(description, mode);
  const keywords = extractKeywords(description, mode);
  const keywordText = joinKeywords(keywords);
  const searchDescription = buildSearchDescription(parsed, profile);

  const tags: MetadataTags = {};

  if (searchDescription) {
    tags.Subject = searchDescription;
    tags['Caption-Abstract'] = searchDescription;
  }

  tags.ImageDescription = description;
  tags.UserComment = description;

  if (keywordText) {
    tags['XMP:Description'] = keywordText;
    tags.Keywords = keywordText;
    tags['XMP:Subject'] = keywordText;
  }

  Object.assign(tags, buildTitleTags(parsed, profile));

  return { tags, keywords, searchDescription, parsed };
}
