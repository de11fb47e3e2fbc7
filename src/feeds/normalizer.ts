/**
 * Feed Recorder: Feed Normalizer
 *
 * Converts parser output into RawFeedEntry values, and raw entries
 * into the flat CanonicalRecord format that gets persisted.
 */

import { z } from 'zod';
import type { CanonicalRecord, FeedTag, RawFeedEntry } from '../types';
import { normalizeEntryDate } from '../lib/dates';
import type { DateNormalizerOptions } from '../lib/dates';

export const DEFAULT_TITLE = 'No title';
export const DEFAULT_AUTHOR = 'Unknown';

// ============================================================
// RAW ENTRY EXTRACTION
// ============================================================

// A field of the wrong shape is dropped, not fatal
const optionalText = z.string().optional().catch(undefined);
const optionalList = z.array(z.unknown()).optional().catch(undefined);

const ParsedItemSchema = z.object({
  title: optionalText,
  author: optionalText,
  creator: optionalText,
  link: optionalText,
  published: optionalText,
  updated: optionalText,
  pubDate: optionalText,
  date: optionalText,
  tags: optionalList,
  category: optionalList,
  categories: optionalList,
});

const TagSchema = z.object({
  term: optionalText,
  label: optionalText,
});

// xml2js shapes: `<category term="x"/>` and `<category domain="d">x</category>`
const XmlCategorySchema = z.object({ $: TagSchema });
const XmlTextSchema = z.object({ _: z.string() });

function toTag(value: unknown): FeedTag | null {
  const xml = XmlCategorySchema.safeParse(value);
  const direct = TagSchema.safeParse(value);
  const parsed = xml.success ? xml.data.$ : direct.success ? direct.data : null;
  if (!parsed) return null;

  const tag: FeedTag = {};
  if (parsed.term !== undefined) tag.term = parsed.term;
  if (parsed.label !== undefined) tag.label = parsed.label;
  return tag;
}

function isAtomCategory(value: unknown): boolean {
  const xml = XmlCategorySchema.safeParse(value);
  return xml.success && (xml.data.$.term !== undefined || xml.data.$.label !== undefined);
}

function toCategory(value: unknown): string | null {
  if (typeof value === 'string') return value;
  const text = XmlTextSchema.safeParse(value);
  return text.success ? text.data._ : null;
}

/**
 * Build a RawFeedEntry from whatever a feed parser produced for an item.
 * Returns null when the item is not an object at all.
 */
export function toRawFeedEntry(item: unknown): RawFeedEntry | null {
  if (typeof item !== 'object' || item === null || Array.isArray(item)) {
    return null;
  }

  const parsed = ParsedItemSchema.parse(item);
  const entry: RawFeedEntry = {};

  const textFields = [
    'title', 'author', 'creator', 'link', 'published', 'updated', 'pubDate', 'date',
  ] as const;
  for (const field of textFields) {
    const value = parsed[field];
    if (value !== undefined) entry[field] = value;
  }

  if (parsed.tags) {
    entry.tags = parsed.tags.map(toTag).filter((t): t is FeedTag => t !== null);
  } else if (parsed.category && parsed.category.some(isAtomCategory)) {
    entry.tags = parsed.category.map(toTag).filter((t): t is FeedTag => t !== null);
  } else {
    const categories = parsed.categories ?? parsed.category;
    if (categories) {
      entry.categories = categories.map(toCategory).filter((c): c is string => c !== null);
    }
  }

  return entry;
}

// ============================================================
// CANONICAL RECORDS
// ============================================================

/**
 * Topics come from tags (term, else label) or, failing that, categories.
 */
export function extractTopics(entry: RawFeedEntry): string[] {
  if (entry.tags) {
    return entry.tags.map(tag => tag.term ?? tag.label ?? '');
  }
  if (entry.categories) {
    return [...entry.categories];
  }
  return [];
}

/**
 * Normalize a raw entry from `feedUrl` into a canonical record.
 */
export function normalizeEntry(
  entry: RawFeedEntry,
  feedUrl: string,
  options: DateNormalizerOptions = {}
): CanonicalRecord {
  return {
    timestamp: normalizeEntryDate(entry, options),
    title: entry.title ?? DEFAULT_TITLE,
    author: entry.author ?? entry.creator ?? DEFAULT_AUTHOR,
    feed_url: feedUrl,
    entry_url: entry.link ?? '',
    topics: extractTopics(entry),
  };
}

/**
 * Normalize multiple raw entries from the same feed.
 */
export function normalizeEntries(
  entries: RawFeedEntry[],
  feedUrl: string,
  options: DateNormalizerOptions = {}
): CanonicalRecord[] {
  return entries.map(entry => normalizeEntry(entry, feedUrl, options));
}
