/**
 * Feed Recorder: Feed Entry Types v1.0
 *
 * Raw entries as they come out of a feed parser, and the flat
 * canonical record every entry is normalized to before it is stored.
 */

import { z } from 'zod';

// ============================================================
// RAW FEED ENTRY
// ============================================================

/**
 * A category tag as Atom emits it (`<category term="..." label="..."/>`).
 */
export interface FeedTag {
  term?: string;
  label?: string;
}

/**
 * One entry from a parsed feed. Every field is optional: feeds in the
 * wild omit or mangle any of them.
 */
export interface RawFeedEntry {
  title?: string;
  author?: string;
  creator?: string;
  link?: string;

  // Date-bearing fields, in the order they are consulted
  published?: string;
  updated?: string;
  pubDate?: string;
  date?: string;

  tags?: FeedTag[];
  categories?: string[];
}

export const DATE_FIELDS = ['published', 'updated', 'pubDate', 'date'] as const;
export type DateField = (typeof DATE_FIELDS)[number];

// ============================================================
// FEED PARSE RESULT
// ============================================================

/**
 * What a fetcher hands back for one feed URL.
 * `malformed` mirrors a parser's "bozo" bit: the feed was readable but
 * something about it was off, and `diagnostic` says what.
 */
export interface FeedParseResult {
  malformed: boolean;
  diagnostic?: string;
  entries: RawFeedEntry[];
}

// ============================================================
// CANONICAL RECORD
// ============================================================

export const CanonicalRecordSchema = z.object({
  timestamp: z.string().min(1),
  title: z.string(),
  author: z.string(),
  feed_url: z.string(),
  entry_url: z.string(),
  topics: z.array(z.string()).default([]),
});

/**
 * Normalized, persisted representation of a feed entry.
 * Keys are snake_case because they are the on-disk format.
 */
export type CanonicalRecord = z.infer<typeof CanonicalRecordSchema>;

/** Column order of the tabular encoding and key order of the JSON one. */
export const RECORD_FIELDS = [
  'timestamp',
  'title',
  'author',
  'feed_url',
  'entry_url',
  'topics',
] as const;

// ============================================================
// FETCH REPORT
// ============================================================

export type FeedOutcome =
  | {
      status: 'ok';
      feedUrl: string;
      entryCount: number;
      malformed: boolean;
      diagnostic?: string;
    }
  | {
      status: 'failed';
      feedUrl: string;
      error: string;
    };

/**
 * Result of fetching a batch of feeds.
 */
export interface FetchReport {
  /** Normalized records, feed-then-entry order */
  records: CanonicalRecord[];
  /** One outcome per requested feed, in request order */
  feeds: FeedOutcome[];
  succeeded: number;
  failed: number;
}
