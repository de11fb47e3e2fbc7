/**
 * Feed Recorder: Feed Fetcher
 *
 * The fetch/parse capability the orchestrator calls once per feed URL,
 * and its default implementation over HTTP + rss-parser.
 */

import Parser from 'rss-parser';
import type { FeedParseResult, RawFeedEntry } from '../types';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { toRawFeedEntry } from './normalizer';

/**
 * Fetches and parses one feed. Rejects when the feed cannot be
 * retrieved or parsed at all; partial problems go in `diagnostic`.
 */
export interface FeedFetcher {
  fetch(feedUrl: string): Promise<FeedParseResult>;
}

export interface RssFeedFetcherOptions {
  /** Per-request timeout in ms */
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = 'feed-recorder/1.0';

const FEED_CONTENT_TYPE = /xml|rss|atom/i;

const ACCEPT_HEADER =
  'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';

/**
 * RSS/Atom fetcher: global fetch for the request, rss-parser for the body.
 */
export class RssFeedFetcher implements FeedFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  // rss-parser folds Atom published/updated into pubDate and drops
  // category terms, so keep the raw elements alongside
  private readonly parser = new Parser({
    customFields: {
      item: [
        ['published', 'published'],
        ['updated', 'updated'],
        ['dc:date', 'date'],
        ['category', 'category', { keepArray: true }],
      ],
    },
  });

  constructor(options: RssFeedFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'RssFeedFetcher' });
  }

  async fetch(feedUrl: string): Promise<FeedParseResult> {
    const response = await fetch(feedUrl, {
      headers: {
        'User-Agent': this.userAgent,
        Accept: ACCEPT_HEADER,
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Failed to fetch feed: ${response.status} ${response.statusText}`.trim());
    }

    const body = await response.text();
    const feed = await this.parser.parseString(body);

    const diagnostics: string[] = [];

    const contentType = response.headers.get('content-type');
    if (contentType && !FEED_CONTENT_TYPE.test(contentType)) {
      diagnostics.push(`Unexpected content type: ${contentType}`);
    }

    const entries: RawFeedEntry[] = [];
    let skipped = 0;

    for (const item of feed.items) {
      const entry = toRawFeedEntry(item);
      if (entry) {
        entries.push(entry);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      diagnostics.push(`Skipped ${skipped} item(s) that are not entries`);
    }

    this.logger.debug('Feed parsed', {
      feedUrl,
      feedTitle: feed.title,
      entries: entries.length,
    });

    return {
      malformed: diagnostics.length > 0,
      diagnostic: diagnostics.length > 0 ? diagnostics.join('; ') : undefined,
      entries,
    };
  }
}
