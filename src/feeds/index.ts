/**
 * Feed Recorder: Feeds Module
 *
 * Fetching, parsing and normalization of syndication feeds.
 */

export {
  RssFeedFetcher,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  type FeedFetcher,
  type RssFeedFetcherOptions,
} from './base';

export {
  toRawFeedEntry,
  extractTopics,
  normalizeEntry,
  normalizeEntries,
  DEFAULT_TITLE,
  DEFAULT_AUTHOR,
} from './normalizer';

export {
  fetchAll,
  fetchAllWithReport,
  MIN_FETCH_DELAY_MS,
  type AggregatorConfig,
} from './aggregator';
