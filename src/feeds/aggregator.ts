/**
 * Feed Recorder: Feed Aggregator
 *
 * Fetches the configured feeds one after another:
 * 1. Wait out the pacing delay
 * 2. Fetch and parse the feed
 * 3. Normalize its entries to canonical records
 * 4. Record a per-feed outcome; a failing feed never stops the batch
 */

import { setTimeout as delay } from 'timers/promises';
import type { CanonicalRecord, FeedOutcome, FetchReport } from '../types';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import type { FeedFetcher } from './base';
import { normalizeEntries } from './normalizer';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorConfig {
  fetcher: FeedFetcher;
  /** Pause before every request, in ms (never below MIN_FETCH_DELAY_MS) */
  delayMs?: number;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  /** Clock for entries without a usable date */
  now?: () => Date;
}

export const MIN_FETCH_DELAY_MS = 1000;

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

// ============================================================
// SINGLE FEED
// ============================================================

async function fetchFeed(
  feedUrl: string,
  config: AggregatorConfig,
  log: Logger
): Promise<{ outcome: FeedOutcome; records: CanonicalRecord[] }> {
  log.info('Fetching feed', { feedUrl });

  try {
    const result = await config.fetcher.fetch(feedUrl);

    if (result.malformed) {
      log.warn('Parsing error', { feedUrl, diagnostic: result.diagnostic ?? 'unknown' });
    }

    const records = normalizeEntries(result.entries, feedUrl, { logger: log, now: config.now });

    log.info('Processed entries', { feedUrl, entries: records.length });

    return {
      outcome: {
        status: 'ok',
        feedUrl,
        entryCount: records.length,
        malformed: result.malformed,
        diagnostic: result.diagnostic,
      },
      records,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    log.error('Error processing feed', { feedUrl, error: errorMessage });

    return {
      outcome: { status: 'failed', feedUrl, error: errorMessage },
      records: [],
    };
  }
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Fetch every feed in order and report per-feed outcomes.
 */
export async function fetchAllWithReport(
  feedUrls: readonly string[],
  config: AggregatorConfig
): Promise<FetchReport> {
  const log = config.logger ?? defaultLogger;
  const sleep = config.sleep ?? defaultSleep;
  const delayMs = Math.max(config.delayMs ?? MIN_FETCH_DELAY_MS, MIN_FETCH_DELAY_MS);

  const records: CanonicalRecord[] = [];
  const feeds: FeedOutcome[] = [];

  for (const feedUrl of feedUrls) {
    await sleep(delayMs);

    const result = await fetchFeed(feedUrl, config, log);
    feeds.push(result.outcome);
    records.push(...result.records);
  }

  const failed = feeds.filter(f => f.status === 'failed').length;

  if (feedUrls.length > 0) {
    log.info('Feed fetch phase completed', {
      feeds: feeds.length,
      failed,
      records: records.length,
    });
  }

  return {
    records,
    feeds,
    succeeded: feeds.length - failed,
    failed,
  };
}

/**
 * Fetch every feed in order and return all normalized records.
 */
export async function fetchAll(
  feedUrls: readonly string[],
  config: AggregatorConfig
): Promise<CanonicalRecord[]> {
  const report = await fetchAllWithReport(feedUrls, config);
  return report.records;
}
