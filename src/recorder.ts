/**
 * Feed Recorder: Run Pipeline
 *
 * One recorder run, start to finish:
 * 1. Check the output format (before any network traffic)
 * 2. Load the feed list
 * 3. Fetch and normalize every feed
 * 4. Merge the records into the output store
 *
 * Fatal problems (bad config, unsupported output, unreadable or
 * unwritable store) end the run with exit code 1. Feeds that fail
 * are skipped and the run still succeeds.
 */

import { nanoid } from 'nanoid';
import type { FetchReport, MergeResult } from './types';
import { loadFeedConfig } from './config';
import { fetchAllWithReport } from './feeds/aggregator';
import type { FeedFetcher } from './feeds/base';
import { mergeIntoStore, resolveStoreFormat } from './store/merge';
import { logger as defaultLogger, timeOperation } from './lib/logger';
import type { Logger } from './lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface RecorderOptions {
  configPath: string;
  outputPath: string;
  fetcher: FeedFetcher;
  /** Pause before each feed request, in ms */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  now?: () => Date;
}

export type RunStatus = 'completed' | 'no_feeds' | 'no_entries' | 'failed';

export interface RunResult {
  runId: string;
  status: RunStatus;
  exitCode: 0 | 1;
  feedCount: number;
  fetch?: FetchReport;
  merge?: MergeResult;
  error?: string;
  durationMs: number;
  completedAt: string;
}

// ============================================================
// RUN
// ============================================================

export async function runRecorder(options: RecorderOptions): Promise<RunResult> {
  const startTime = Date.now();
  const runId = nanoid(10);
  const log = (options.logger ?? defaultLogger).child({ runId });

  let feedCount = 0;
  let fetchReport: FetchReport | undefined;

  const finish = (
    status: RunStatus,
    extra: { merge?: MergeResult; error?: string } = {}
  ): RunResult => ({
    runId,
    status,
    exitCode: status === 'failed' ? 1 : 0,
    feedCount,
    fetch: fetchReport,
    ...extra,
    durationMs: Date.now() - startTime,
    completedAt: new Date().toISOString(),
  });

  log.info('Starting feed recorder run', {
    configPath: options.configPath,
    outputPath: options.outputPath,
  });

  try {
    const format = resolveStoreFormat(options.outputPath);

    const config = await loadFeedConfig(options.configPath);
    feedCount = config.feedUrls.length;
    log.info(`Loaded configuration from ${options.configPath}`, { feeds: feedCount, format });

    if (feedCount === 0) {
      log.error('No feed URLs found in config file', { configPath: options.configPath });
      return finish('no_feeds');
    }

    log.info(`Starting feed fetching process for ${feedCount} feeds`);

    const report = await timeOperation(
      'Feed fetch',
      () =>
        fetchAllWithReport(config.feedUrls, {
          fetcher: options.fetcher,
          delayMs: options.delayMs,
          sleep: options.sleep,
          logger: log,
          now: options.now,
        }),
      log
    );
    fetchReport = report;

    if (report.records.length === 0) {
      log.warn('No entries found in any feeds', { failedFeeds: report.failed });
      return finish('no_entries');
    }

    const merge = await mergeIntoStore(options.outputPath, report.records, { logger: log });

    log.info(`Successfully processed ${report.records.length} entries from ${feedCount} feeds`, {
      failedFeeds: report.failed,
    });
    log.info(`Output file now contains ${merge.count} entries: ${options.outputPath}`);

    return finish('completed', { merge });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    log.error('Feed recorder run failed', { error: errorMessage });
    return finish('failed', { error: errorMessage });
  }
}
