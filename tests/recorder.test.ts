/**
 * Tests for a full recorder run
 *
 * Feeds come from an in-memory fetcher; config and store are real files.
 */

import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runRecorder } from '../src/recorder';
import type { FeedFetcher } from '../src/feeds/base';
import type { FeedParseResult } from '../src/types';
import { createCapturingLogger } from './helpers/logger';

const FEED_A = 'https://a.example/rss';
const FEED_B = 'https://b.example/atom';

const feeds: Record<string, FeedParseResult> = {
  [FEED_A]: {
    malformed: false,
    entries: [
      { title: 'A1', link: 'https://a.example/1', pubDate: 'Mon, 02 Jan 2006 15:04:05 +0000', categories: ['go'] },
      { title: 'A2', link: 'https://a.example/2', pubDate: 'Tue, 03 Jan 2006 15:04:05 +0000' },
    ],
  },
};

let dir: string;
let fetchCalls: string[];

const fetcher: FeedFetcher = {
  fetch: async (feedUrl) => {
    fetchCalls.push(feedUrl);
    const result = feeds[feedUrl];
    if (!result) throw new Error('getaddrinfo ENOTFOUND');
    return result;
  },
};

const noSleep = async () => undefined;

async function writeConfig(feedUrls: string[]): Promise<string> {
  const path = join(dir, 'feeds.yaml');
  const lines = feedUrls.length > 0 ? ['feed_urls:', ...feedUrls.map(url => `  - ${url}`)] : ['feed_urls: []'];
  await writeFile(path, lines.join('\n') + '\n', 'utf8');
  return path;
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'feed-recorder-run-'));
  fetchCalls = [];
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('runRecorder', () => {
  it('should record entries from the feeds that respond', async () => {
    const { logger, at } = createCapturingLogger();
    const outputPath = join(dir, 'out.json');

    const result = await runRecorder({
      configPath: await writeConfig([FEED_A, FEED_B]),
      outputPath,
      fetcher,
      sleep: noSleep,
      logger,
    });

    expect(result.status).toBe('completed');
    expect(result.exitCode).toBe(0);
    expect(result.feedCount).toBe(2);
    expect(result.fetch?.succeeded).toBe(1);
    expect(result.fetch?.failed).toBe(1);
    expect(result.merge?.count).toBe(2);
    expect(fetchCalls).toEqual([FEED_A, FEED_B]);

    expect(JSON.parse(await readFile(outputPath, 'utf8'))).toEqual([
      {
        timestamp: '2006-01-03T15:04:05+00:00',
        title: 'A2',
        author: 'Unknown',
        feed_url: FEED_A,
        entry_url: 'https://a.example/2',
        topics: [],
      },
      {
        timestamp: '2006-01-02T15:04:05+00:00',
        title: 'A1',
        author: 'Unknown',
        feed_url: FEED_A,
        entry_url: 'https://a.example/1',
        topics: ['go'],
      },
    ]);

    expect(at('error').map(e => e.message)).toEqual(['Error processing feed']);
    expect(at('info').map(e => e.message)).toContain(`Output file now contains 2 entries: ${outputPath}`);
  });

  it('should tag every log entry with the run id', async () => {
    const { logger, entries } = createCapturingLogger();

    const result = await runRecorder({
      configPath: await writeConfig([FEED_A]),
      outputPath: join(dir, 'out.csv'),
      fetcher,
      sleep: noSleep,
      logger,
    });

    expect(entries.length).toBeGreaterThan(0);
    expect(entries.every(e => e.context?.runId === result.runId)).toBe(true);
  });

  it('should not add entries twice across runs', async () => {
    const { logger } = createCapturingLogger();
    const configPath = await writeConfig([FEED_A]);
    const outputPath = join(dir, 'out.csv');
    const options = { configPath, outputPath, fetcher, sleep: noSleep, logger };

    await runRecorder(options);
    const second = await runRecorder(options);

    expect(second.merge).toEqual({
      format: 'csv',
      state: 'existing',
      existingCount: 2,
      addedCount: 0,
      skippedCount: 2,
      count: 2,
    });
  });

  it('should stop without fetching when the config lists no feeds', async () => {
    const { logger, at } = createCapturingLogger();

    const result = await runRecorder({
      configPath: await writeConfig([]),
      outputPath: join(dir, 'out.json'),
      fetcher,
      sleep: noSleep,
      logger,
    });

    expect(result.status).toBe('no_feeds');
    expect(result.exitCode).toBe(0);
    expect(fetchCalls).toEqual([]);
    expect(at('error').map(e => e.message)).toEqual(['No feed URLs found in config file']);
    expect(await readdir(dir)).toEqual(['feeds.yaml']);
  });

  it('should leave the store alone when no feed yields entries', async () => {
    const { logger, at } = createCapturingLogger();

    const result = await runRecorder({
      configPath: await writeConfig([FEED_B]),
      outputPath: join(dir, 'out.json'),
      fetcher,
      sleep: noSleep,
      logger,
    });

    expect(result.status).toBe('no_entries');
    expect(result.exitCode).toBe(0);
    expect(result.merge).toBeUndefined();
    expect(at('warn').map(e => e.message)).toEqual(['No entries found in any feeds']);
    expect(await readdir(dir)).toEqual(['feeds.yaml']);
  });

  it('should reject an unsupported output format before fetching', async () => {
    const { logger } = createCapturingLogger();
    const sleep = vi.fn(noSleep);

    const result = await runRecorder({
      configPath: await writeConfig([FEED_A]),
      outputPath: join(dir, 'out.xml'),
      fetcher,
      sleep,
      logger,
    });

    expect(result.status).toBe('failed');
    expect(result.exitCode).toBe(1);
    expect(result.error).toBe('Unsupported output format: .xml');
    expect(fetchCalls).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should fail when the config file is missing', async () => {
    const { logger, at } = createCapturingLogger();
    const configPath = join(dir, 'absent.yaml');

    const result = await runRecorder({
      configPath,
      outputPath: join(dir, 'out.json'),
      fetcher,
      sleep: noSleep,
      logger,
    });

    expect(result.status).toBe('failed');
    expect(result.exitCode).toBe(1);
    expect(result.error?.startsWith(`Error loading config file ${configPath}: `)).toBe(true);
    expect(at('error').map(e => e.message)).toEqual(['Feed recorder run failed']);
  });

  it('should fail without touching a store it cannot read', async () => {
    const { logger } = createCapturingLogger();
    const outputPath = join(dir, 'out.json');
    await writeFile(outputPath, '{"broken": ', 'utf8');

    const result = await runRecorder({
      configPath: await writeConfig([FEED_A]),
      outputPath,
      fetcher,
      sleep: noSleep,
      logger,
    });

    expect(result.status).toBe('failed');
    expect(result.exitCode).toBe(1);
    expect(result.fetch?.records).toHaveLength(2);
    expect(await readFile(outputPath, 'utf8')).toBe('{"broken": ');
  });
});
