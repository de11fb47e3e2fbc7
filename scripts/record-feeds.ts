#!/usr/bin/env tsx
/**
 * Feed Recorder: Record Feeds Script
 *
 * Fetches every feed listed in the YAML config and merges the entries
 * into the output file (.json or .csv).
 *
 * Usage:
 *   npm run record                                         # Default paths
 *   npm run record -- --config feeds.yaml --output out.csv
 *
 * Cron Setup (runs daily at 6 AM):
 *   0 6 * * * cd /path/to/feed-recorder && npm run record >> /var/log/feed-recorder.log 2>&1
 */

import 'dotenv/config';
import { mkdir } from 'fs/promises';
import { dirname, resolve } from 'path';
import { expandHome, loadEnvironmentConfig } from '../src/config';
import { RssFeedFetcher } from '../src/feeds/base';
import { createConsoleSink, createLogger, logger } from '../src/lib/logger';
import { runRecorder } from '../src/recorder';

// ============================================================
// CONFIGURATION
// ============================================================

interface CliOptions {
  configPath?: string;
  outputPath?: string;
  help: boolean;
}

const USAGE = `Usage: record-feeds [--config <path>] [--output <path>]

Options:
  --config <path>   YAML file with a feed_urls list (default: $FEED_RECORDER_CONFIG or ~/feed_config.yaml)
  --output <path>   Output file, .json or .csv (default: $FEED_RECORDER_OUTPUT or ~/feed_data.json)
  --help            Show this message`;

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--config' && next) {
      options.configPath = next;
      i++;
    } else if (args[i] === '--output' && next) {
      options.outputPath = next;
      i++;
    } else if (args[i] === '--help' || args[i] === '-h') {
      options.help = true;
    } else {
      throw new Error(`Unknown or incomplete argument: ${args[i]}`);
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  const env = loadEnvironmentConfig();
  const log = createLogger({
    level: env.logging.level,
    sink: createConsoleSink({ file: env.logging.file && resolve(expandHome(env.logging.file)) }),
  });

  const configPath = resolve(expandHome(cli.configPath ?? env.paths.config));
  const outputPath = resolve(expandHome(cli.outputPath ?? env.paths.output));

  await mkdir(dirname(outputPath), { recursive: true });

  const result = await runRecorder({
    configPath,
    outputPath,
    fetcher: new RssFeedFetcher({
      timeoutMs: env.fetch.timeoutMs,
      userAgent: env.fetch.userAgent,
      logger: log,
    }),
    delayMs: env.fetch.delayMs,
    logger: log,
  });

  log.info('Feed recorder run finished', {
    status: result.status,
    feeds: result.feedCount,
    failedFeeds: result.fetch?.failed ?? 0,
    added: result.merge?.addedCount ?? 0,
    total: result.merge?.count,
    durationMs: result.durationMs,
  });

  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unhandled exception', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
