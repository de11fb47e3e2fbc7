/**
 * Feed Recorder: Configuration
 *
 * Two sources:
 * - the environment (optionally a .env file, loaded by the CLI) for
 *   paths, pacing, timeouts and logging
 * - a YAML file listing the feeds to record
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { MIN_FETCH_DELAY_MS } from '../feeds/aggregator';
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../feeds/base';
import type { LogLevel } from '../lib/logger';

export const DEFAULT_CONFIG_PATH = '~/feed_config.yaml';
export const DEFAULT_OUTPUT_PATH = '~/feed_data.json';

// ============================================================
// ENVIRONMENT
// ============================================================

export interface EnvironmentConfig {
  paths: {
    config: string;
    output: string;
  };
  fetch: {
    delayMs: number;
    timeoutMs: number;
    userAgent: string;
  };
  logging: {
    level: LogLevel;
    file?: string;
  };
}

const EnvironmentSchema = z.object({
  FEED_RECORDER_CONFIG: z.string().default(DEFAULT_CONFIG_PATH),
  FEED_RECORDER_OUTPUT: z.string().default(DEFAULT_OUTPUT_PATH),
  FETCH_DELAY_MS: z.coerce.number().int().min(MIN_FETCH_DELAY_MS).default(MIN_FETCH_DELAY_MS),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  FETCH_USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  // Matched case-insensitively, as the logger reads it
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
  LOG_FILE: z.string().optional(),
});

/**
 * Load and validate environment configuration.
 * Empty variables count as unset.
 * @throws Error naming the offending variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = EnvironmentSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const vars = result.data;

  return {
    paths: {
      config: vars.FEED_RECORDER_CONFIG,
      output: vars.FEED_RECORDER_OUTPUT,
    },
    fetch: {
      delayMs: vars.FETCH_DELAY_MS,
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      userAgent: vars.FETCH_USER_AGENT,
    },
    logging: {
      level: vars.LOG_LEVEL,
      file: vars.LOG_FILE,
    },
  };
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

// ============================================================
// FEED LIST (YAML)
// ============================================================

export interface FeedConfig {
  feedUrls: string[];
}

// `feed_urls:` with nothing under it parses as null
const FeedConfigSchema = z
  .object({
    feed_urls: z.array(z.string().trim().min(1, 'feed URL cannot be empty')).nullish(),
  })
  .passthrough();

/**
 * Read the YAML feed list. A missing `feed_urls` key yields an empty
 * list; the caller decides what an empty list means.
 * @throws Error when the file cannot be read, parsed or validated
 */
export async function loadFeedConfig(configPath: string): Promise<FeedConfig> {
  let content: string;
  let data: unknown;

  try {
    content = await readFile(configPath, 'utf8');
    data = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Error loading config file ${configPath}: ${message}`);
  }

  const result = FeedConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || 'config'}: ${issue.message}` : result.error.message;
    throw new Error(`Invalid config file ${configPath}: ${detail}`);
  }

  return {
    feedUrls: result.data.feed_urls ?? [],
  };
}
