/**
 * Feed Recorder: Merge Store
 *
 * Append-only record store backed by a single file:
 * 1. Pick the codec from the output path's extension
 * 2. Load the existing collection, if the file exists
 * 3. Add incoming records whose entry_url has not been seen
 * 4. Sort newest first and replace the file atomically
 */

import { readFile, rename, unlink, writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { nanoid } from 'nanoid';
import type { CanonicalRecord, MergedCollection, MergeResult, StoreCodec, StoreFormat } from '../types';
import { logger as defaultLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { CODECS } from './codecs';

export interface MergeOptions {
  logger?: Logger;
}

// ============================================================
// FORMAT SELECTION
// ============================================================

const EXTENSION_FORMATS: Record<string, StoreFormat> = {
  '.json': 'json',
  '.csv': 'csv',
};

/**
 * Store format for a path, by extension. Throws on anything else.
 */
export function resolveStoreFormat(outputPath: string): StoreFormat {
  const extension = extname(outputPath).toLowerCase();
  const format = EXTENSION_FORMATS[extension];

  if (!format) {
    throw new Error(`Unsupported output format: ${extension || '(no extension)'}`);
  }

  return format;
}

export function getCodec(outputPath: string): StoreCodec {
  return CODECS[resolveStoreFormat(outputPath)];
}

// ============================================================
// MERGING
// ============================================================

/**
 * Newest first. Array#sort is stable, so equal timestamps keep their
 * relative order.
 */
export function sortByTimestampDesc(records: CanonicalRecord[]): CanonicalRecord[] {
  return [...records].sort((a, b) => {
    if (a.timestamp < b.timestamp) return 1;
    if (a.timestamp > b.timestamp) return -1;
    return 0;
  });
}

/**
 * Existing records first, then incoming records whose entry_url is
 * empty or not yet present. Records with an empty entry_url are never
 * treated as duplicates.
 */
export function mergeCollections(
  existing: CanonicalRecord[],
  incoming: CanonicalRecord[]
): MergedCollection {
  const seenUrls = new Set<string>();
  for (const record of existing) {
    if (record.entry_url) seenUrls.add(record.entry_url);
  }

  const accepted: CanonicalRecord[] = [];

  for (const record of incoming) {
    if (record.entry_url) {
      if (seenUrls.has(record.entry_url)) continue;
      seenUrls.add(record.entry_url);
    }
    accepted.push(record);
  }

  return {
    records: sortByTimestampDesc([...existing, ...accepted]),
    added: accepted.length,
    skipped: incoming.length - accepted.length,
  };
}

// ============================================================
// FILE I/O
// ============================================================

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the existing collection; null when there is no file yet.
 * A file that exists but cannot be read or decoded is an error.
 */
export async function loadExisting(
  outputPath: string,
  codec: StoreCodec = getCodec(outputPath)
): Promise<CanonicalRecord[] | null> {
  let content: string;

  try {
    content = await readFile(outputPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read existing store ${outputPath}: ${message}`);
  }

  try {
    return codec.decode(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read existing store ${outputPath}: ${message}`);
  }
}

/**
 * Replace the file in one step: write a sibling temp file, then rename
 * it over the target. On failure the target is left as it was.
 */
export async function writeAtomic(outputPath: string, content: string, log: Logger = defaultLogger): Promise<void> {
  const tempPath = join(dirname(outputPath), `.${basename(outputPath)}.${nanoid(8)}.tmp`);

  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, outputPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);

    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isMissingFile(cleanupError)) {
        log.warn('Failed to remove temporary file', {
          tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      }
    });

    throw new Error(`Failed to write store ${outputPath}: ${message}`);
  }
}

// ============================================================
// MAIN MERGE
// ============================================================

/**
 * Merge new records into the store at `outputPath` and rewrite it.
 */
export async function mergeIntoStore(
  outputPath: string,
  newRecords: CanonicalRecord[],
  options: MergeOptions = {}
): Promise<MergeResult> {
  const log = options.logger ?? defaultLogger;
  const codec = getCodec(outputPath);

  const existing = await loadExisting(outputPath, codec);
  const merged = mergeCollections(existing ?? [], newRecords);

  if (existing) {
    log.info(`Added ${merged.added} new entries to existing ${existing.length} entries`, {
      outputPath,
      duplicates: merged.skipped,
    });
  } else {
    log.info(`Created new ${codec.format.toUpperCase()} file with ${merged.added} entries`, {
      outputPath,
      duplicates: merged.skipped,
    });
  }

  await writeAtomic(outputPath, codec.encode(merged.records), log);

  return {
    format: codec.format,
    state: existing ? 'existing' : 'fresh',
    existingCount: existing?.length ?? 0,
    addedCount: merged.added,
    skippedCount: merged.skipped,
    count: merged.records.length,
  };
}

/**
 * Merge and return the number of records now persisted.
 */
export async function merge(
  outputPath: string,
  newRecords: CanonicalRecord[],
  options: MergeOptions = {}
): Promise<number> {
  const result = await mergeIntoStore(outputPath, newRecords, options);
  return result.count;
}
