/**
 * Feed Recorder: Output Store Types
 */

import type { CanonicalRecord } from './feed-item';

export type StoreFormat = 'json' | 'csv';

/**
 * Fresh: no output file before the run. Existing: file present and read.
 */
export type StoreState = 'fresh' | 'existing';

export interface MergeResult {
  format: StoreFormat;
  state: StoreState;
  /** Records loaded from the existing file (0 when fresh) */
  existingCount: number;
  /** Incoming records accepted into the collection */
  addedCount: number;
  /** Incoming records dropped as duplicates */
  skippedCount: number;
  /** Records now persisted */
  count: number;
}

export interface MergedCollection {
  records: CanonicalRecord[];
  added: number;
  skipped: number;
}

/**
 * Encodes and decodes a whole persisted collection.
 */
export interface StoreCodec {
  readonly format: StoreFormat;
  encode(records: CanonicalRecord[]): string;
  decode(content: string): CanonicalRecord[];
}
