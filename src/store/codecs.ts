/**
 * Feed Recorder: Store Codecs
 *
 * Whole-file encodings of a record collection: a pretty-printed JSON
 * array, or CSV with a header row and topics flattened to one cell.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { CanonicalRecordSchema, RECORD_FIELDS } from '../types';
import type { CanonicalRecord, StoreCodec, StoreFormat } from '../types';

/** Joins topics in a CSV cell. A topic containing it splits on re-read. */
export const TOPIC_SEPARATOR = ', ';

function toOrderedRecord(record: CanonicalRecord): CanonicalRecord {
  return {
    timestamp: record.timestamp,
    title: record.title,
    author: record.author,
    feed_url: record.feed_url,
    entry_url: record.entry_url,
    topics: record.topics,
  };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  const path = issue.path.length > 0 ? issue.path.join('.') : 'collection';
  return `${path}: ${issue.message}`;
}

// ============================================================
// JSON
// ============================================================

const RecordCollectionSchema = z.array(CanonicalRecordSchema);

export const jsonCodec: StoreCodec = {
  format: 'json',

  encode(records) {
    return JSON.stringify(records.map(toOrderedRecord), null, 2);
  },

  decode(content) {
    const data: unknown = JSON.parse(content);
    const result = RecordCollectionSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`Invalid record collection (${describeIssue(result.error)})`);
    }
    return result.data;
  },
};

// ============================================================
// CSV
// ============================================================

const CsvRowsSchema = z.array(z.array(z.string()));

export function joinTopics(topics: string[]): string {
  return topics.join(TOPIC_SEPARATOR);
}

export function splitTopics(cell: string): string[] {
  return cell === '' ? [] : cell.split(TOPIC_SEPARATOR);
}

export const csvCodec: StoreCodec = {
  format: 'csv',

  encode(records) {
    const rows = records.map(record => ({
      ...toOrderedRecord(record),
      topics: joinTopics(record.topics),
    }));

    return stringify(rows, {
      header: true,
      columns: [...RECORD_FIELDS],
      record_delimiter: 'windows',
    });
  },

  decode(content) {
    // Ragged rows make the parser throw
    const parsed: unknown = parse(content, { bom: true, skip_empty_lines: true });
    const rows = CsvRowsSchema.parse(parsed);

    const [header, ...body] = rows;
    if (!header) return [];

    const columnIndex = new Map(header.map((name, index) => [name, index]));
    const missing = RECORD_FIELDS.filter(field => !columnIndex.has(field));
    if (missing.length > 0) {
      throw new Error(`Invalid CSV header, missing column(s): ${missing.join(', ')}`);
    }

    const cell = (row: string[], field: (typeof RECORD_FIELDS)[number]): string =>
      row[columnIndex.get(field) ?? -1] ?? '';

    const records = body.map(row => ({
      timestamp: cell(row, 'timestamp'),
      title: cell(row, 'title'),
      author: cell(row, 'author'),
      feed_url: cell(row, 'feed_url'),
      entry_url: cell(row, 'entry_url'),
      topics: splitTopics(cell(row, 'topics')),
    }));

    const result = RecordCollectionSchema.safeParse(records);
    if (!result.success) {
      throw new Error(`Invalid record collection (row ${describeIssue(result.error)})`);
    }
    return result.data;
  },
};

// ============================================================
// FORMAT SELECTION
// ============================================================

export const CODECS: Record<StoreFormat, StoreCodec> = {
  json: jsonCodec,
  csv: csvCodec,
};
