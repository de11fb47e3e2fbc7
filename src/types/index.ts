/**
 * Feed Recorder: Type Exports
 *
 * Re-exports all types from the types module.
 */

// Feed entries and records
export type {
  FeedTag,
  RawFeedEntry,
  DateField,
  FeedParseResult,
  CanonicalRecord,
  FeedOutcome,
  FetchReport,
} from './feed-item';
export { DATE_FIELDS, RECORD_FIELDS, CanonicalRecordSchema } from './feed-item';

// Output store
export type {
  StoreFormat,
  StoreState,
  MergeResult,
  MergedCollection,
  StoreCodec,
} from './store';
